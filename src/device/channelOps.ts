import type { Logger } from '../diagnostics/logger';
import { DeviceError, isDeviceError } from '../errors/DeviceError';
import { clampRaw } from '../protocol/homingOffset';
import type { DeviceChannel } from './deviceChannel';
import type { PositionMap } from './motorTypes';

export interface PositionReadResult {
	positions: PositionMap;
	failures: DeviceError[];
}

function asDeviceError(channel: DeviceChannel, op: string, motorId: number, error: unknown): DeviceError {
	if (isDeviceError(error)) {
		return error;
	}
	return new DeviceError({
		code: 'UNKNOWN',
		message: error instanceof Error ? error.message : String(error),
		op,
		port: channel.port,
		motorId,
		cause: error
	});
}

/**
 * Reads every configured motor in order. A motor that fails is reported and
 * skipped; the remaining motors are still read.
 */
export async function readPositions(channel: DeviceChannel): Promise<PositionReadResult> {
	const positions: PositionMap = new Map();
	const failures: DeviceError[] = [];
	for (const motorId of channel.motorIds) {
		try {
			positions.set(motorId, await channel.readPosition(motorId));
		} catch (error) {
			failures.push(asDeviceError(channel, 'readPosition', motorId, error));
		}
	}
	return { positions, failures };
}

/**
 * Clamps each value into the channel's encoder range and writes it. Motors the
 * channel does not own are ignored.
 */
export async function writePositions(channel: DeviceChannel, positions: PositionMap): Promise<DeviceError[]> {
	const failures: DeviceError[] = [];
	for (const [motorId, value] of positions) {
		if (!channel.motorIds.includes(motorId)) {
			continue;
		}
		try {
			await channel.writePosition(motorId, clampRaw(value, channel.resolution));
		} catch (error) {
			failures.push(asDeviceError(channel, 'writePosition', motorId, error));
		}
	}
	return failures;
}

async function writeEachMotor(
	channel: DeviceChannel,
	logger: Logger,
	action: string,
	write: (motorId: number) => Promise<void>
): Promise<DeviceError[]> {
	const failures: DeviceError[] = [];
	for (const motorId of channel.motorIds) {
		try {
			await write(motorId);
		} catch (error) {
			const failure = asDeviceError(channel, action, motorId, error);
			failures.push(failure);
			logger.warn(`Failed to ${action}`, { arm: channel.label, port: channel.port, motorId, error: failure.message });
		}
	}
	return failures;
}

export function enableTorque(channel: DeviceChannel, logger: Logger): Promise<DeviceError[]> {
	return writeEachMotor(channel, logger, 'enable torque', async (motorId) => {
		await channel.setRegister(motorId, 'Torque_Enable', 1);
		await channel.setRegister(motorId, 'Lock', 1);
	});
}

export function disableTorque(channel: DeviceChannel, logger: Logger): Promise<DeviceError[]> {
	return writeEachMotor(channel, logger, 'disable torque', async (motorId) => {
		await channel.setRegister(motorId, 'Torque_Enable', 0);
		await channel.setRegister(motorId, 'Lock', 0);
	});
}

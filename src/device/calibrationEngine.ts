import { Logger, NoopLogger } from '../diagnostics/logger';
import { CalibrationAbortedError } from '../errors/sessionErrors';
import { OPERATING_MODE_POSITION } from '../protocol/feetechRegisters';
import { computeHomingOffset, encodeSignMagnitude, isValidOffset } from '../protocol/homingOffset';
import type { DeviceChannel } from './deviceChannel';
import type { ArmRole } from './motorTypes';

export interface CalibrationRecord {
	motorIds: number[];
	homingOffsets: Record<string, number>;
	resolution: number;
	/** Epoch seconds. */
	timestamp: number;
	role: ArmRole;
	port: string;
	voltage?: number;
}

export interface CalibrationFailure {
	motorId: number;
	step: string;
	error: string;
}

export interface CalibrationResult {
	record: CalibrationRecord;
	failures: CalibrationFailure[];
	complete: boolean;
}

/**
 * Device constants the servos need written before homing. Their derivation is
 * vendor-specific, so they stay configurable.
 */
export interface CalibrationConstants {
	phase: Record<ArmRole, number>;
	signBit: number;
}

export const DEFAULT_CALIBRATION_CONSTANTS: CalibrationConstants = {
	phase: { follower: 76, leader: 12 },
	signBit: 11
};

export interface CalibrateOptions {
	channel: DeviceChannel;
	motorIds?: readonly number[];
	role: ArmRole;
	/** Resolves true once the arm is held in its middle pose, false to abort. */
	confirm: () => Promise<boolean>;
	constants?: CalibrationConstants;
	voltage?: number;
	logger?: Logger;
	now?: () => number;
}

/**
 * Interactive homing: frees the motors, clears any previous offset and the
 * position limits, waits for the operator, then stores
 * `offset = raw - floor(resolution / 2)` on every motor that answered.
 *
 * Motors that fail at any step are reported and excluded; the result is
 * marked incomplete until they are resolved and calibration is re-run.
 */
export async function calibrate(options: CalibrateOptions): Promise<CalibrationResult> {
	const { channel, role } = options;
	const logger = options.logger ?? new NoopLogger();
	const constants = options.constants ?? DEFAULT_CALIBRATION_CONSTANTS;
	const now = options.now ?? Date.now;
	const requested = [...(options.motorIds ?? channel.motorIds)];
	const failures: CalibrationFailure[] = [];
	let active: number[] = [];

	for (const motorId of requested) {
		if (await channel.ping(motorId)) {
			active.push(motorId);
		} else {
			failures.push({ motorId, step: 'ping', error: 'no reply' });
			logger.error('Motor did not respond to ping; excluded from calibration', {
				arm: channel.label,
				port: channel.port,
				motorId
			});
		}
	}

	const runStep = async (step: string, action: (motorId: number) => Promise<void>): Promise<void> => {
		const survivors: number[] = [];
		for (const motorId of active) {
			try {
				await action(motorId);
				survivors.push(motorId);
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				failures.push({ motorId, step, error: message });
				logger.error(`Calibration step "${step}" failed`, { arm: channel.label, motorId, error: message });
			}
		}
		active = survivors;
	};

	await runStep('disable torque', async (motorId) => {
		await channel.setRegister(motorId, 'Torque_Enable', 0);
		await channel.setRegister(motorId, 'Lock', 0);
	});
	await runStep('phase and lock', async (motorId) => {
		await channel.setRegister(motorId, 'Phase', constants.phase[role]);
		await channel.setRegister(motorId, 'Lock', 0);
	});
	await runStep('operating mode', (motorId) => channel.setRegister(motorId, 'Operating_Mode', OPERATING_MODE_POSITION));
	await runStep('reset offset and limits', async (motorId) => {
		await channel.setRegister(motorId, 'Homing_Offset', 0);
		await channel.setRegister(motorId, 'Min_Position_Limit', 0);
		await channel.setRegister(motorId, 'Max_Position_Limit', channel.resolution - 1);
	});

	logger.info('Waiting for operator to place the arm in its middle pose', { arm: channel.label, port: channel.port });
	if (!(await options.confirm())) {
		throw new CalibrationAbortedError(channel.label);
	}

	const homingOffsets: Record<string, number> = {};
	await runStep('read position', async (motorId) => {
		const raw = await channel.readPosition(motorId);
		const offset = computeHomingOffset(raw, channel.resolution);
		if (!isValidOffset(offset, channel.resolution)) {
			throw new RangeError(`Offset ${offset} from raw ${raw} is outside the storable range.`);
		}
		homingOffsets[String(motorId)] = offset;
	});
	await runStep('write offset', (motorId) =>
		channel.setRegister(motorId, 'Homing_Offset', encodeSignMagnitude(homingOffsets[String(motorId)], constants.signBit))
	);

	const calibrated = new Set(active);
	for (const key of Object.keys(homingOffsets)) {
		if (!calibrated.has(Number(key))) {
			delete homingOffsets[key];
		}
	}

	for (const motorId of active) {
		logger.info('Homing offset set', { arm: channel.label, motorId, offset: homingOffsets[String(motorId)] });
	}

	return {
		record: {
			motorIds: active,
			homingOffsets,
			resolution: channel.resolution,
			timestamp: now() / 1000,
			role,
			port: channel.port,
			voltage: options.voltage
		},
		failures,
		complete: failures.length === 0
	};
}

import { Logger, NoopLogger } from '../diagnostics/logger';
import { DeviceError } from '../errors/DeviceError';
import {
	decodeStatusPacket,
	decodeUint,
	describeStatusError,
	encodePing,
	encodeRead,
	encodeUint,
	encodeWrite,
	FeetechStatusPacket,
	MAX_MOTOR_ID
} from '../protocol/feetechPacket';
import { FEETECH_REGISTERS, RegisterName, VOLTAGE_UNIT } from '../protocol/feetechRegisters';
import { BusQueue } from '../scheduler/busQueue';
import { BusQueueError } from '../scheduler/types';
import type { TransportAdapter } from '../transport/transportAdapter';
import type { DeviceChannel } from './deviceChannel';

export interface FeetechMotorChannelOptions {
	port: string;
	motorIds: readonly number[];
	transport: TransportAdapter;
	resolution?: number;
	timeoutMs?: number;
	label?: string;
	logger?: Logger;
}

const DEFAULT_RESOLUTION = 4096;
const DEFAULT_COMMAND_TIMEOUT_MS = 100;

export class FeetechMotorChannel implements DeviceChannel {
	public readonly port: string;
	public readonly motorIds: readonly number[];
	public readonly resolution: number;
	public label: string;

	private readonly transport: TransportAdapter;
	private readonly queue: BusQueue;
	private readonly timeoutMs: number;
	private readonly logger: Logger;
	private opened = false;

	public constructor(options: FeetechMotorChannelOptions) {
		for (const motorId of options.motorIds) {
			if (!Number.isInteger(motorId) || motorId < 0 || motorId > MAX_MOTOR_ID) {
				throw new DeviceError({
					code: 'INVALID_ARGUMENT',
					message: `Motor id ${motorId} is outside 0..${MAX_MOTOR_ID}.`,
					op: 'construct',
					port: options.port,
					motorId
				});
			}
		}

		this.port = options.port;
		this.motorIds = [...options.motorIds];
		this.resolution = options.resolution ?? DEFAULT_RESOLUTION;
		this.transport = options.transport;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
		this.label = options.label ?? options.port;
		this.logger = options.logger ?? new NoopLogger();
		this.queue = new BusQueue({ defaultTimeoutMs: this.timeoutMs, logger: this.logger, label: options.port });
	}

	public isOpen(): boolean {
		return this.opened;
	}

	public async open(): Promise<void> {
		await this.transport.open();
		this.opened = true;
	}

	public async close(): Promise<void> {
		this.opened = false;
		this.queue.dispose();
		await this.transport.close();
	}

	public async ping(motorId: number): Promise<boolean> {
		try {
			await this.transact('ping', motorId, encodePing(motorId));
			return true;
		} catch (error) {
			if (error instanceof DeviceError && error.code === 'DEVICE_UNRESPONSIVE') {
				return false;
			}
			throw error;
		}
	}

	public async readPosition(motorId: number): Promise<number> {
		return this.readRegister(motorId, 'Present_Position');
	}

	public async writePosition(motorId: number, value: number): Promise<void> {
		if (!Number.isInteger(value) || value < 0 || value >= this.resolution) {
			throw new DeviceError({
				code: 'INVALID_ARGUMENT',
				message: `Goal position ${value} is outside 0..${this.resolution - 1}.`,
				op: 'writePosition',
				port: this.port,
				motorId
			});
		}
		await this.setRegister(motorId, 'Goal_Position', value);
	}

	public async readVoltage(motorId: number): Promise<number> {
		const raw = await this.readRegister(motorId, 'Present_Voltage');
		return Number((raw * VOLTAGE_UNIT).toFixed(1));
	}

	public async setRegister(motorId: number, name: RegisterName, value: number): Promise<void> {
		const register = FEETECH_REGISTERS[name];
		const max = register.size === 1 ? 0xff : 0xffff;
		if (!Number.isInteger(value) || value < 0 || value > max) {
			throw new DeviceError({
				code: 'INVALID_ARGUMENT',
				message: `Value ${value} does not fit register ${name} (${register.size} byte(s)).`,
				op: `write:${name}`,
				port: this.port,
				motorId
			});
		}
		await this.transact(`write:${name}`, motorId, encodeWrite(motorId, register.address, encodeUint(value, register.size)));
	}

	public async readRegister(motorId: number, name: RegisterName): Promise<number> {
		const register = FEETECH_REGISTERS[name];
		const params = await this.transact(`read:${name}`, motorId, encodeRead(motorId, register.address, register.size));
		try {
			return decodeUint(params, register.size);
		} catch (error) {
			throw this.toDeviceError(`read:${name}`, motorId, 'CORRUPT_PACKET', error);
		}
	}

	private async transact(op: string, motorId: number, packet: Uint8Array): Promise<Uint8Array> {
		if (!this.opened) {
			throw new DeviceError({
				code: 'TRANSPORT_CLOSED',
				message: `Motor bus ${this.port} is not open.`,
				op,
				port: this.port,
				motorId
			});
		}

		let reply: Uint8Array;
		try {
			const result = await this.queue.enqueue({
				id: `${op}-${motorId}`,
				timeoutMs: this.timeoutMs,
				execute: (ctx) =>
					this.transport.send(packet, { timeoutMs: ctx.timeoutMs, signal: ctx.signal, expectedId: motorId })
			});
			reply = result.reply;
		} catch (error) {
			if (error instanceof BusQueueError && (error.code === 'TIMEOUT' || error.code === 'CANCELLED')) {
				throw this.toDeviceError(op, motorId, 'DEVICE_UNRESPONSIVE', error);
			}
			throw this.toDeviceError(op, motorId, 'TRANSPORT_CLOSED', error);
		}

		this.logger.trace('Bus exchange', { op, motorId, request: packet, reply });

		let status: FeetechStatusPacket;
		try {
			status = decodeStatusPacket(reply);
		} catch (error) {
			throw this.toDeviceError(op, motorId, 'CORRUPT_PACKET', error);
		}

		if (status.error !== 0) {
			this.logger.debug('Motor reported status flags', {
				port: this.port,
				motorId,
				op,
				flags: describeStatusError(status.error)
			});
		}
		return status.params;
	}

	private toDeviceError(
		op: string,
		motorId: number,
		code: 'DEVICE_UNRESPONSIVE' | 'CORRUPT_PACKET' | 'TRANSPORT_CLOSED',
		cause: unknown
	): DeviceError {
		const detail = cause instanceof Error ? cause.message : String(cause);
		return new DeviceError({
			code,
			message: `${op} on motor ${motorId} at ${this.port} failed: ${detail}`,
			op,
			port: this.port,
			motorId,
			cause
		});
	}
}

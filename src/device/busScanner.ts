import { Logger, NoopLogger } from '../diagnostics/logger';
import { isDeviceError } from '../errors/DeviceError';
import { ChannelOpenError } from '../errors/sessionErrors';
import { MAX_MOTOR_ID } from '../protocol/feetechPacket';
import type { DeviceChannel } from './deviceChannel';

/** Rates Feetech servos ship with or are commonly reconfigured to, fastest first. */
export const FEETECH_BAUD_RATES: readonly number[] = [1_000_000, 500_000, 250_000, 115_200, 57_600, 38_400, 19_200, 9_600];

export const ALL_MOTOR_IDS: readonly number[] = Array.from({ length: MAX_MOTOR_ID + 1 }, (_, id) => id);

export interface BusScanResult {
	baudRate: number;
	motorIds: number[];
}

export interface ScanBusOptions {
	port: string;
	baudRates?: readonly number[];
	motorIds?: readonly number[];
	/** Builds an unopened channel on `port` at the given rate. */
	createChannel: (baudRate: number, motorIds: readonly number[]) => DeviceChannel;
	signal?: AbortSignal;
	logger?: Logger;
}

async function answers(channel: DeviceChannel, motorId: number, logger: Logger): Promise<boolean> {
	try {
		return await channel.ping(motorId);
	} catch (error) {
		// At the wrong rate replies arrive garbled; that is a miss, not a failure.
		if (isDeviceError(error) && error.code !== 'TRANSPORT_CLOSED') {
			logger.debug('Unreadable reply while scanning', { port: channel.port, motorId, code: error.code });
			return false;
		}
		throw error;
	}
}

/**
 * Pings every id at every baud rate on one port. Returns the rates at which
 * at least one motor answered, with the ids that did. Stops between pings
 * when the signal aborts.
 */
export async function scanBus(options: ScanBusOptions): Promise<BusScanResult[]> {
	const logger = options.logger ?? new NoopLogger();
	const motorIds = options.motorIds ?? ALL_MOTOR_IDS;
	const found: BusScanResult[] = [];

	for (const baudRate of options.baudRates ?? FEETECH_BAUD_RATES) {
		if (options.signal?.aborted) {
			break;
		}
		const channel = options.createChannel(baudRate, motorIds);
		try {
			await channel.open();
		} catch (error) {
			throw new ChannelOpenError(options.port, error);
		}

		const answered: number[] = [];
		try {
			for (const motorId of motorIds) {
				if (options.signal?.aborted) {
					break;
				}
				if (await answers(channel, motorId, logger)) {
					answered.push(motorId);
				}
			}
		} finally {
			await channel.close();
		}

		logger.info('Scanned baud rate', { port: options.port, baudRate, motorIds: answered });
		if (answered.length > 0) {
			found.push({ baudRate, motorIds: answered });
		}
	}
	return found;
}

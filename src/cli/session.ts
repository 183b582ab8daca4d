import type { TeleopConfigSnapshot } from '../config/teleopConfig';
import { CalibrationStore, requireCalibration } from '../device/calibrationStore';
import type { CalibrationRecord } from '../device/calibrationEngine';
import type { DeviceChannel } from '../device/deviceChannel';
import { FeetechMotorChannel } from '../device/motorChannel';
import type { ArmRole } from '../device/motorTypes';
import { assignRoles, ExpectedRoleCounts, RoleAssignment } from '../device/roleIdentifier';
import { Logger, ScopedLogger } from '../diagnostics/logger';
import { CalibrationAbortedError, CalibrationIncompleteError, ChannelOpenError, RoleCountMismatchError } from '../errors/sessionErrors';
import { findRobotPorts } from '../transport/discovery';
import { SerialPortAdapter } from '../transport/serialPortAdapter';

export type ChannelFactory = (port: string, config: TeleopConfigSnapshot, logger: Logger) => DeviceChannel;

export const EXIT_CODES = {
	ok: 0,
	failure: 1,
	roleMismatch: 2,
	channelOpen: 3,
	calibration: 4
} as const;

export function exitCodeFor(error: unknown): number {
	if (error instanceof RoleCountMismatchError) {
		return EXIT_CODES.roleMismatch;
	}
	if (error instanceof ChannelOpenError) {
		return EXIT_CODES.channelOpen;
	}
	if (error instanceof CalibrationIncompleteError || error instanceof CalibrationAbortedError) {
		return EXIT_CODES.calibration;
	}
	return EXIT_CODES.failure;
}

export const createSerialChannel: ChannelFactory = (port, config, logger) => {
	const busLogger = new ScopedLogger(logger, { port });
	return new FeetechMotorChannel({
		port,
		motorIds: config.motorIds,
		transport: new SerialPortAdapter({
			port,
			baudRate: config.baudRate,
			onNoise: (discardedBytes) => busLogger.debug('Discarded bytes before reply header', { discardedBytes })
		}),
		resolution: config.resolution,
		timeoutMs: config.timeoutMs,
		logger: busLogger
	});
};

export interface OpenChannelsOptions {
	config: TeleopConfigSnapshot;
	logger: Logger;
	createChannel?: ChannelFactory;
	discoverPorts?: () => Promise<string[]>;
}

/**
 * The configured ports, or the discovered ones when none are configured.
 * Throws ChannelOpenError when there are none at all.
 */
export async function resolvePorts(options: OpenChannelsOptions): Promise<string[]> {
	const { config, logger } = options;
	let ports = config.ports;
	if (ports.length === 0) {
		ports = options.discoverPorts ? await options.discoverPorts() : await findRobotPorts(process.platform, logger);
		logger.debug('Discovered serial ports', { ports });
	}
	if (ports.length === 0) {
		throw new ChannelOpenError('(none)', new Error('No serial ports found. Connect the arms or pass --ports.'));
	}
	return ports;
}

/**
 * Opens one channel per configured (or discovered) port. On failure every
 * channel opened so far is closed and ChannelOpenError is thrown.
 */
export async function openChannels(options: OpenChannelsOptions): Promise<DeviceChannel[]> {
	const { config, logger } = options;
	const createChannel = options.createChannel ?? createSerialChannel;
	const ports = await resolvePorts(options);

	const channels: DeviceChannel[] = [];
	for (const port of ports) {
		const channel = createChannel(port, config, logger);
		try {
			await channel.open();
		} catch (error) {
			await closeChannels(channels, logger);
			throw new ChannelOpenError(port, error);
		}
		logger.info('Opened motor bus', { port, baudRate: config.baudRate, motorIds: config.motorIds });
		channels.push(channel);
	}
	return channels;
}

export async function closeChannels(channels: readonly DeviceChannel[], logger: Logger): Promise<void> {
	for (const channel of channels) {
		if (!channel.isOpen()) {
			continue;
		}
		try {
			await channel.close();
		} catch (error) {
			logger.warn('Failed to close motor bus', {
				port: channel.port,
				error: error instanceof Error ? error.message : String(error)
			});
		}
	}
}

export interface ArmSession {
	channels: DeviceChannel[];
	assignments: RoleAssignment[];
	calibrations: Map<string, CalibrationRecord>;
}

/**
 * Opens the buses, identifies roles and checks that every arm that will move
 * or be mirrored has a complete calibration on record.
 */
export async function startArmSession(
	options: OpenChannelsOptions & { expected: ExpectedRoleCounts; store?: CalibrationStore }
): Promise<ArmSession> {
	const { config, logger } = options;
	const channels = await openChannels(options);
	try {
		const assignments = await assignRoles({
			channels,
			expected: options.expected,
			probeId: config.probeId,
			logger
		});
		const store = options.store ?? new CalibrationStore(config.calibrationDir);
		const calibrations = new Map<string, CalibrationRecord>();
		for (const assignment of assignments) {
			const record = await store.load(assignment.role, assignment.channel.port);
			calibrations.set(assignment.label, requireCalibration(assignment.label, assignment.channel.motorIds, record));
		}
		return { channels, assignments, calibrations };
	} catch (error) {
		await closeChannels(channels, logger);
		throw error;
	}
}

export function channelsFor(session: ArmSession, role: ArmRole): DeviceChannel[] {
	return session.assignments.filter((assignment) => assignment.role === role).map((assignment) => assignment.channel);
}

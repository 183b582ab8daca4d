import type { Command } from 'commander';
import { sanitizeIntegerList, sanitizeNumber } from '../config/sanitizers';
import { RawTeleopSettings, readTeleopConfig, TeleopConfigSnapshot } from '../config/teleopConfig';
import { calibrate, CalibrationResult } from '../device/calibrationEngine';
import { CalibrationStore } from '../device/calibrationStore';
import { ALL_MOTOR_IDS, FEETECH_BAUD_RATES, scanBus } from '../device/busScanner';
import type { DeviceChannel } from '../device/deviceChannel';
import { ArmRole, isArmRole, roleLabel } from '../device/motorTypes';
import { identify } from '../device/roleIdentifier';
import type { Logger } from '../diagnostics/logger';
import { CalibrationIncompleteError } from '../errors/sessionErrors';
import { LocalMirrorLoop } from '../mirror/localMirrorLoop';
import { MappingTable } from '../mirror/mappingTable';
import { formatMonitorRow, MonitorReading, PositionDisplay } from '../mirror/positionDisplay';
import { RemapQueue } from '../mirror/remapQueue';
import { runFixedRateLoop } from '../scheduler/fixedRateLoop';
import { CliRuntime, createStopHandle } from './runtime';
import {
	channelsFor,
	closeChannels,
	createSerialChannel,
	openChannels,
	OpenChannelsOptions,
	resolvePorts,
	startArmSession
} from './session';

interface MirrorCommandOptions extends RawTeleopSettings {
	role?: string;
	extended?: boolean;
}

interface ScanCommandOptions extends RawTeleopSettings {
	baudRates?: string;
	maxId?: string;
}

const SCAN_TIMEOUT_MS = 20;

export function addBusOptions(command: Command): Command {
	return command
		.option('-p, --ports <list>', 'comma separated serial ports (default: auto-detect)')
		.option('--motor-ids <list>', 'comma separated motor ids (default: 1,2,3,4,5,6)')
		.option('--baud-rate <n>', 'serial baud rate (default: 1000000)')
		.option('--model <name>', 'motor model: sts3215 | sts3250 | scs0009 | sm8512bl (default: sts3215)')
		.option('--timeout-ms <n>', 'per-command reply timeout (default: 100)')
		.option('--probe-id <n>', 'motor id whose supply voltage identifies the arm (default: first motor id)')
		.option('--calibration-dir <dir>', 'calibration directory (default: ./calibration)')
		.option('--log-level <level>', 'error | warn | info | debug | trace (default: info)');
}

function errorText(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function sessionOptions(runtime: CliRuntime, config: TeleopConfigSnapshot, logger: Logger): OpenChannelsOptions {
	return { config, logger, createChannel: runtime.createChannel, discoverPorts: runtime.discoverPorts };
}

export async function runMirror(options: RawTeleopSettings, runtime: CliRuntime): Promise<void> {
	const config = readTeleopConfig(options, process.env);
	const logger = runtime.createLogger(config.logLevel);
	const session = await startArmSession({
		...sessionOptions(runtime, config, logger),
		expected: { leader: config.expectedLeaders, follower: config.expectedFollowers }
	});
	const leaders = channelsFor(session, 'leader');
	const followers = channelsFor(session, 'follower');
	const remapQueue = new RemapQueue();
	const stop = createStopHandle(runtime, logger, () => remapQueue.post({ source: 'keyboard' }));

	try {
		const leaderLabels = leaders.map((leader) => leader.label);
		const followerLabels = followers.map((follower) => follower.label);
		const mapping = config.shuffleMapping
			? MappingTable.shuffled(leaderLabels, followerLabels)
			: MappingTable.identity(leaderLabels, followerLabels);
		runtime.write(`Mapping: ${mapping.describe()}\n`);

		const loop = new LocalMirrorLoop({
			leaders,
			followers,
			mapping,
			fps: config.fps,
			durationMs: config.durationS === undefined ? undefined : config.durationS * 1000,
			display: config.display ? new PositionDisplay(runtime.write) : undefined,
			remapQueue,
			logger
		});
		const result = await loop.run(stop.signal);
		runtime.write(
			`Stopped (${result.stopReason}) after ${result.cycles} cycles: ` +
				`${result.readFailures} read errors, ${result.writeFailures} write errors, ${result.remaps} remaps.\n`
		);
	} finally {
		stop.dispose();
		await closeChannels(session.channels, logger);
	}
}

async function resolveRole(
	channel: DeviceChannel,
	requested: string | undefined,
	config: TeleopConfigSnapshot,
	logger: Logger
): Promise<{ role?: ArmRole; voltage?: number }> {
	if (isArmRole(requested)) {
		return { role: requested };
	}
	const identification = await identify(channel, config.probeId);
	if (identification.role === 'unknown') {
		logger.error('Cannot calibrate: arm role unknown (pass --role)', {
			port: channel.port,
			voltage: identification.voltage,
			error: identification.error
		});
		return { voltage: identification.voltage };
	}
	return { role: identification.role, voltage: identification.voltage };
}

export async function runCalibrate(options: MirrorCommandOptions, runtime: CliRuntime): Promise<void> {
	const config = readTeleopConfig(options, process.env);
	const logger = runtime.createLogger(config.logLevel);
	const store = new CalibrationStore(config.calibrationDir);
	const channels = await openChannels(sessionOptions(runtime, config, logger));
	const counts: Record<ArmRole, number> = { leader: 0, follower: 0 };
	const incomplete: CalibrationIncompleteError[] = [];

	try {
		for (const channel of channels) {
			const { role, voltage } = await resolveRole(channel, options.role, config, logger);
			if (!role) {
				incomplete.push(new CalibrationIncompleteError(channel.port, [...channel.motorIds]));
				continue;
			}
			channel.label = roleLabel(role, counts[role]);
			counts[role] += 1;

			const result: CalibrationResult = await calibrate({
				channel,
				role,
				voltage,
				constants: { phase: config.phase, signBit: config.signBit },
				confirm: () =>
					runtime.confirm(`Move ${channel.label} (${channel.port}) to the middle of its range, then confirm`),
				logger
			});
			if (!result.complete) {
				const missing = [...new Set(result.failures.map((failure) => failure.motorId))];
				incomplete.push(new CalibrationIncompleteError(channel.label, missing));
				runtime.write(`${channel.label}: calibration incomplete, motors ${missing.join(', ')} failed; nothing saved.\n`);
				continue;
			}
			const filePath = await store.save(result.record);
			runtime.write(`${channel.label}: saved ${result.record.motorIds.length} offsets to ${filePath}\n`);
		}
	} finally {
		await closeChannels(channels, logger);
	}

	if (incomplete.length > 0) {
		throw incomplete[0];
	}
}

export async function runIdentify(options: RawTeleopSettings, runtime: CliRuntime): Promise<void> {
	const config = readTeleopConfig(options, process.env);
	const logger = runtime.createLogger(config.logLevel);
	const channels = await openChannels(sessionOptions(runtime, config, logger));
	try {
		for (const channel of channels) {
			const result = await identify(channel, config.probeId);
			const voltage = result.voltage === undefined ? 'no reply' : `${result.voltage.toFixed(1)}V`;
			runtime.write(`${channel.port}  ${result.role}  ${voltage}\n`);
		}
	} finally {
		await closeChannels(channels, logger);
	}
}

async function readLimits(
	channel: DeviceChannel,
	motorId: number,
	logger: Logger
): Promise<{ min?: number; max?: number }> {
	try {
		return {
			min: await channel.readRegister(motorId, 'Min_Position_Limit'),
			max: await channel.readRegister(motorId, 'Max_Position_Limit')
		};
	} catch (error) {
		logger.warn('Could not read position limits; assuming the full range', {
			port: channel.port,
			motorId,
			error: errorText(error)
		});
		return {};
	}
}

async function readMonitorRow(
	channel: DeviceChannel,
	motorId: number,
	limits: { min?: number; max?: number },
	extended: boolean
): Promise<string> {
	try {
		const reading: MonitorReading = {
			motorId,
			raw: await channel.readPosition(motorId),
			resolution: channel.resolution,
			minLimit: limits.min,
			maxLimit: limits.max
		};
		if (extended) {
			reading.voltage = await channel.readVoltage(motorId);
			reading.temperature = await channel.readRegister(motorId, 'Present_Temperature');
			reading.load = await channel.readRegister(motorId, 'Present_Load');
		}
		return formatMonitorRow(reading);
	} catch (error) {
		return `M${motorId}  ${errorText(error)}`;
	}
}

export async function runMonitor(options: MirrorCommandOptions, runtime: CliRuntime): Promise<void> {
	const config = readTeleopConfig({ ...options, fps: options.fps ?? 10 }, process.env);
	const logger = runtime.createLogger(config.logLevel);
	const channels = await openChannels(sessionOptions(runtime, config, logger));
	const stop = createStopHandle(runtime, logger);
	const display = new PositionDisplay(runtime.write);

	try {
		const limits = new Map<string, { min?: number; max?: number }>();
		for (const channel of channels) {
			for (const motorId of channel.motorIds) {
				limits.set(`${channel.port}:${motorId}`, await readLimits(channel, motorId, logger));
			}
		}

		await runFixedRateLoop({
			periodMs: 1000 / config.fps,
			signal: stop.signal,
			durationMs: config.durationS === undefined ? undefined : config.durationS * 1000,
			logger,
			onCycle: async () => {
				const lines: string[] = [];
				for (const channel of channels) {
					lines.push(channel.port);
					for (const motorId of channel.motorIds) {
						const motorLimits = limits.get(`${channel.port}:${motorId}`) ?? {};
						lines.push(`  ${await readMonitorRow(channel, motorId, motorLimits, options.extended === true)}`);
					}
				}
				display.render(lines);
			}
		});
	} finally {
		stop.dispose();
		await closeChannels(channels, logger);
	}
}

/**
 * Pings every motor id at every common baud rate, for buses whose rate or ids
 * are unknown.
 */
export async function runScan(options: ScanCommandOptions, runtime: CliRuntime): Promise<void> {
	const config = readTeleopConfig({ ...options, timeoutMs: options.timeoutMs ?? SCAN_TIMEOUT_MS }, process.env);
	const logger = runtime.createLogger(config.logLevel);
	const baudRates = sanitizeIntegerList(options.baudRates, FEETECH_BAUD_RATES, 9_600, 4_000_000);
	const maxId = sanitizeNumber(options.maxId === undefined ? undefined : Number(options.maxId), 253, 0, 253);
	const createChannel = runtime.createChannel ?? createSerialChannel;
	const ports = await resolvePorts(sessionOptions(runtime, config, logger));
	const stop = createStopHandle(runtime, logger);

	try {
		for (const port of ports) {
			const results = await scanBus({
				port,
				baudRates,
				motorIds: ALL_MOTOR_IDS.slice(0, maxId + 1),
				createChannel: (baudRate, motorIds) => createChannel(port, { ...config, baudRate, motorIds: [...motorIds] }, logger),
				signal: stop.signal,
				logger
			});
			if (results.length === 0) {
				runtime.write(`${port}  no motors answered\n`);
			}
			for (const result of results) {
				runtime.write(`${port}  ${result.baudRate} baud: motors ${result.motorIds.join(', ')}\n`);
			}
		}
	} finally {
		stop.dispose();
	}
}

export function registerArmCommands(program: Command, runtime: CliRuntime): void {
	addBusOptions(
		program
			.command('mirror')
			.description('Mirror leader arms onto follower arms over local serial buses')
			.option('--fps <n>', 'control loop rate (default: 60)')
			.option('--duration <seconds>', 'stop after this many seconds')
			.option('--no-display', 'do not print live positions')
			.option('--shuffle-mapping', 'start from a random leader→follower mapping')
			.option('--leaders <n>', 'expected number of leader arms (default: 2)')
			.option('--followers <n>', 'expected number of follower arms (default: 2)')
	).action((options: RawTeleopSettings) => runMirror(options, runtime));

	addBusOptions(
		program
			.command('calibrate')
			.description('Interactively set homing offsets so the middle pose reads the middle tick')
			.option('--role <role>', 'leader | follower (default: identify by supply voltage)')
			.option('--phase-leader <n>', 'Phase register value for leader arms (default: 12)')
			.option('--phase-follower <n>', 'Phase register value for follower arms (default: 76)')
			.option('--sign-bit <n>', 'sign bit of the homing offset register (default: 11)')
	).action((options: MirrorCommandOptions) => runCalibrate(options, runtime));

	addBusOptions(
		program.command('identify').description('Report the role of each connected arm by its supply voltage')
	).action((options: RawTeleopSettings) => runIdentify(options, runtime));

	addBusOptions(
		program
			.command('monitor')
			.description('Show live positions, limits and optionally voltage, temperature and load')
			.option('--fps <n>', 'refresh rate (default: 10)')
			.option('--duration <seconds>', 'stop after this many seconds')
			.option('--extended', 'also read voltage, temperature and load')
	).action((options: MirrorCommandOptions) => runMonitor(options, runtime));

	program
		.command('scan')
		.description('Find motors by pinging every id at every common baud rate')
		.option('-p, --ports <list>', 'comma separated serial ports (default: auto-detect)')
		.option('--baud-rates <list>', `comma separated baud rates (default: ${FEETECH_BAUD_RATES.join(',')})`)
		.option('--max-id <n>', 'highest motor id to ping (default: 253)')
		.option('--timeout-ms <n>', `per-ping reply timeout (default: ${SCAN_TIMEOUT_MS})`)
		.option('--log-level <level>', 'error | warn | info | debug | trace (default: info)')
		.action((options: ScanCommandOptions) => runScan(options, runtime));
}

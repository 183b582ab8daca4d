import * as os from 'node:os';
import type { Command } from 'commander';
import { RawTeleopSettings, readTeleopConfig } from '../config/teleopConfig';
import { roleLabel } from '../device/motorTypes';
import { MappingTable } from '../mirror/mappingTable';
import { PositionDisplay } from '../mirror/positionDisplay';
import { RemapQueue } from '../mirror/remapQueue';
import { FollowerRelayClient } from '../relay/followerRelayClient';
import { LeaderRelayClient } from '../relay/leaderRelayClient';
import { RelayHub } from '../relay/relayHub';
import { WsRelayTransport } from '../relay/wsRelayTransport';
import { abortableSleep } from '../scheduler/fixedRateLoop';
import { addBusOptions } from './armCommands';
import { CliRuntime, createStopHandle } from './runtime';
import { channelsFor, closeChannels, startArmSession } from './session';

interface RelayServerOptions {
	port?: string;
	host?: string;
	logLevel?: string;
}

function sessionId(role: string): string {
	return `${role}-${os.hostname()}-${process.pid}-${Date.now().toString(36)}`;
}

function addRelayOptions(command: Command): Command {
	return command
		.option('--relay-url <url>', 'relay hub WebSocket URL (default: ws://127.0.0.1:8765)')
		.option('--status-interval-ms <n>', 'status message interval (default: 2000)')
		.option('--reconnect-delay-ms <n>', 'delay before reconnecting to the relay (default: 2000)')
		.option('--duration <seconds>', 'stop after this many seconds');
}

export async function runLeader(options: RawTeleopSettings, runtime: CliRuntime): Promise<void> {
	const config = readTeleopConfig(options, process.env);
	const logger = runtime.createLogger(config.logLevel);
	const session = await startArmSession({
		config,
		logger,
		createChannel: runtime.createChannel,
		discoverPorts: runtime.discoverPorts,
		expected: { leader: config.expectedLeaders }
	});
	const transport = new WsRelayTransport({ url: config.relayUrl, reconnectDelayMs: config.reconnectDelayMs, logger });
	const remapQueue = new RemapQueue();
	const stop = createStopHandle(runtime, logger, () => remapQueue.post({ source: 'keyboard' }));

	try {
		await transport.connect(stop.signal);
		const leaders = channelsFor(session, 'leader');
		const leaderLabels = leaders.map((leader) => leader.label);
		const followerLabels = leaders.map((_, index) => roleLabel('follower', index));
		const mapping = config.shuffleMapping
			? MappingTable.shuffled(leaderLabels, followerLabels)
			: MappingTable.identity(leaderLabels, followerLabels);
		runtime.write(`Mapping: ${mapping.describe()}\n`);

		const client = new LeaderRelayClient({
			leaders,
			mapping,
			transport,
			leaderId: sessionId('leader'),
			fps: config.fps,
			statusIntervalMs: config.statusIntervalMs,
			latencyWarningMs: config.latencyWarningMs,
			durationMs: config.durationS === undefined ? undefined : config.durationS * 1000,
			remapQueue,
			display: config.display ? new PositionDisplay(runtime.write) : undefined,
			logger
		});
		const result = await client.run(stop.signal);
		const network = result.network;
		runtime.write(
			`Stopped (${result.stopReason}): published ${result.published}, acked ${network.acked}, ` +
				`avg latency ${network.avgMs.toFixed(1)}ms, max ${network.maxMs.toFixed(1)}ms, ` +
				`loss ${(network.packetLoss * 100).toFixed(1)}%.\n`
		);
	} finally {
		stop.dispose();
		await transport.close();
		await closeChannels(session.channels, logger);
	}
}

export async function runFollower(options: RawTeleopSettings, runtime: CliRuntime): Promise<void> {
	const config = readTeleopConfig(options, process.env);
	const logger = runtime.createLogger(config.logLevel);
	const session = await startArmSession({
		config,
		logger,
		createChannel: runtime.createChannel,
		discoverPorts: runtime.discoverPorts,
		expected: { follower: config.expectedFollowers }
	});
	const transport = new WsRelayTransport({ url: config.relayUrl, reconnectDelayMs: config.reconnectDelayMs, logger });
	const stop = createStopHandle(runtime, logger);

	try {
		await transport.connect(stop.signal);
		const followers = channelsFor(session, 'follower');
		const followerLabels = followers.map((follower) => follower.label);
		const mapping = MappingTable.identity(
			followers.map((_, index) => roleLabel('leader', index)),
			followerLabels
		);
		const client = new FollowerRelayClient({
			followers,
			mapping,
			transport,
			followerId: sessionId('follower'),
			smoothing: config.smoothing,
			maxStep: config.maxStep,
			maxLatencyMs: config.maxLatencyMs,
			clockSkewToleranceMs: config.clockSkewToleranceMs,
			latencyWarningRun: config.latencyWarningRun,
			statusIntervalMs: config.statusIntervalMs,
			durationMs: config.durationS === undefined ? undefined : config.durationS * 1000,
			logger
		});
		const stats = await client.run(stop.signal);
		const dropped = Object.entries(stats.dropped)
			.filter(([, count]) => count > 0)
			.map(([reason, count]) => `${reason} ${count}`)
			.join(', ');
		runtime.write(
			`Stopped: received ${stats.received}, applied ${stats.applied}, superseded ${stats.superseded}, ` +
				`dropped ${dropped || 'none'}, gaps ${stats.gaps}.\n`
		);
	} finally {
		stop.dispose();
		await transport.close();
		await closeChannels(session.channels, logger);
	}
}

export async function runRelayServer(options: RelayServerOptions, runtime: CliRuntime): Promise<void> {
	const config = readTeleopConfig({ logLevel: options.logLevel }, process.env);
	const logger = runtime.createLogger(config.logLevel);
	const port = Number(options.port ?? '8765');
	if (!Number.isInteger(port) || port < 0 || port > 65_535) {
		throw new Error(`Invalid port: ${options.port}`);
	}
	const hub = new RelayHub({ port, host: options.host, logger });
	const boundPort = await hub.start();
	runtime.write(`Relay hub listening on ws://${options.host ?? '0.0.0.0'}:${boundPort}\n`);
	const stop = createStopHandle(runtime, logger);
	try {
		await abortableSleep(Number.POSITIVE_INFINITY, stop.signal);
	} finally {
		stop.dispose();
		await hub.stop();
	}
}

export function registerRelayCommands(program: Command, runtime: CliRuntime): void {
	addRelayOptions(
		addBusOptions(
			program
				.command('leader')
				.description('Publish leader arm positions to the relay')
				.option('--fps <n>', 'publish rate (default: 60)')
				.option('--leaders <n>', 'expected number of leader arms (default: 2)')
				.option('--shuffle-mapping', 'start from a random leader→follower mapping')
				.option('--latency-warning-ms <n>', 'warn when an ack round trip exceeds this (default: 100)')
				.option('--no-display', 'do not print live positions')
		)
	).action((options: RawTeleopSettings) => runLeader(options, runtime));

	addRelayOptions(
		addBusOptions(
			program
				.command('follower')
				.description('Drive follower arms from relay telemetry')
				.option('--followers <n>', 'expected number of follower arms (default: 2)')
				.option('--smoothing <alpha>', 'weight of the previous position, 0..0.99 (default: 0.8)')
				.option('--max-latency-ms <n>', 'drop telemetry older than this (default: 200)')
				.option('--max-step <ticks>', 'largest position change per update (default: 200)')
				.option('--clock-skew-tolerance-ms <n>', 'accepted negative latency before falling back to RTT (default: 50)')
				.option('--latency-warning-run <n>', 'warn after this many consecutive late messages (default: 10)')
		)
	).action((options: RawTeleopSettings) => runFollower(options, runtime));

	program
		.command('relay-server')
		.description('Run the WebSocket relay hub the leader and follower connect to')
		.option('--port <n>', 'port to listen on', '8765')
		.option('--host <host>', 'interface to bind (default: all)')
		.option('--log-level <level>', 'error | warn | info | debug | trace (default: info)')
		.action((options: RelayServerOptions) => runRelayServer(options, runtime));
}

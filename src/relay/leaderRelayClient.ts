import { readPositions } from '../device/channelOps';
import type { DeviceChannel } from '../device/deviceChannel';
import { positionsToRecord } from '../device/motorTypes';
import { Logger, NoopLogger } from '../diagnostics/logger';
import type { MappingTable } from '../mirror/mappingTable';
import { formatArmPositions, PositionDisplay } from '../mirror/positionDisplay';
import { RemapQueue } from '../mirror/remapQueue';
import { LoopStopReason, runFixedRateLoop } from '../scheduler/fixedRateLoop';
import { NetworkMonitor, NetworkStats, PeerState } from './networkMonitor';
import {
	ArmPositions,
	DisconnectMessage,
	decodeRelayMessage,
	encodeRelayMessage,
	StatusMessage,
	TelemetryMessage
} from './relayMessages';
import { RELAY_CHANNELS, RelayTransport } from './relayTransport';

export interface LeaderRelayClientOptions {
	leaders: readonly DeviceChannel[];
	mapping: MappingTable;
	transport: RelayTransport;
	leaderId: string;
	fps: number;
	statusIntervalMs: number;
	latencyWarningMs: number;
	durationMs?: number;
	maxCycles?: number;
	remapQueue?: RemapQueue;
	display?: PositionDisplay;
	logger?: Logger;
	now?: () => number;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface LeaderRunResult {
	stopReason: LoopStopReason;
	cycles: number;
	published: number;
	network: NetworkStats;
}

/**
 * Samples every leader arm at a fixed rate and publishes the positions,
 * fire-and-forget. Acks from the follower feed the RTT estimate that travels
 * with the next telemetry; follower status messages feed the liveness view.
 */
export class LeaderRelayClient {
	private readonly options: LeaderRelayClientOptions;
	private readonly logger: Logger;
	private readonly now: () => number;
	private readonly remapQueue: RemapQueue;
	private readonly monitor: NetworkMonitor;
	private readonly abortController = new AbortController();
	private sequence = 0;
	private published = 0;
	private publishFailures = 0;
	private malformed = 0;
	private motorsActive = 0;
	private peerState: PeerState = 'unknown';

	public constructor(options: LeaderRelayClientOptions) {
		this.options = options;
		this.logger = options.logger ?? new NoopLogger();
		this.now = options.now ?? Date.now;
		this.remapQueue = options.remapQueue ?? new RemapQueue();
		this.monitor = new NetworkMonitor({ livenessWindowMs: options.statusIntervalMs * 3 });
	}

	public get networkMonitor(): NetworkMonitor {
		return this.monitor;
	}

	public get followerState(): PeerState {
		return this.peerState;
	}

	public remap(): void {
		this.remapQueue.post({ source: 'api' });
	}

	public stop(): void {
		this.abortController.abort();
	}

	/**
	 * Reads all leaders once and publishes one telemetry message. Returns
	 * undefined when no motor could be read.
	 */
	public async sampleAndPublish(): Promise<TelemetryMessage | undefined> {
		const { leaders, mapping } = this.options;
		this.remapQueue.drain(mapping, this.logger);

		const capturedAt = this.now();
		const reads = await Promise.all(leaders.map((leader) => readPositions(leader)));
		const positions: ArmPositions = {};
		let motorsActive = 0;
		reads.forEach((read, index) => {
			const leader = leaders[index];
			for (const failure of read.failures) {
				this.logger.debug('Leader motor read failed', { arm: leader.label, motorId: failure.motorId, code: failure.code });
			}
			if (read.positions.size > 0) {
				positions[leader.label] = positionsToRecord(read.positions);
				motorsActive += read.positions.size;
			}
		});
		this.motorsActive = motorsActive;
		this.options.display?.render([
			...reads.map((read, index) => {
				const leader = leaders[index];
				return `${formatArmPositions(leader.label, read.positions, leader.resolution)}  → ${mapping.followerFor(leader.label) ?? '-'}`;
			}),
			this.describeNetwork()
		]);

		if (motorsActive === 0) {
			return undefined;
		}

		this.sequence += 1;
		const message: TelemetryMessage = {
			type: 'telemetry',
			sequence: this.sequence,
			timestamp: capturedAt,
			positions,
			mapping: mapping.toRecord(),
			leaderId: this.options.leaderId
		};
		const rttMs = this.monitor.latestRttMs();
		if (rttMs !== undefined) {
			message.rttMs = rttMs;
		}

		// Recorded first: a loopback transport can deliver the ack before publish returns.
		this.monitor.messageSent(message.sequence, this.now());
		if (this.options.transport.publish(RELAY_CHANNELS.telemetry, encodeRelayMessage(message))) {
			this.published += 1;
		} else {
			this.monitor.messageWithdrawn(message.sequence);
			this.publishFailures += 1;
			this.logger.debug('Telemetry not published: relay unavailable', { sequence: message.sequence });
		}
		return message;
	}

	/** Handles one payload from the status channel. */
	public handleStatusPayload(payload: string): void {
		const decoded = decodeRelayMessage(payload);
		if (!decoded.ok) {
			this.malformed += 1;
			this.logger.debug('Ignoring malformed status message', { reason: decoded.reason });
			return;
		}
		const message = decoded.message;
		const at = this.now();
		switch (message.type) {
			case 'ack': {
				const rtt = this.monitor.messageAcknowledged(message, at);
				if (rtt !== undefined && rtt > this.options.latencyWarningMs) {
					this.logger.warn('High latency', { rttMs: rtt, sequence: message.sequence });
				}
				break;
			}
			case 'status':
				if (message.role === 'follower' && message.senderId !== this.options.leaderId) {
					this.monitor.peerStatusReceived(at);
					this.refreshPeerState();
				}
				break;
			case 'disconnect':
				if (message.role === 'follower') {
					this.logger.warn('Follower announced disconnect', { followerId: message.senderId });
					this.monitor.peerDisconnected();
					this.refreshPeerState();
				}
				break;
			default:
				break;
		}
	}

	public publishStatus(): void {
		const status: StatusMessage = {
			type: 'status',
			role: 'leader',
			senderId: this.options.leaderId,
			timestamp: this.now(),
			motorsActive: this.motorsActive,
			armsConnected: this.options.leaders.length,
			counters: { published: this.published, publishFailures: this.publishFailures }
		};
		this.options.transport.publish(RELAY_CHANNELS.status, encodeRelayMessage(status));
		this.refreshPeerState();
	}

	public async run(signal?: AbortSignal): Promise<LeaderRunResult> {
		const onExternalAbort = (): void => this.stop();
		signal?.addEventListener('abort', onExternalAbort, { once: true });
		if (signal?.aborted) {
			this.stop();
		}
		const subscription = this.options.transport.subscribe(RELAY_CHANNELS.status, (payload) =>
			this.handleStatusPayload(payload)
		);
		const statusTimer = setInterval(() => this.publishStatus(), this.options.statusIntervalMs);
		this.publishStatus();
		this.logger.info('Leader relay started', {
			leaderId: this.options.leaderId,
			arms: this.options.leaders.map((leader) => leader.label),
			mapping: this.options.mapping.toRecord()
		});

		try {
			const result = await runFixedRateLoop({
				periodMs: 1000 / this.options.fps,
				onCycle: async () => {
					await this.sampleAndPublish();
				},
				signal: this.abortController.signal,
				durationMs: this.options.durationMs,
				maxCycles: this.options.maxCycles,
				now: this.options.now,
				sleep: this.options.sleep,
				logger: this.logger
			});
			const network = this.monitor.getStats(this.now());
			this.logger.info('Leader relay stopped', { reason: result.stopReason, published: this.published, ...network });
			return { stopReason: result.stopReason, cycles: result.cycles, published: this.published, network };
		} finally {
			clearInterval(statusTimer);
			signal?.removeEventListener('abort', onExternalAbort);
			const notice: DisconnectMessage = {
				type: 'disconnect',
				role: 'leader',
				senderId: this.options.leaderId,
				timestamp: this.now()
			};
			this.options.transport.publish(RELAY_CHANNELS.status, encodeRelayMessage(notice));
			subscription.unsubscribe();
		}
	}

	private refreshPeerState(): void {
		const next = this.monitor.peerState(this.now());
		if (next === this.peerState) {
			return;
		}
		const previous = this.peerState;
		this.peerState = next;
		if (next === 'disconnected') {
			this.logger.warn('Follower disconnected', { previous });
		} else if (next === 'connected') {
			this.logger.info('Follower connected', { previous });
		}
	}

	private describeNetwork(): string {
		const stats = this.monitor.getStats(this.now());
		const latency = stats.count > 0 ? `avg ${stats.avgMs.toFixed(1)}ms max ${stats.maxMs.toFixed(1)}ms` : 'no acks yet';
		return `seq ${this.sequence}  follower ${this.peerState}  ${latency}  loss ${(stats.packetLoss * 100).toFixed(1)}%`;
	}
}

import { enableTorque, writePositions } from '../device/channelOps';
import type { DeviceChannel } from '../device/deviceChannel';
import type { ArmLabel, PositionMap } from '../device/motorTypes';
import { Logger, NoopLogger } from '../diagnostics/logger';
import type { DeviceError } from '../errors/DeviceError';
import { MappingTable } from '../mirror/mappingTable';
import { abortableSleep } from '../scheduler/fixedRateLoop';
import { PositionSmoother } from './positionSmoother';
import {
	AckMessage,
	decodeRelayMessage,
	DisconnectMessage,
	encodeRelayMessage,
	StatusMessage,
	TelemetryMessage
} from './relayMessages';
import { RELAY_CHANNELS, RelayTransport } from './relayTransport';

export type TelemetryVerdict =
	| 'applied'
	| 'superseded'
	| 'duplicate'
	| 'out-of-order'
	| 'latency-exceeded'
	| 'latency-unknown'
	| 'malformed'
	| 'apply-failed';

export type DropReason = Exclude<TelemetryVerdict, 'applied' | 'superseded'>;

export type LinkFreshness = 'waiting' | 'connected' | 'slow' | 'disconnected';

export interface FollowerStats {
	received: number;
	applied: number;
	superseded: number;
	dropped: Record<DropReason, number>;
	gaps: number;
	writeFailures: number;
	/** Motors skipped because their present position could not be read. */
	seedFailures: number;
	lastAppliedSequence: number | undefined;
	lastLatencyMs: number | undefined;
	updateRateHz: number;
	freshness: LinkFreshness;
}

export interface FollowerRelayClientOptions {
	followers: readonly DeviceChannel[];
	mapping: MappingTable;
	transport: RelayTransport;
	followerId: string;
	smoothing: number;
	maxStep: number;
	maxLatencyMs: number;
	clockSkewToleranceMs: number;
	latencyWarningRun: number;
	statusIntervalMs: number;
	durationMs?: number;
	logger?: Logger;
	now?: () => number;
}

interface MailboxEntry {
	message: TelemetryMessage;
	resolve: (verdict: TelemetryVerdict) => void;
}

function smootherKey(follower: DeviceChannel, motorId: number): string {
	return `${follower.label}:${motorId}`;
}

const CONNECTED_WITHIN_MS = 1_000;
const SLOW_WITHIN_MS = 5_000;

/**
 * Receives telemetry, drops stale or late messages, and drives the follower
 * arms toward the newest accepted positions through the smoother. Only one
 * message is applied at a time; a newer accepted message replaces one that
 * is still waiting.
 */
export class FollowerRelayClient {
	private readonly options: FollowerRelayClientOptions;
	private readonly logger: Logger;
	private readonly now: () => number;
	private readonly smoother: PositionSmoother;
	private readonly followersByLabel = new Map<ArmLabel, DeviceChannel>();
	private readonly abortController = new AbortController();
	private highestAccepted?: number;
	private currentLeaderId?: string;
	private pending?: MailboxEntry;
	private applying?: Promise<void>;
	private consecutiveLatencyDrops = 0;
	private firstAppliedAt?: number;
	private lastAppliedAt?: number;
	private lastReceivedAt?: number;
	private lastMappingRejected = false;
	private readonly stats: Omit<FollowerStats, 'updateRateHz' | 'freshness'> = {
		received: 0,
		applied: 0,
		superseded: 0,
		dropped: {
			duplicate: 0,
			'out-of-order': 0,
			'latency-exceeded': 0,
			'latency-unknown': 0,
			malformed: 0,
			'apply-failed': 0
		},
		gaps: 0,
		writeFailures: 0,
		seedFailures: 0,
		lastAppliedSequence: undefined,
		lastLatencyMs: undefined
	};

	public constructor(options: FollowerRelayClientOptions) {
		this.options = options;
		this.logger = options.logger ?? new NoopLogger();
		this.now = options.now ?? Date.now;
		const resolution = options.followers[0]?.resolution ?? 4096;
		this.smoother = new PositionSmoother({ alpha: options.smoothing, maxStep: options.maxStep, resolution });
		for (const follower of options.followers) {
			this.followersByLabel.set(follower.label, follower);
		}
	}

	public getStats(): FollowerStats {
		const span =
			this.firstAppliedAt !== undefined && this.lastAppliedAt !== undefined ? this.lastAppliedAt - this.firstAppliedAt : 0;
		return {
			...this.stats,
			dropped: { ...this.stats.dropped },
			updateRateHz: span > 0 ? Number((((this.stats.applied - 1) * 1000) / span).toFixed(2)) : 0,
			freshness: this.freshness(this.now())
		};
	}

	public stop(): void {
		this.abortController.abort();
	}

	/**
	 * Latency of a message in ms, or undefined when it cannot be estimated.
	 * A missing or implausibly early timestamp falls back to half the RTT the
	 * leader reported.
	 */
	public estimateLatency(message: TelemetryMessage, receivedAt: number): number | undefined {
		if (message.timestamp !== undefined) {
			const latency = receivedAt - message.timestamp;
			if (latency >= -this.options.clockSkewToleranceMs) {
				return Math.max(0, latency);
			}
		}
		return message.rttMs !== undefined ? message.rttMs / 2 : undefined;
	}

	/** Handles one payload from the telemetry channel. */
	public handlePayload(payload: string, receivedAt: number = this.now()): Promise<TelemetryVerdict> {
		const decoded = decodeRelayMessage(payload);
		if (!decoded.ok || decoded.message.type !== 'telemetry') {
			this.stats.received += 1;
			this.stats.dropped.malformed += 1;
			this.logger.debug('Dropping malformed telemetry', { reason: decoded.ok ? decoded.message.type : decoded.reason });
			return Promise.resolve('malformed');
		}
		return this.handleTelemetry(decoded.message, receivedAt);
	}

	/**
	 * Gates one telemetry message. Resolves once it has been applied, or with
	 * the reason it was not.
	 */
	public handleTelemetry(message: TelemetryMessage, receivedAt: number = this.now()): Promise<TelemetryVerdict> {
		this.stats.received += 1;
		this.lastReceivedAt = receivedAt;

		if (message.leaderId !== this.currentLeaderId) {
			if (this.currentLeaderId !== undefined) {
				this.logger.info('New leader session; resetting sequence tracking', {
					previous: this.currentLeaderId,
					leaderId: message.leaderId
				});
			}
			this.currentLeaderId = message.leaderId;
			this.highestAccepted = undefined;
		}

		if (this.highestAccepted !== undefined && message.sequence === this.highestAccepted) {
			return Promise.resolve(this.drop('duplicate', message));
		}
		this.publishAck(message, receivedAt);

		if (this.highestAccepted !== undefined && message.sequence < this.highestAccepted) {
			return Promise.resolve(this.drop('out-of-order', message));
		}

		const latency = this.estimateLatency(message, receivedAt);
		if (latency === undefined) {
			return Promise.resolve(this.drop('latency-unknown', message));
		}
		this.stats.lastLatencyMs = latency;
		if (latency > this.options.maxLatencyMs) {
			this.consecutiveLatencyDrops += 1;
			if (this.consecutiveLatencyDrops % this.options.latencyWarningRun === 0) {
				this.logger.warn('Dropping telemetry: latency over limit', {
					consecutive: this.consecutiveLatencyDrops,
					latencyMs: latency,
					maxLatencyMs: this.options.maxLatencyMs
				});
			}
			return Promise.resolve(this.drop('latency-exceeded', message));
		}
		this.consecutiveLatencyDrops = 0;

		if (this.highestAccepted !== undefined && message.sequence > this.highestAccepted + 1) {
			this.stats.gaps += message.sequence - this.highestAccepted - 1;
		}
		this.highestAccepted = message.sequence;

		return new Promise<TelemetryVerdict>((resolve) => {
			if (this.pending) {
				this.stats.superseded += 1;
				this.pending.resolve('superseded');
			}
			this.pending = { message, resolve };
			this.applying ??= this.drainMailbox();
		});
	}

	public publishStatus(): void {
		const status: StatusMessage = {
			type: 'status',
			role: 'follower',
			senderId: this.options.followerId,
			timestamp: this.now(),
			motorsActive: this.options.followers.reduce((sum, follower) => sum + follower.motorIds.length, 0),
			armsConnected: this.options.followers.length,
			counters: {
				received: this.stats.received,
				applied: this.stats.applied,
				dropped: Object.values(this.stats.dropped).reduce((a, b) => a + b, 0)
			}
		};
		this.options.transport.publish(RELAY_CHANNELS.status, encodeRelayMessage(status));
	}

	/**
	 * Enables torque, then serves telemetry until stopped or the duration ends.
	 */
	public async run(signal?: AbortSignal): Promise<FollowerStats> {
		const onExternalAbort = (): void => this.stop();
		signal?.addEventListener('abort', onExternalAbort, { once: true });
		if (signal?.aborted) {
			this.stop();
		}

		for (const follower of this.options.followers) {
			await enableTorque(follower, this.logger);
			for (const motorId of follower.motorIds) {
				await this.seedFromPresent(follower, motorId);
			}
		}

		const telemetry = this.options.transport.subscribe(RELAY_CHANNELS.telemetry, (payload) => {
			this.handlePayload(payload).catch((error: unknown) => {
				this.logger.error('Telemetry handling failed', { error: error instanceof Error ? error.message : String(error) });
			});
		});
		const status = this.options.transport.subscribe(RELAY_CHANNELS.status, (payload) => this.handleStatusPayload(payload));
		const statusTimer = setInterval(() => this.publishStatus(), this.options.statusIntervalMs);
		this.publishStatus();
		this.logger.info('Follower relay started', {
			followerId: this.options.followerId,
			arms: this.options.followers.map((follower) => follower.label),
			maxLatencyMs: this.options.maxLatencyMs
		});

		try {
			await abortableSleep(this.options.durationMs ?? Number.POSITIVE_INFINITY, this.abortController.signal);
		} finally {
			clearInterval(statusTimer);
			signal?.removeEventListener('abort', onExternalAbort);
			telemetry.unsubscribe();
			status.unsubscribe();
			await this.applying;
			const notice: DisconnectMessage = {
				type: 'disconnect',
				role: 'follower',
				senderId: this.options.followerId,
				timestamp: this.now()
			};
			this.options.transport.publish(RELAY_CHANNELS.status, encodeRelayMessage(notice));
		}

		const stats = this.getStats();
		this.logger.info('Follower relay stopped', { ...stats });
		return stats;
	}

	private handleStatusPayload(payload: string): void {
		const decoded = decodeRelayMessage(payload);
		if (!decoded.ok) {
			return;
		}
		const message = decoded.message;
		if (message.type === 'disconnect' && message.role === 'leader') {
			this.logger.warn('Leader announced disconnect; holding last position', { leaderId: message.senderId });
		}
	}

	private freshness(at: number): LinkFreshness {
		if (this.lastReceivedAt === undefined) {
			return 'waiting';
		}
		const age = at - this.lastReceivedAt;
		if (age < CONNECTED_WITHIN_MS) {
			return 'connected';
		}
		return age < SLOW_WITHIN_MS ? 'slow' : 'disconnected';
	}

	private drop(reason: DropReason, message: TelemetryMessage): TelemetryVerdict {
		this.stats.dropped[reason] += 1;
		this.logger.debug('Dropping telemetry', { reason, sequence: message.sequence, highest: this.highestAccepted });
		return reason;
	}

	private publishAck(message: TelemetryMessage, receivedAt: number): void {
		const ack: AckMessage = {
			type: 'ack',
			sequence: message.sequence,
			receivedAt,
			followerId: this.options.followerId
		};
		if (message.timestamp !== undefined) {
			ack.timestamp = message.timestamp;
		}
		this.options.transport.publish(RELAY_CHANNELS.status, encodeRelayMessage(ack));
	}

	private async drainMailbox(): Promise<void> {
		try {
			while (this.pending) {
				const entry = this.pending;
				this.pending = undefined;
				try {
					await this.apply(entry.message);
					entry.resolve('applied');
				} catch (error) {
					this.logger.error('Failed to apply telemetry', {
						sequence: entry.message.sequence,
						error: error instanceof Error ? error.message : String(error)
					});
					entry.resolve(this.drop('apply-failed', entry.message));
				}
			}
		} finally {
			this.applying = undefined;
		}
	}

	private resolveMapping(message: TelemetryMessage): MappingTable {
		if (!message.mapping) {
			return this.options.mapping;
		}
		const carried = MappingTable.fromRecord(message.mapping, [...this.followersByLabel.keys()]);
		if (carried) {
			this.lastMappingRejected = false;
			return carried;
		}
		if (!this.lastMappingRejected) {
			this.logger.warn('Ignoring invalid mapping from leader; using local mapping', { mapping: message.mapping });
			this.lastMappingRejected = true;
		}
		return this.options.mapping;
	}

	/**
	 * Starts smoothing a motor from where it stands. A motor whose position
	 * cannot be read is left uncommanded and retried with the next message.
	 */
	private async seedFromPresent(follower: DeviceChannel, motorId: number): Promise<boolean> {
		const key = smootherKey(follower, motorId);
		if (this.smoother.isSeeded(key)) {
			return true;
		}
		try {
			this.smoother.seed(key, await follower.readPosition(motorId));
			return true;
		} catch (error) {
			this.stats.seedFailures += 1;
			this.logger.warn('Cannot read follower position; holding motor until it answers', {
				arm: follower.label,
				port: follower.port,
				motorId,
				error: error instanceof Error ? error.message : String(error)
			});
			return false;
		}
	}

	private async apply(message: TelemetryMessage): Promise<void> {
		const mapping = this.resolveMapping(message);
		const writes: Promise<DeviceError[]>[] = [];
		for (const [leaderLabel, motors] of Object.entries(message.positions)) {
			const followerLabel = mapping.followerFor(leaderLabel);
			const follower = followerLabel === undefined ? undefined : this.followersByLabel.get(followerLabel);
			if (!follower) {
				continue;
			}
			const targets: PositionMap = new Map();
			for (const [key, raw] of Object.entries(motors)) {
				const motorId = Number(key);
				if (!follower.motorIds.includes(motorId) || !(await this.seedFromPresent(follower, motorId))) {
					continue;
				}
				targets.set(motorId, this.smoother.apply(smootherKey(follower, motorId), raw));
			}
			writes.push(writePositions(follower, targets));
		}
		for (const failures of await Promise.all(writes)) {
			this.stats.writeFailures += failures.length;
			for (const failure of failures) {
				this.logger.debug('Follower write failed', { port: failure.port, motorId: failure.motorId, code: failure.code });
			}
		}

		const at = this.now();
		this.firstAppliedAt ??= at;
		this.lastAppliedAt = at;
		this.stats.applied += 1;
		this.stats.lastAppliedSequence = message.sequence;
	}
}

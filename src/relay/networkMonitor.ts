import type { AckMessage } from './relayMessages';

export type PeerState = 'unknown' | 'connected' | 'disconnected';

export interface LatencySummary {
	count: number;
	minMs: number;
	maxMs: number;
	avgMs: number;
	medianMs: number;
}

export interface NetworkStats extends LatencySummary {
	sent: number;
	acked: number;
	/**
	 * Fraction of published messages never acknowledged, 0..1. Messages still
	 * inside the ack grace period are not counted either way.
	 */
	packetLoss: number;
	lastRttMs: number | undefined;
	publishRateHz: number;
}

export interface NetworkMonitorOptions {
	windowSize?: number;
	/** A peer with no status for this long is considered disconnected. */
	livenessWindowMs: number;
	/** Sequences awaiting an ack beyond this count are forgotten, oldest first. */
	maxPending?: number;
	/** An unacknowledged message counts as lost only once it is this old. */
	ackGraceMs?: number;
}

export function summarizeLatencies(samples: readonly number[]): LatencySummary {
	const sorted = [...samples].sort((a, b) => a - b);
	const count = sorted.length;
	if (count === 0) {
		return { count: 0, minMs: 0, maxMs: 0, avgMs: 0, medianMs: 0 };
	}
	const avgMs = Number((sorted.reduce((a, b) => a + b, 0) / count).toFixed(2));
	const medianMs =
		count % 2 === 1
			? sorted[Math.floor(count / 2)]
			: Number(((sorted[count / 2 - 1] + sorted[count / 2]) / 2).toFixed(2));
	return { count, minMs: sorted[0], maxMs: sorted[count - 1], avgMs, medianMs };
}

/**
 * Leader-side bookkeeping: send times per sequence, RTT from acks over a
 * sliding window, and freshness of the peer's status messages.
 */
export class NetworkMonitor {
	private readonly windowSize: number;
	private readonly livenessWindowMs: number;
	private readonly maxPending: number;
	private readonly ackGraceMs: number;
	private readonly sentAt = new Map<number, number>();
	private readonly latencies: number[] = [];
	private sent = 0;
	private acked = 0;
	private firstSentAt?: number;
	private lastSentAt?: number;
	private lastRttMs?: number;
	private lastPeerStatusAt?: number;
	private peerGone = false;

	public constructor(options: NetworkMonitorOptions) {
		this.windowSize = Math.max(1, options.windowSize ?? 100);
		this.livenessWindowMs = options.livenessWindowMs;
		this.maxPending = Math.max(1, options.maxPending ?? 1_000);
		this.ackGraceMs = Math.max(0, options.ackGraceMs ?? 1_000);
	}

	public messageSent(sequence: number, at: number): void {
		this.sent += 1;
		this.sentAt.set(sequence, at);
		this.firstSentAt ??= at;
		this.lastSentAt = at;
		while (this.sentAt.size > this.maxPending) {
			const oldest = this.sentAt.keys().next();
			if (oldest.done) {
				break;
			}
			this.sentAt.delete(oldest.value);
		}
	}

	/** Undoes messageSent for a message that never left. */
	public messageWithdrawn(sequence: number): void {
		if (this.sentAt.delete(sequence)) {
			this.sent -= 1;
		}
	}

	/**
	 * Returns the round-trip time for the acknowledged sequence, or undefined
	 * for an ack that matches nothing pending (duplicate or forgotten).
	 */
	public messageAcknowledged(ack: AckMessage, at: number): number | undefined {
		const sentAt = this.sentAt.get(ack.sequence);
		if (sentAt === undefined) {
			return undefined;
		}
		this.sentAt.delete(ack.sequence);
		this.acked += 1;
		const rtt = Math.max(0, at - sentAt);
		this.latencies.push(rtt);
		if (this.latencies.length > this.windowSize) {
			this.latencies.shift();
		}
		this.lastRttMs = rtt;
		return rtt;
	}

	public latestRttMs(): number | undefined {
		return this.lastRttMs;
	}

	public peerStatusReceived(at: number): void {
		this.lastPeerStatusAt = at;
		this.peerGone = false;
	}

	public peerDisconnected(): void {
		this.peerGone = true;
	}

	public peerState(at: number): PeerState {
		if (this.peerGone) {
			return 'disconnected';
		}
		if (this.lastPeerStatusAt === undefined) {
			return 'unknown';
		}
		return at - this.lastPeerStatusAt <= this.livenessWindowMs ? 'connected' : 'disconnected';
	}

	public getStats(at: number): NetworkStats {
		let awaiting = 0;
		for (const sentAt of this.sentAt.values()) {
			if (at - sentAt < this.ackGraceMs) {
				awaiting += 1;
			}
		}
		const settled = this.sent - awaiting;
		const span = this.firstSentAt !== undefined && this.lastSentAt !== undefined ? this.lastSentAt - this.firstSentAt : 0;
		return {
			...summarizeLatencies(this.latencies),
			sent: this.sent,
			acked: this.acked,
			packetLoss: settled > 0 ? 1 - this.acked / settled : 0,
			lastRttMs: this.lastRttMs,
			publishRateHz: span > 0 ? Number((((this.sent - 1) * 1000) / span).toFixed(2)) : 0
		};
	}
}

import type { RelayListener, RelaySubscription, RelayTransport } from './relayTransport';

/**
 * Shared in-process bus. Every transport attached to the same bus sees every
 * message published on a channel it subscribed to, including its own.
 */
export class InMemoryRelayBus {
	private readonly listeners = new Map<string, Set<RelayListener>>();
	private readonly published: Array<{ channel: string; payload: string }> = [];

	public deliver(channel: string, payload: string): void {
		this.published.push({ channel, payload });
		for (const listener of [...(this.listeners.get(channel) ?? [])]) {
			listener(payload);
		}
	}

	public add(channel: string, listener: RelayListener): () => void {
		let set = this.listeners.get(channel);
		if (!set) {
			set = new Set();
			this.listeners.set(channel, set);
		}
		set.add(listener);
		return () => {
			set?.delete(listener);
		};
	}

	public history(channel?: string): string[] {
		return this.published.filter((entry) => channel === undefined || entry.channel === channel).map((entry) => entry.payload);
	}
}

/**
 * Loopback transport for tests and single-host demos. Delivery is synchronous
 * when `deliverAsync` is off, which keeps test ordering deterministic.
 */
export class InMemoryRelayTransport implements RelayTransport {
	private readonly bus: InMemoryRelayBus;
	private readonly deliverAsync: boolean;
	private readonly removers = new Set<() => void>();
	private connected = false;

	public constructor(bus: InMemoryRelayBus = new InMemoryRelayBus(), options?: { deliverAsync?: boolean }) {
		this.bus = bus;
		this.deliverAsync = options?.deliverAsync ?? false;
	}

	public async connect(): Promise<void> {
		this.connected = true;
	}

	public async close(): Promise<void> {
		this.connected = false;
		for (const remove of this.removers) {
			remove();
		}
		this.removers.clear();
	}

	public isConnected(): boolean {
		return this.connected;
	}

	public publish(channel: string, payload: string): boolean {
		if (!this.connected) {
			return false;
		}
		if (this.deliverAsync) {
			queueMicrotask(() => this.bus.deliver(channel, payload));
		} else {
			this.bus.deliver(channel, payload);
		}
		return true;
	}

	public subscribe(channel: string, listener: RelayListener): RelaySubscription {
		const remove = this.bus.add(channel, listener);
		this.removers.add(remove);
		return {
			unsubscribe: () => {
				remove();
				this.removers.delete(remove);
			}
		};
	}
}

import { WebSocket } from 'ws';
import { Logger, NoopLogger } from '../diagnostics/logger';
import { abortableSleep } from '../scheduler/fixedRateLoop';
import { ClientFrame, parseHubFrame, rawDataToString } from './hubFrames';
import type { RelayListener, RelaySubscription, RelayTransport } from './relayTransport';

export interface WsRelayTransportOptions {
	url: string;
	reconnectDelayMs?: number;
	/** Attempts `connect` makes before rejecting; unlimited by default. */
	connectAttempts?: number;
	logger?: Logger;
}

const DEFAULT_RECONNECT_DELAY_MS = 2_000;

/**
 * Relay client over one WebSocket to a relay hub. Connecting and reconnecting
 * both retry after a fixed delay; after a reconnect every channel with
 * listeners is subscribed again.
 */
export class WsRelayTransport implements RelayTransport {
	private readonly url: string;
	private readonly reconnectDelayMs: number;
	private readonly connectAttempts: number;
	private readonly logger: Logger;
	private readonly listeners = new Map<string, Set<RelayListener>>();
	private socket?: WebSocket;
	private reconnectTimer?: NodeJS.Timeout;
	private closing = false;
	private reconnects = 0;

	public constructor(options: WsRelayTransportOptions) {
		this.url = options.url;
		this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
		this.connectAttempts = Math.max(1, options.connectAttempts ?? Number.POSITIVE_INFINITY);
		this.logger = options.logger ?? new NoopLogger();
	}

	public get reconnectCount(): number {
		return this.reconnects;
	}

	/**
	 * Opens the socket, retrying every `reconnectDelayMs` until it opens or the
	 * attempts run out. Resolves unconnected when the signal aborts or the
	 * transport is closed while waiting.
	 */
	public async connect(signal?: AbortSignal): Promise<void> {
		this.closing = false;
		for (let attempt = 1; ; attempt += 1) {
			try {
				await this.openSocket();
				return;
			} catch (error) {
				if (attempt >= this.connectAttempts) {
					throw error;
				}
				this.logger.warn('Relay not reachable; retrying', {
					url: this.url,
					attempt,
					delayMs: this.reconnectDelayMs,
					error: error instanceof Error ? error.message : String(error)
				});
			}
			await abortableSleep(this.reconnectDelayMs, signal);
			if (signal?.aborted || this.closing) {
				return;
			}
		}
	}

	public async close(): Promise<void> {
		this.closing = true;
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = undefined;
		}
		const socket = this.socket;
		this.socket = undefined;
		if (!socket || socket.readyState === WebSocket.CLOSED) {
			return;
		}
		await new Promise<void>((resolve) => {
			socket.once('close', () => resolve());
			socket.close();
		});
	}

	public isConnected(): boolean {
		return this.socket?.readyState === WebSocket.OPEN;
	}

	public publish(channel: string, payload: string): boolean {
		return this.sendFrame({ op: 'publish', channel, data: payload });
	}

	public subscribe(channel: string, listener: RelayListener): RelaySubscription {
		let set = this.listeners.get(channel);
		if (!set) {
			set = new Set();
			this.listeners.set(channel, set);
			this.sendFrame({ op: 'subscribe', channel });
		}
		set.add(listener);

		return {
			unsubscribe: () => {
				const current = this.listeners.get(channel);
				if (!current || !current.delete(listener) || current.size > 0) {
					return;
				}
				this.listeners.delete(channel);
				this.sendFrame({ op: 'unsubscribe', channel });
			}
		};
	}

	private sendFrame(frame: ClientFrame): boolean {
		const socket = this.socket;
		if (!socket || socket.readyState !== WebSocket.OPEN) {
			return false;
		}
		socket.send(JSON.stringify(frame));
		return true;
	}

	private openSocket(): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			const socket = new WebSocket(this.url);
			let opened = false;
			this.socket = socket;

			socket.on('open', () => {
				opened = true;
				this.logger.info('Relay connected', { url: this.url, reconnects: this.reconnects });
				for (const channel of this.listeners.keys()) {
					this.sendFrame({ op: 'subscribe', channel });
				}
				resolve();
			});

			socket.on('message', (data) => {
				const frame = parseHubFrame(rawDataToString(data));
				if (!frame) {
					this.logger.debug('Ignoring malformed relay frame');
					return;
				}
				for (const listener of [...(this.listeners.get(frame.channel) ?? [])]) {
					listener(frame.data);
				}
			});

			socket.on('error', (error) => {
				this.logger.warn('Relay socket error', { url: this.url, error: error.message });
				if (!opened) {
					reject(error);
				}
			});

			socket.on('close', () => {
				if (this.socket !== socket) {
					return;
				}
				this.socket = undefined;
				if (!opened || this.closing) {
					return;
				}
				this.logger.warn('Relay connection lost; reconnecting', { url: this.url, delayMs: this.reconnectDelayMs });
				this.scheduleReconnect();
			});
		});
	}

	private scheduleReconnect(): void {
		if (this.closing || this.reconnectTimer) {
			return;
		}
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = undefined;
			if (this.closing) {
				return;
			}
			this.reconnects += 1;
			this.openSocket().catch((error: unknown) => {
				this.logger.debug('Relay reconnect attempt failed', {
					error: error instanceof Error ? error.message : String(error)
				});
				this.scheduleReconnect();
			});
		}, this.reconnectDelayMs);
	}
}

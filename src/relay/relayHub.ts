import { WebSocket, WebSocketServer } from 'ws';
import { Logger, NoopLogger } from '../diagnostics/logger';
import { HubMessageFrame, parseClientFrame, rawDataToString } from './hubFrames';

export interface RelayHubOptions {
	port: number;
	host?: string;
	logger?: Logger;
}

export interface RelayHubStats {
	clients: number;
	published: number;
	delivered: number;
	rejectedFrames: number;
}

/**
 * Minimal publish/subscribe hub: every published frame is forwarded to each
 * client subscribed to its channel, sender included.
 */
export class RelayHub {
	private readonly options: RelayHubOptions;
	private readonly logger: Logger;
	private readonly subscriptions = new Map<WebSocket, Set<string>>();
	private server?: WebSocketServer;
	private published = 0;
	private delivered = 0;
	private rejectedFrames = 0;

	public constructor(options: RelayHubOptions) {
		this.options = options;
		this.logger = options.logger ?? new NoopLogger();
	}

	/** Starts listening; resolves with the bound port (useful with port 0). */
	public start(): Promise<number> {
		if (this.server) {
			return Promise.reject(new Error('Relay hub is already running.'));
		}
		return new Promise<number>((resolve, reject) => {
			const server = new WebSocketServer({ port: this.options.port, host: this.options.host });
			this.server = server;

			server.once('error', reject);
			server.once('listening', () => {
				server.off('error', reject);
				server.on('error', (error) => this.logger.error('Relay hub error', { error: error.message }));
				const address = server.address();
				const port = typeof address === 'object' && address !== null ? address.port : this.options.port;
				this.logger.info('Relay hub listening', { host: this.options.host ?? '0.0.0.0', port });
				resolve(port);
			});
			server.on('connection', (socket, request) => this.accept(socket, request.socket.remoteAddress));
		});
	}

	public async stop(): Promise<void> {
		const server = this.server;
		this.server = undefined;
		if (!server) {
			return;
		}
		for (const socket of this.subscriptions.keys()) {
			socket.terminate();
		}
		this.subscriptions.clear();
		await new Promise<void>((resolve, reject) => {
			server.close((error) => (error ? reject(error) : resolve()));
		});
		this.logger.info('Relay hub stopped', { ...this.getStats() });
	}

	public getStats(): RelayHubStats {
		return {
			clients: this.subscriptions.size,
			published: this.published,
			delivered: this.delivered,
			rejectedFrames: this.rejectedFrames
		};
	}

	private accept(socket: WebSocket, remoteAddress: string | undefined): void {
		const channels = new Set<string>();
		this.subscriptions.set(socket, channels);
		this.logger.info('Relay client connected', { remoteAddress, clients: this.subscriptions.size });

		socket.on('message', (data) => {
			const frame = parseClientFrame(rawDataToString(data));
			if (!frame) {
				this.rejectedFrames += 1;
				this.logger.debug('Rejected malformed client frame', { remoteAddress });
				return;
			}
			switch (frame.op) {
				case 'subscribe':
					channels.add(frame.channel);
					break;
				case 'unsubscribe':
					channels.delete(frame.channel);
					break;
				case 'publish':
					this.broadcast({ op: 'message', channel: frame.channel, data: frame.data });
					break;
			}
		});
		socket.on('close', () => {
			this.subscriptions.delete(socket);
			this.logger.info('Relay client disconnected', { remoteAddress, clients: this.subscriptions.size });
		});
		socket.on('error', (error) => {
			this.logger.warn('Relay client socket error', { remoteAddress, error: error.message });
		});
	}

	private broadcast(frame: HubMessageFrame): void {
		this.published += 1;
		const payload = JSON.stringify(frame);
		for (const [client, channels] of this.subscriptions) {
			if (channels.has(frame.channel) && client.readyState === WebSocket.OPEN) {
				client.send(payload);
				this.delivered += 1;
			}
		}
	}
}

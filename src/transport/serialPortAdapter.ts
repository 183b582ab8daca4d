import { extractStatusPacket } from '../protocol/feetechPacket';
import { TransportAdapter, TransportRequestOptions } from './transportAdapter';

export interface SerialPortLike {
	open(callback: (error: Error | null) => void): void;
	close(callback: (error: Error | null) => void): void;
	write(data: Buffer, callback: (error: Error | null | undefined) => void): void;
	onData(listener: (chunk: Buffer) => void): void;
	onError(listener: (error: Error) => void): void;
	onClose(listener: () => void): void;
	removeAllListeners(): void;
}

export interface SerialPortOpenOptions {
	path: string;
	baudRate: number;
}

export type SerialPortFactory = (options: SerialPortOpenOptions) => Promise<SerialPortLike>;

interface PendingReply {
	resolve: (packet: Uint8Array) => void;
	reject: (error: unknown) => void;
	cleanup: () => void;
	expectedId?: number;
}

export interface SerialPortAdapterOptions {
	port: string;
	baudRate?: number;
	portFactory?: SerialPortFactory;
	onNoise?: (discardedBytes: number) => void;
}

export const DEFAULT_BAUD_RATE = 1_000_000;

/**
 * Opens a real serial port through the `serialport` package. Loaded lazily so
 * that code paths which never touch hardware do not load the native binding.
 */
export const openNodeSerialPort: SerialPortFactory = async (options) => {
	let SerialPort: typeof import('serialport').SerialPort;
	try {
		({ SerialPort } = await import('serialport'));
	} catch (error) {
		const detail = error instanceof Error ? error.message : String(error);
		throw new Error(`Serial transport requires package "serialport". (${detail})`);
	}

	const port = new SerialPort({ path: options.path, baudRate: options.baudRate, autoOpen: false });
	return {
		open: (callback) => port.open(callback),
		close: (callback) => port.close(callback),
		write: (data, callback) => {
			port.write(data, callback);
		},
		onData: (listener) => {
			port.on('data', listener);
		},
		onError: (listener) => {
			port.on('error', listener);
		},
		onClose: (listener) => {
			port.on('close', listener);
		},
		removeAllListeners: () => {
			port.removeAllListeners();
		}
	};
};

export class SerialPortAdapter implements TransportAdapter {
	private readonly portPath: string;
	private readonly baudRate: number;
	private readonly portFactory: SerialPortFactory;
	private readonly onNoise?: (discardedBytes: number) => void;

	private port?: SerialPortLike;
	private opening?: Promise<void>;
	private opened = false;
	private closing = false;
	private receiveBuffer: Buffer = Buffer.alloc(0);
	private pendingReply?: PendingReply;

	public constructor(options: SerialPortAdapterOptions) {
		this.portPath = options.port;
		this.baudRate = options.baudRate ?? DEFAULT_BAUD_RATE;
		this.portFactory = options.portFactory ?? openNodeSerialPort;
		this.onNoise = options.onNoise;
	}

	public get path(): string {
		return this.portPath;
	}

	public async open(): Promise<void> {
		if (this.opened) {
			return;
		}

		if (!this.portPath) {
			throw new Error('Serial transport requires non-empty port path (for example /dev/ttyUSB0 or COM5).');
		}

		if (this.opening) {
			return this.opening;
		}

		this.opening = this.openInternal().finally(() => {
			this.opening = undefined;
		});

		return this.opening;
	}

	public async close(): Promise<void> {
		this.opened = false;
		this.closing = true;
		this.rejectPendingReply(new Error('Serial transport closed while waiting for reply.'));
		this.receiveBuffer = Buffer.alloc(0);

		const port = this.port;
		this.port = undefined;
		if (!port) {
			this.closing = false;
			return;
		}

		await new Promise<void>((resolve) => {
			port.close(() => resolve());
		});
		port.removeAllListeners();
		this.closing = false;
	}

	public async send(packet: Uint8Array, options: TransportRequestOptions): Promise<Uint8Array> {
		const port = this.requirePort();
		if (this.pendingReply) {
			throw new Error('Serial transport already has an in-flight request.');
		}

		if (options.signal.aborted) {
			throw new Error('Serial send aborted before dispatch.');
		}

		// Half-duplex bus: anything still buffered belongs to an earlier, abandoned request.
		this.receiveBuffer = Buffer.alloc(0);

		if (options.expectReply === false) {
			await new Promise<void>((resolve, reject) => {
				port.write(Buffer.from(packet), (error) => (error ? reject(error) : resolve()));
			});
			return new Uint8Array();
		}

		return new Promise<Uint8Array>((resolve, reject) => {
			const onAbort = () => {
				this.rejectPendingReply(new Error('Serial send aborted.'));
			};
			const cleanup = () => options.signal.removeEventListener('abort', onAbort);
			options.signal.addEventListener('abort', onAbort, { once: true });

			this.pendingReply = {
				resolve,
				reject,
				cleanup,
				expectedId: options.expectedId
			};

			port.write(Buffer.from(packet), (error) => {
				if (error) {
					this.rejectPendingReply(error);
					return;
				}
				this.drainPendingReply();
			});
		});
	}

	private async openInternal(): Promise<void> {
		const port = await this.portFactory({ path: this.portPath, baudRate: this.baudRate });

		await new Promise<void>((resolve, reject) => {
			port.open((error) => {
				if (error) {
					reject(error);
					return;
				}
				resolve();
			});
		});

		this.port = port;
		this.receiveBuffer = Buffer.alloc(0);
		this.opened = true;

		port.onData((chunk) => {
			this.receiveBuffer = Buffer.concat([this.receiveBuffer, chunk]);
			this.drainPendingReply();
		});
		port.onError((error) => this.handleFailure(error));
		port.onClose(() => this.handleFailure(new Error('Serial port closed.')));
	}

	private extractNextPacket(): Uint8Array | undefined {
		const extracted = extractStatusPacket(this.receiveBuffer);
		if (!extracted) {
			return undefined;
		}
		this.receiveBuffer = extracted.remaining;
		if (extracted.discarded > 0) {
			this.onNoise?.(extracted.discarded);
		}
		return extracted.packet;
	}

	private drainPendingReply(): void {
		if (!this.pendingReply) {
			return;
		}

		let packet = this.extractNextPacket();
		while (packet) {
			const expected = this.pendingReply?.expectedId;
			if (expected === undefined || packet[2] === expected) {
				const pending = this.pendingReply;
				this.pendingReply = undefined;
				pending.cleanup();
				pending.resolve(packet);
				return;
			}
			packet = this.extractNextPacket();
		}
	}

	private rejectPendingReply(error: unknown): void {
		if (!this.pendingReply) {
			return;
		}

		const pending = this.pendingReply;
		this.pendingReply = undefined;
		pending.cleanup();
		pending.reject(error);
	}

	private handleFailure(error: unknown): void {
		if (this.closing) {
			return;
		}

		this.opened = false;
		this.rejectPendingReply(error);
	}

	private requirePort(): SerialPortLike {
		if (!this.port || !this.opened) {
			throw new Error('Serial transport is not open.');
		}

		return this.port;
	}
}

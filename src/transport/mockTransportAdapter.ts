import { TransportAdapter, TransportRequestOptions } from './transportAdapter';

/**
 * Answers one instruction packet. `undefined` means no motor answered; the
 * request then stays pending until the caller's timeout aborts it.
 */
export type MockBusResponder = (
	packet: Uint8Array,
	options: TransportRequestOptions
) => Promise<Uint8Array | undefined> | Uint8Array | undefined;

export interface MockBusRequest {
	packet: Uint8Array;
	expectedId?: number;
	expectReply: boolean;
}

/**
 * In-process stand-in for a serial motor bus.
 */
export class MockTransportAdapter implements TransportAdapter {
	public readonly requests: MockBusRequest[] = [];

	private opened = false;
	private readonly responder: MockBusResponder;

	public constructor(responder: MockBusResponder) {
		this.responder = responder;
	}

	public get sentPackets(): Uint8Array[] {
		return this.requests.map((request) => request.packet);
	}

	public async open(): Promise<void> {
		this.opened = true;
	}

	public async close(): Promise<void> {
		this.opened = false;
	}

	public async send(packet: Uint8Array, options: TransportRequestOptions): Promise<Uint8Array> {
		if (!this.opened) {
			throw new Error('Mock bus is not open.');
		}
		if (options.signal.aborted) {
			throw new Error('Mock bus request aborted before dispatch.');
		}

		const expectReply = options.expectReply !== false;
		const packetCopy = packet.slice();
		this.requests.push({ packet: packetCopy, expectedId: options.expectedId, expectReply });

		const reply = await this.responder(packetCopy, options);
		if (!expectReply) {
			return new Uint8Array(0);
		}
		if (reply !== undefined) {
			return reply;
		}
		return this.waitForAbort(options.signal);
	}

	private waitForAbort(signal: AbortSignal): Promise<Uint8Array> {
		return new Promise<Uint8Array>((_, reject) => {
			const onAbort = () => reject(new Error('Mock bus request aborted: no motor answered.'));
			if (signal.aborted) {
				onAbort();
				return;
			}
			signal.addEventListener('abort', onAbort, { once: true });
		});
	}
}

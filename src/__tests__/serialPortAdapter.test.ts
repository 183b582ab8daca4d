import assert from 'node:assert/strict';
import test from 'node:test';
import { encodePing } from '../protocol/feetechPacket';
import { SerialPortAdapter, SerialPortLike } from '../transport/serialPortAdapter';
import { encodeStatusPacket } from './testHelpers';

class FakeSerialPort implements SerialPortLike {
	public readonly written: Buffer[] = [];
	public replyTo?: (data: Buffer) => Buffer[];
	private dataListeners: Array<(chunk: Buffer) => void> = [];
	private errorListeners: Array<(error: Error) => void> = [];
	private closeListeners: Array<() => void> = [];

	public open(callback: (error: Error | null) => void): void {
		callback(null);
	}

	public close(callback: (error: Error | null) => void): void {
		callback(null);
	}

	public write(data: Buffer, callback: (error: Error | null | undefined) => void): void {
		this.written.push(data);
		callback(undefined);
		const chunks = this.replyTo?.(data) ?? [];
		setTimeout(() => {
			for (const chunk of chunks) {
				this.emitData(chunk);
			}
		}, 0);
	}

	public onData(listener: (chunk: Buffer) => void): void {
		this.dataListeners.push(listener);
	}

	public onError(listener: (error: Error) => void): void {
		this.errorListeners.push(listener);
	}

	public onClose(listener: () => void): void {
		this.closeListeners.push(listener);
	}

	public removeAllListeners(): void {
		this.dataListeners = [];
		this.errorListeners = [];
		this.closeListeners = [];
	}

	public emitData(chunk: Buffer): void {
		for (const listener of this.dataListeners) {
			listener(chunk);
		}
	}

	public emitClose(): void {
		for (const listener of this.closeListeners) {
			listener();
		}
	}
}

function createAdapter(port: FakeSerialPort, onNoise?: (bytes: number) => void): SerialPortAdapter {
	return new SerialPortAdapter({ port: '/dev/ttyUSB0', portFactory: async () => port, onNoise });
}

test('SerialPortAdapter returns the reply for the expected motor id', async () => {
	const port = new FakeSerialPort();
	port.replyTo = () => [Buffer.from(encodeStatusPacket(1, 0))];
	const adapter = createAdapter(port);
	await adapter.open();

	const reply = await adapter.send(encodePing(1), {
		timeoutMs: 100,
		signal: new AbortController().signal,
		expectedId: 1
	});

	assert.deepEqual([...reply], [...encodeStatusPacket(1, 0)]);
	assert.deepEqual([...port.written[0]], [...encodePing(1)]);
	await adapter.close();
});

test('SerialPortAdapter reassembles a reply split across chunks and reports noise', async () => {
	const port = new FakeSerialPort();
	const status = Buffer.from(encodeStatusPacket(2, 0, [0x00, 0x08]));
	port.replyTo = () => [Buffer.from([0x00]), status.subarray(0, 3), status.subarray(3)];
	const noise: number[] = [];
	const adapter = createAdapter(port, (bytes) => noise.push(bytes));
	await adapter.open();

	const reply = await adapter.send(encodePing(2), { timeoutMs: 100, signal: new AbortController().signal, expectedId: 2 });

	assert.deepEqual([...reply], [...status]);
	assert.deepEqual(noise, [1]);
	await adapter.close();
});

test('SerialPortAdapter skips replies from other motor ids', async () => {
	const port = new FakeSerialPort();
	port.replyTo = () => [Buffer.from(encodeStatusPacket(4, 0)), Buffer.from(encodeStatusPacket(3, 0))];
	const adapter = createAdapter(port);
	await adapter.open();

	const reply = await adapter.send(encodePing(3), { timeoutMs: 100, signal: new AbortController().signal, expectedId: 3 });

	assert.equal(reply[2], 3);
	await adapter.close();
});

test('SerialPortAdapter rejects the pending reply on abort', async () => {
	const port = new FakeSerialPort();
	const adapter = createAdapter(port);
	await adapter.open();
	const controller = new AbortController();

	const pending = adapter.send(encodePing(5), { timeoutMs: 100, signal: controller.signal, expectedId: 5 });
	controller.abort();

	await assert.rejects(pending, /aborted/);
	await adapter.close();
});

test('SerialPortAdapter fails the in-flight request when the port closes', async () => {
	const port = new FakeSerialPort();
	const adapter = createAdapter(port);
	await adapter.open();

	const pending = adapter.send(encodePing(1), { timeoutMs: 100, signal: new AbortController().signal, expectedId: 1 });
	port.emitClose();

	await assert.rejects(pending, /Serial port closed/);
	await assert.rejects(
		adapter.send(encodePing(1), { timeoutMs: 100, signal: new AbortController().signal }),
		/not open/
	);
});

test('SerialPortAdapter write-only sends resolve without waiting for a reply', async () => {
	const port = new FakeSerialPort();
	const adapter = createAdapter(port);
	await adapter.open();

	const reply = await adapter.send(encodePing(0xfe), {
		timeoutMs: 100,
		signal: new AbortController().signal,
		expectReply: false
	});

	assert.equal(reply.length, 0);
	assert.equal(port.written.length, 1);
	await adapter.close();
});

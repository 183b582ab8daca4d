import assert from 'node:assert/strict';
import test from 'node:test';
import { FeetechMotorChannel } from '../device/motorChannel';
import { DeviceError } from '../errors/DeviceError';
import { MockTransportAdapter } from '../transport/mockTransportAdapter';
import { FeetechBusSimulator } from './testHelpers';

function createChannel(simulator: FeetechBusSimulator, motorIds: number[] = [1, 2]) {
	const transport = new MockTransportAdapter(simulator.respond);
	const channel = new FeetechMotorChannel({ port: '/dev/ttyACM0', motorIds, transport, timeoutMs: 20 });
	return { channel, transport };
}

function hasCode(code: string) {
	return (error: unknown) => error instanceof DeviceError && error.code === code;
}

test('FeetechMotorChannel reads positions and voltage from register memory', async () => {
	const simulator = new FeetechBusSimulator([1, 2]);
	simulator.setRegister(1, 'Present_Position', 3000);
	simulator.setRegister(2, 'Present_Voltage', 121);
	const { channel } = createChannel(simulator);
	await channel.open();

	assert.equal(await channel.readPosition(1), 3000);
	assert.equal(await channel.readVoltage(2), 12.1);
	await channel.close();
});

test('FeetechMotorChannel writes goal positions little-endian', async () => {
	const simulator = new FeetechBusSimulator([1]);
	const { channel, transport } = createChannel(simulator, [1]);
	await channel.open();

	await channel.writePosition(1, 2048);

	assert.equal(simulator.getRegister(1, 'Goal_Position'), 2048);
	assert.deepEqual(simulator.writes, [{ id: 1, address: 42, data: [0x00, 0x08] }]);
	assert.deepEqual([...transport.sentPackets[0]], [0xff, 0xff, 0x01, 0x05, 0x03, 0x2a, 0x00, 0x08, 0xc4]);
	await channel.close();
});

test('FeetechMotorChannel ping reports a silent motor as absent', async () => {
	const simulator = new FeetechBusSimulator([1]);
	const { channel } = createChannel(simulator, [1, 2]);
	await channel.open();

	assert.equal(await channel.ping(1), true);
	assert.equal(await channel.ping(2), false);
	await channel.close();
});

test('FeetechMotorChannel maps a timeout to DEVICE_UNRESPONSIVE for that motor only', async () => {
	const simulator = new FeetechBusSimulator([1]);
	simulator.setRegister(1, 'Present_Position', 100);
	const { channel } = createChannel(simulator, [1, 2]);
	await channel.open();

	await assert.rejects(channel.readPosition(2), (error: unknown) => {
		return error instanceof DeviceError && error.code === 'DEVICE_UNRESPONSIVE' && error.motorId === 2;
	});
	assert.equal(await channel.readPosition(1), 100);
	await channel.close();
});

test('FeetechMotorChannel reports a bad checksum as CORRUPT_PACKET', async () => {
	const transport = new MockTransportAdapter(() => new Uint8Array([0xff, 0xff, 0x01, 0x04, 0x00, 0x00, 0x08, 0x00]));
	const channel = new FeetechMotorChannel({ port: '/dev/ttyACM0', motorIds: [1], transport });
	await channel.open();

	await assert.rejects(channel.readPosition(1), hasCode('CORRUPT_PACKET'));
	await channel.close();
});

test('FeetechMotorChannel rejects out-of-range arguments before touching the bus', async () => {
	const simulator = new FeetechBusSimulator([1]);
	const { channel, transport } = createChannel(simulator, [1]);
	await channel.open();

	await assert.rejects(channel.writePosition(1, 4096), hasCode('INVALID_ARGUMENT'));
	await assert.rejects(channel.writePosition(1, -1), hasCode('INVALID_ARGUMENT'));
	await assert.rejects(channel.setRegister(1, 'Lock', 256), hasCode('INVALID_ARGUMENT'));
	assert.equal(transport.sentPackets.length, 0);
	assert.throws(
		() => new FeetechMotorChannel({ port: 'x', motorIds: [254], transport }),
		hasCode('INVALID_ARGUMENT')
	);
	await channel.close();
});

test('FeetechMotorChannel refuses commands while closed', async () => {
	const simulator = new FeetechBusSimulator([1]);
	const { channel } = createChannel(simulator, [1]);

	assert.equal(channel.isOpen(), false);
	await assert.rejects(channel.readPosition(1), hasCode('TRANSPORT_CLOSED'));
});

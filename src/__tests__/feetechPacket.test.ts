import assert from 'node:assert/strict';
import test from 'node:test';
import {
	decodeStatusPacket,
	decodeUint,
	describeStatusError,
	encodeInstructionPacket,
	encodePing,
	encodeRead,
	encodeUint,
	encodeWrite,
	extractStatusPacket,
	FEETECH_INSTRUCTION
} from '../protocol/feetechPacket';
import { encodeStatusPacket } from './testHelpers';

test('encodePing frames id, length, instruction and checksum', () => {
	assert.deepEqual([...encodePing(1)], [0xff, 0xff, 0x01, 0x02, 0x01, 0xfb]);
});

test('encodeRead carries address and byte count', () => {
	assert.deepEqual([...encodeRead(1, 56, 2)], [0xff, 0xff, 0x01, 0x04, 0x02, 0x38, 0x02, 0xbe]);
});

test('encodeWrite writes little-endian words', () => {
	assert.deepEqual([...encodeWrite(3, 42, encodeUint(2048, 2))], [0xff, 0xff, 0x03, 0x05, 0x03, 0x2a, 0x00, 0x08, 0xc2]);
});

test('encodeInstructionPacket rejects ids above broadcast', () => {
	assert.throws(() => encodeInstructionPacket(0xff, FEETECH_INSTRUCTION.PING), /Invalid Feetech motor id 255/);
	assert.throws(() => encodeInstructionPacket(-1, FEETECH_INSTRUCTION.PING), /Invalid Feetech motor id/);
});

test('encodeUint and decodeUint are little-endian', () => {
	assert.deepEqual([...encodeUint(0x1234, 2)], [0x34, 0x12]);
	assert.deepEqual([...encodeUint(0x1ff, 1)], [0xff]);
	assert.equal(decodeUint(new Uint8Array([0x00, 0x08]), 2), 2048);
	assert.equal(decodeUint(new Uint8Array([0x7c]), 1), 124);
	assert.throws(() => decodeUint(new Uint8Array([0x01]), 2), /too short/);
});

test('decodeStatusPacket returns id, error byte and params', () => {
	const decoded = decodeStatusPacket(encodeStatusPacket(1, 0x20, [0x00, 0x08]));
	assert.equal(decoded.id, 1);
	assert.equal(decoded.error, 0x20);
	assert.deepEqual([...decoded.params], [0x00, 0x08]);
});

test('decodeStatusPacket rejects a bad checksum', () => {
	const packet = encodeStatusPacket(1, 0, [0x10]);
	packet[packet.length - 1] ^= 0xff;
	assert.throws(() => decodeStatusPacket(packet), /checksum/);
});

test('decodeStatusPacket rejects a length mismatch and a missing header', () => {
	const packet = encodeStatusPacket(1, 0, [0x10, 0x20]);
	assert.throws(() => decodeStatusPacket(packet.subarray(0, packet.length - 1)), /length/);
	const noHeader = packet.slice();
	noHeader[0] = 0x00;
	assert.throws(() => decodeStatusPacket(noHeader), /header/);
});

test('describeStatusError lists every set flag', () => {
	assert.deepEqual(describeStatusError(0x21), ['voltage', 'overload']);
	assert.deepEqual(describeStatusError(0), []);
});

test('extractStatusPacket skips line noise and keeps the tail', () => {
	const packet = encodeStatusPacket(2, 0, [0x05]);
	const buffer = Buffer.from([0x00, 0x12, ...packet, 0xff, 0xff]);
	const extracted = extractStatusPacket(buffer);
	assert.ok(extracted);
	assert.equal(extracted.discarded, 2);
	assert.deepEqual([...extracted.packet], [...packet]);
	assert.deepEqual([...extracted.remaining], [0xff, 0xff]);
});

test('extractStatusPacket treats a third 0xFF as noise', () => {
	const buffer = Buffer.from([0xff, 0xff, 0xff, 0x01, 0x02, 0x00, 0xfc]);
	const extracted = extractStatusPacket(buffer);
	assert.ok(extracted);
	assert.equal(extracted.discarded, 1);
	assert.deepEqual([...extracted.packet], [0xff, 0xff, 0x01, 0x02, 0x00, 0xfc]);
	assert.equal(extracted.remaining.length, 0);
});

test('extractStatusPacket waits for a complete packet', () => {
	assert.equal(extractStatusPacket(Buffer.from([0xff, 0xff, 0x01])), undefined);
	assert.equal(extractStatusPacket(Buffer.from([0xff, 0xff, 0x01, 0x04, 0x00, 0x01])), undefined);
});

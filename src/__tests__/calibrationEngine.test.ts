import assert from 'node:assert/strict';
import test from 'node:test';
import { calibrate } from '../device/calibrationEngine';
import { CalibrationAbortedError } from '../errors/sessionErrors';
import { FakeChannel } from './testHelpers';

const NOW_MS = 1_700_000_000_000;

function lastWrite(channel: FakeChannel, motorId: number, name: string): number | undefined {
	const writes = channel.registerWrites.filter((entry) => entry.motorId === motorId && entry.name === name);
	return writes[writes.length - 1]?.value;
}

test('calibrate stores raw minus middle tick for every motor', async () => {
	const channel = new FakeChannel({
		port: '/dev/ttyACM0',
		motorIds: [1, 2, 3],
		positions: { 1: 3000, 2: 1000, 3: 2048 }
	});

	const result = await calibrate({ channel, role: 'follower', confirm: async () => true, now: () => NOW_MS, voltage: 12.1 });

	assert.equal(result.complete, true);
	assert.deepEqual(result.failures, []);
	assert.deepEqual(result.record, {
		motorIds: [1, 2, 3],
		homingOffsets: { '1': 952, '2': -1048, '3': 0 },
		resolution: 4096,
		timestamp: 1_700_000_000,
		role: 'follower',
		port: '/dev/ttyACM0',
		voltage: 12.1
	});
	assert.equal(lastWrite(channel, 1, 'Homing_Offset'), 952);
	assert.equal(lastWrite(channel, 2, 'Homing_Offset'), 1048 | 2048);
	assert.equal(lastWrite(channel, 1, 'Phase'), 76);
	assert.equal(lastWrite(channel, 1, 'Max_Position_Limit'), 4095);
});

test('calibrate writes the leader phase constant', async () => {
	const channel = new FakeChannel({ port: '/dev/ttyACM1', motorIds: [1], voltage: 5 });

	await calibrate({ channel, role: 'leader', confirm: async () => true });

	assert.equal(lastWrite(channel, 1, 'Phase'), 12);
});

test('calibrate gives the same offsets when run twice on an unmoved arm', async () => {
	const channel = new FakeChannel({ port: '/dev/ttyACM0', motorIds: [1, 2], positions: { 1: 2500, 2: 1500 } });

	const first = await calibrate({ channel, role: 'follower', confirm: async () => true });
	const second = await calibrate({ channel, role: 'follower', confirm: async () => true });

	assert.deepEqual(second.record.homingOffsets, first.record.homingOffsets);
	assert.deepEqual(first.record.homingOffsets, { '1': 452, '2': -548 });
});

test('calibrate excludes unresponsive motors and reports the result incomplete', async () => {
	const channel = new FakeChannel({ port: '/dev/ttyACM0', motorIds: [1, 2, 3] });
	channel.failing.add(2);

	const result = await calibrate({ channel, role: 'follower', confirm: async () => true });

	assert.equal(result.complete, false);
	assert.deepEqual(result.record.motorIds, [1, 3]);
	assert.deepEqual(result.record.homingOffsets, { '1': 0, '3': 0 });
	assert.deepEqual(result.failures, [{ motorId: 2, step: 'ping', error: 'no reply' }]);
	assert.equal(lastWrite(channel, 2, 'Homing_Offset'), undefined);
});

test('calibrate throws when the operator cancels', async () => {
	const channel = new FakeChannel({ port: '/dev/ttyACM0', motorIds: [1], label: 'Follower1' });

	await assert.rejects(
		calibrate({ channel, role: 'follower', confirm: async () => false }),
		(error: unknown) =>
			error instanceof CalibrationAbortedError && error.message === 'Calibration of Follower1 was cancelled by the operator.'
	);
	assert.equal(lastWrite(channel, 1, 'Homing_Offset'), 0);
});

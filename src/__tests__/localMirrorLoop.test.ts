import assert from 'node:assert/strict';
import test from 'node:test';
import { LocalMirrorLoop } from '../mirror/localMirrorLoop';
import { MappingTable } from '../mirror/mappingTable';
import { PositionDisplay } from '../mirror/positionDisplay';
import { FakeChannel } from './testHelpers';

function createArms() {
	const leaders = [
		new FakeChannel({ port: '/dev/ttyACM0', motorIds: [1, 2], voltage: 5, label: 'Leader1', positions: { 1: 1000, 2: 1100 } }),
		new FakeChannel({ port: '/dev/ttyACM1', motorIds: [1, 2], voltage: 5, label: 'Leader2', positions: { 1: 3000, 2: 3100 } })
	];
	const followers = [
		new FakeChannel({ port: '/dev/ttyACM2', motorIds: [1, 2], label: 'Follower1' }),
		new FakeChannel({ port: '/dev/ttyACM3', motorIds: [1, 2], label: 'Follower2' })
	];
	const mapping = MappingTable.identity(['Leader1', 'Leader2'], ['Follower1', 'Follower2']);
	return { leaders, followers, mapping };
}

const immediate = async (): Promise<void> => undefined;

test('LocalMirrorLoop copies leader positions to the mapped follower each cycle', async () => {
	const { leaders, followers, mapping } = createArms();
	const loop = new LocalMirrorLoop({ leaders, followers, mapping, fps: 60, maxCycles: 2, sleep: immediate });

	const result = await loop.run();

	assert.equal(result.stopReason, 'max-cycles');
	assert.equal(result.cycles, 2);
	assert.deepEqual(followers[0].goalWrites, [
		{ motorId: 1, value: 1000 },
		{ motorId: 2, value: 1100 },
		{ motorId: 1, value: 1000 },
		{ motorId: 2, value: 1100 }
	]);
	assert.equal(followers[1].getRegisterValue(2, 'Goal_Position'), 3100);
	assert.equal(followers[0].getRegisterValue(1, 'Torque_Enable'), 1);
	assert.equal(loop.state, 'stopped');
	assert.deepEqual(
		[...leaders, ...followers].map((channel) => channel.closeCount),
		[1, 1, 1, 1]
	);
});

test('LocalMirrorLoop applies a queued remap at the next cycle boundary', async () => {
	const { leaders, followers, mapping } = createArms();
	const loop = new LocalMirrorLoop({ leaders, followers, mapping, fps: 60, maxCycles: 1, sleep: immediate });
	loop.remap();

	const result = await loop.run();

	assert.equal(result.remaps, 1);
	assert.deepEqual(mapping.toRecord(), { Leader1: 'Follower2', Leader2: 'Follower1' });
	assert.deepEqual(followers[1].goalWrites, [
		{ motorId: 1, value: 1000 },
		{ motorId: 2, value: 1100 }
	]);
	assert.deepEqual(followers[0].goalWrites, [
		{ motorId: 1, value: 3000 },
		{ motorId: 2, value: 3100 }
	]);
});

test('LocalMirrorLoop counts per-motor failures and keeps mirroring the rest', async () => {
	const { leaders, followers, mapping } = createArms();
	leaders[0].failing.add(2);
	followers[1].failing.add(1);
	const loop = new LocalMirrorLoop({ leaders, followers, mapping, fps: 60, maxCycles: 3, sleep: immediate });

	const result = await loop.run();

	assert.equal(result.readFailures, 3);
	assert.equal(result.writeFailures, 3);
	assert.equal(followers[0].getRegisterValue(1, 'Goal_Position'), 1000);
	assert.equal(followers[0].getRegisterValue(2, 'Goal_Position'), undefined);
	assert.equal(followers[1].getRegisterValue(2, 'Goal_Position'), 3100);
});

test('LocalMirrorLoop renders the leader positions and counters', async () => {
	const { leaders, followers, mapping } = createArms();
	const writes: string[] = [];
	const display = new PositionDisplay((text) => writes.push(text));
	const loop = new LocalMirrorLoop({ leaders, followers, mapping, fps: 60, maxCycles: 1, sleep: immediate, display });

	await loop.run();

	assert.deepEqual(writes, [
		'\u001b[2KLeader1: M1 24.4%  M2 26.9%  → Follower1\n' +
			'\u001b[2KLeader2: M1 73.3%  M2 75.7%  → Follower2\n' +
			'\u001b[2Kcycle 1  read errors 0  write errors 0  [s] switch  [q] quit\n'
	]);
});

test('LocalMirrorLoop stops on an external signal and cannot be restarted', async () => {
	const { leaders, followers, mapping } = createArms();
	const controller = new AbortController();
	controller.abort();
	const loop = new LocalMirrorLoop({ leaders, followers, mapping, fps: 60, sleep: immediate });

	const result = await loop.run(controller.signal);

	assert.equal(result.stopReason, 'aborted');
	assert.equal(result.cycles, 0);
	await assert.rejects(loop.run(), /cannot start from state "stopped"/);
});

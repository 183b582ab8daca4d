import assert from 'node:assert/strict';
import test from 'node:test';
import { PositionSmoother } from '../relay/positionSmoother';

test('PositionSmoother passes the first value through and then blends with a step limit', () => {
	const smoother = new PositionSmoother({ alpha: 0.8, maxStep: 200, resolution: 4096 });

	assert.equal(smoother.apply('Follower1:1', 1000), 1000);
	assert.equal(smoother.apply('Follower1:1', 2048), 1200);
	assert.equal(smoother.apply('Follower1:1', 2048), 1370);
	assert.equal(smoother.apply('Follower1:1', 2048), 1505);
	assert.equal(smoother.current('Follower1:1'), 1505);
});

test('PositionSmoother converges monotonically without exceeding the step limit', () => {
	const smoother = new PositionSmoother({ alpha: 0.8, maxStep: 200, resolution: 4096 });
	let previous = smoother.apply('m', 0);

	for (let i = 0; i < 100; i += 1) {
		const next = smoother.apply('m', 2048);
		assert.ok(next >= previous, `step ${i} moved backwards`);
		assert.ok(next - previous <= 200, `step ${i} jumped ${next - previous}`);
		previous = next;
	}

	assert.equal(previous, 2048);
});

test('PositionSmoother keeps keys independent and clamps to the encoder range', () => {
	const smoother = new PositionSmoother({ alpha: 0, maxStep: 200, resolution: 4096 });

	assert.equal(smoother.apply('a', 5000), 4095);
	assert.equal(smoother.apply('a', -10), 3895);
	assert.equal(smoother.apply('b', 0), 0);
	assert.equal(smoother.apply('b', 1000), 200);

	smoother.reset('a');
	assert.equal(smoother.current('a'), undefined);
	assert.equal(smoother.apply('a', 10), 10);
	smoother.reset();
	assert.equal(smoother.current('b'), undefined);
});

test('PositionSmoother rejects invalid parameters', () => {
	assert.throws(() => new PositionSmoother({ alpha: 1, maxStep: 200, resolution: 4096 }), RangeError);
	assert.throws(() => new PositionSmoother({ alpha: -0.1, maxStep: 200, resolution: 4096 }), RangeError);
	assert.throws(() => new PositionSmoother({ alpha: 0.5, maxStep: 0, resolution: 4096 }), RangeError);
});

test('PositionSmoother starts a seeded key from the seed, clamped to the range', () => {
	const smoother = new PositionSmoother({ alpha: 0.8, maxStep: 200, resolution: 4096 });
	assert.equal(smoother.isSeeded('Follower1:1'), false);

	smoother.seed('Follower1:1', 0);
	smoother.seed('Follower1:2', 5000);

	assert.equal(smoother.isSeeded('Follower1:1'), true);
	assert.equal(smoother.apply('Follower1:1', 2048), 200);
	assert.equal(smoother.current('Follower1:2'), 4095);
});

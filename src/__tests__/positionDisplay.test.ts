import assert from 'node:assert/strict';
import test from 'node:test';
import {
	formatArmPositions,
	formatMonitorRow,
	formatPercent,
	limitStatus,
	PositionDisplay
} from '../mirror/positionDisplay';

test('limitStatus flags positions near either limit', () => {
	assert.equal(limitStatus(10, 0, 4095), 'MIN');
	assert.equal(limitStatus(11, 0, 4095), 'OK');
	assert.equal(limitStatus(4085, 0, 4095), 'MAX');
	assert.equal(limitStatus(1500, 1000, 3000, 600), 'MIN');
});

test('formatPercent maps the encoder range onto 0..100%', () => {
	assert.equal(formatPercent(0, 4096), '0.0%');
	assert.equal(formatPercent(2048, 4096), '50.0%');
	assert.equal(formatPercent(4095, 4096), '100.0%');
});

test('formatArmPositions lists motors in id order', () => {
	const positions = new Map([
		[2, 4095],
		[1, 0]
	]);

	assert.equal(formatArmPositions('Leader1', positions, 4096), 'Leader1: M1 0.0%  M2 100.0%');
	assert.equal(formatArmPositions('Follower2', new Map(), 4096), 'Follower2: (no data)');
});

test('formatMonitorRow aligns position columns and appends extended readings', () => {
	assert.equal(
		formatMonitorRow({ motorId: 1, raw: 2048, resolution: 4096 }),
		['M1', 'raw  2048', ' 180.0°', ' 50.0%', '[OK]'].join('  ')
	);
	assert.equal(
		formatMonitorRow({
			motorId: 3,
			raw: 5,
			resolution: 4096,
			minLimit: 0,
			maxLimit: 4095,
			voltage: 12.04,
			temperature: 35,
			load: 12
		}),
		['M3', 'raw     5', '   0.4°', '  0.1%', '[MIN]', '12.0V', '35°C', 'load 12'].join('  ')
	);
});

test('PositionDisplay redraws the previous block in place', () => {
	const writes: string[] = [];
	const display = new PositionDisplay((text) => writes.push(text));

	display.render(['a', 'b']);
	display.render(['c']);
	display.reset();
	display.render(['d']);

	assert.deepEqual(writes, ['\u001b[2Ka\n\u001b[2Kb\n', '\u001b[2A\u001b[2Kc\n', '\u001b[2Kd\n']);
});

import assert from 'node:assert/strict';
import test from 'node:test';
import {
	sanitizeBoolean,
	sanitizeNumber,
	sanitizeEnum,
	sanitizeFloat,
	sanitizeMotorIds,
	sanitizeString,
	sanitizeStringList
} from '../config/sanitizers';

// --- sanitizeBoolean ---

test('sanitizeBoolean keeps real booleans only', () => {
	assert.equal(sanitizeBoolean(false, true), false);
	assert.equal(sanitizeBoolean(true, false), true);
	assert.equal(sanitizeBoolean('false', true), true);
	assert.equal(sanitizeBoolean(0, true), true);
});

// --- sanitizeNumber ---

test('sanitizeNumber floors and clamps rates and timeouts', () => {
	assert.equal(sanitizeNumber(59.9, 60, 1, 1000), 59);
	assert.equal(sanitizeNumber(0, 60, 1, 1000), 1);
	assert.equal(sanitizeNumber(5000, 60, 1, 1000), 1000);
	assert.equal(sanitizeNumber(250, 2000, 50), 250);
});

test('sanitizeNumber falls back on non-finite or non-numeric input', () => {
	assert.equal(sanitizeNumber('60', 30, 1), 30);
	assert.equal(sanitizeNumber(NaN, 30, 1), 30);
	assert.equal(sanitizeNumber(Infinity, 30, 1), 30);
	assert.equal(sanitizeNumber(null, 30, 1), 30);
});

// --- sanitizeEnum ---

test('sanitizeEnum picks a known log level or the fallback', () => {
	const levels = ['error', 'warn', 'info', 'debug', 'trace'] as const;
	assert.equal(sanitizeEnum('debug', levels, 'info'), 'debug');
	assert.equal(sanitizeEnum('DEBUG', levels, 'info'), 'info');
	assert.equal(sanitizeEnum(undefined, levels, 'warn'), 'warn');
});

// --- sanitizeStringList ---

test('sanitizeStringList keeps trimmed non-empty port names', () => {
	assert.deepEqual(sanitizeStringList([' /dev/ttyACM0 ', '', 3, null, 'COM4']), ['/dev/ttyACM0', 'COM4']);
});

test('sanitizeStringList returns an empty list for non-arrays', () => {
	assert.deepEqual(sanitizeStringList('/dev/ttyACM0'), []);
	assert.deepEqual(sanitizeStringList(undefined), []);
});

// --- sanitizeFloat ---

test('sanitizeFloat keeps the fraction and clamps to the range', () => {
	assert.equal(sanitizeFloat(0.85, 0.8, 0, 0.99), 0.85);
	assert.equal(sanitizeFloat(1.5, 0.8, 0, 0.99), 0.99);
	assert.equal(sanitizeFloat(-1, 0.8, 0, 0.99), 0);
	assert.equal(sanitizeFloat('0.5', 0.8, 0, 0.99), 0.8);
	assert.equal(sanitizeFloat(NaN, 0.8, 0, 0.99), 0.8);
});

// --- sanitizeString ---

test('sanitizeString trims and falls back on blank input', () => {
	assert.equal(sanitizeString('  ws://relay:8765 ', 'x'), 'ws://relay:8765');
	assert.equal(sanitizeString('   ', 'x'), 'x');
	assert.equal(sanitizeString(5, 'x'), 'x');
});

// --- sanitizeMotorIds ---

test('sanitizeMotorIds accepts arrays and comma separated lists', () => {
	assert.deepEqual(sanitizeMotorIds([3, 1, 2], [9]), [3, 1, 2]);
	assert.deepEqual(sanitizeMotorIds('1, 2,3', [9]), [1, 2, 3]);
});

test('sanitizeMotorIds drops duplicates and invalid ids', () => {
	assert.deepEqual(sanitizeMotorIds([1, 1, 2, 254, -1, 2.5, '3'], [9]), [1, 2]);
	assert.deepEqual(sanitizeMotorIds('1,x,1', [9]), [1]);
});

test('sanitizeMotorIds returns the fallback when nothing valid remains', () => {
	assert.deepEqual(sanitizeMotorIds([], [1, 2]), [1, 2]);
	assert.deepEqual(sanitizeMotorIds('', [1, 2]), [1, 2]);
	assert.deepEqual(sanitizeMotorIds(undefined, [1, 2]), [1, 2]);
});

import assert from 'node:assert/strict';
import test from 'node:test';
import {
	canonicalize,
	clampRaw,
	computeHomingOffset,
	decanonicalize,
	decodeSignMagnitude,
	encodeSignMagnitude,
	isValidOffset,
	middleTick,
	rawToDegrees,
	rawToPercent
} from '../protocol/homingOffset';

test('canonical and raw positions round trip for every valid offset', () => {
	const resolution = 4096;
	for (const offset of [-2047, -1000, -1, 0, 1, 512, 2047]) {
		assert.ok(isValidOffset(offset, resolution));
		for (const raw of [0, 1, 2048, 4095]) {
			assert.equal(decanonicalize(canonicalize(raw, offset), offset), raw);
		}
	}
});

test('computeHomingOffset puts the current pose at the middle tick', () => {
	assert.equal(middleTick(4096), 2048);
	assert.equal(middleTick(1024), 512);
	assert.equal(computeHomingOffset(2100, 4096), 52);
	assert.equal(computeHomingOffset(1000, 4096), -1048);
	assert.equal(canonicalize(2100, computeHomingOffset(2100, 4096)), 2048);
});

test('isValidOffset requires |offset| < resolution / 2', () => {
	assert.equal(isValidOffset(2048, 4096), false);
	assert.equal(isValidOffset(-2048, 4096), false);
	assert.equal(isValidOffset(1.5, 4096), false);
	assert.equal(isValidOffset(511, 1024), true);
});

test('sign-magnitude encoding uses the configured sign bit', () => {
	assert.equal(encodeSignMagnitude(52, 11), 52);
	assert.equal(encodeSignMagnitude(-52, 11), 2048 + 52);
	assert.equal(decodeSignMagnitude(2048 + 52, 11), -52);
	assert.equal(decodeSignMagnitude(52, 11), 52);
	assert.equal(encodeSignMagnitude(-3, 15), 0x8003);
	for (const value of [-2047, -1, 0, 1, 2047]) {
		assert.equal(decodeSignMagnitude(encodeSignMagnitude(value, 11), 11), value);
	}
});

test('encodeSignMagnitude rejects magnitudes that overflow', () => {
	assert.throws(() => encodeSignMagnitude(2048, 11), RangeError);
	assert.throws(() => encodeSignMagnitude(0.5, 11), RangeError);
});

test('clampRaw rounds and clamps into the encoder range', () => {
	assert.equal(clampRaw(-10, 4096), 0);
	assert.equal(clampRaw(5000, 4096), 4095);
	assert.equal(clampRaw(100.6, 4096), 101);
	assert.equal(clampRaw(Number.NaN, 4096), 0);
});

test('rawToPercent and rawToDegrees', () => {
	assert.equal(rawToPercent(4095, 4096), 100);
	assert.equal(rawToPercent(0, 4096), 0);
	assert.equal(rawToDegrees(1024, 4096), 90);
	assert.equal(rawToDegrees(2048, 4096), 180);
});

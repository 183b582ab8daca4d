/**
 * Position math around the per-motor homing offset.
 *
 * canonical = raw - offset; raw = canonical + offset. A calibrated motor has
 * its middle pose at resolution / 2 in canonical ticks.
 */

export function canonicalize(raw: number, offset: number): number {
	return raw - offset;
}

export function decanonicalize(canonical: number, offset: number): number {
	return canonical + offset;
}

export function middleTick(resolution: number): number {
	return Math.floor(resolution / 2);
}

export function computeHomingOffset(raw: number, resolution: number): number {
	return raw - middleTick(resolution);
}

export function isValidOffset(offset: number, resolution: number): boolean {
	return Number.isInteger(offset) && Math.abs(offset) < resolution / 2;
}

/**
 * Encodes a signed offset as magnitude plus a sign bit, the way Feetech
 * servos store Homing_Offset (bit 11 on STS3215).
 */
export function encodeSignMagnitude(value: number, signBit: number): number {
	const limit = 1 << signBit;
	const magnitude = Math.abs(value);
	if (!Number.isInteger(value) || magnitude >= limit) {
		throw new RangeError(`Offset ${value} does not fit in ${signBit} magnitude bits.`);
	}
	return value < 0 ? magnitude | limit : magnitude;
}

export function decodeSignMagnitude(encoded: number, signBit: number): number {
	const limit = 1 << signBit;
	const magnitude = encoded & (limit - 1);
	return (encoded & limit) !== 0 ? -magnitude : magnitude;
}

export function clampRaw(value: number, resolution: number): number {
	if (!Number.isFinite(value)) {
		return 0;
	}
	return Math.max(0, Math.min(resolution - 1, Math.round(value)));
}

export function rawToPercent(raw: number, resolution: number): number {
	return (100 * raw) / (resolution - 1);
}

export function rawToDegrees(raw: number, resolution: number): number {
	return (raw / resolution) * 360;
}

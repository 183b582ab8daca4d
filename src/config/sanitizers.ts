/**
 * Generic configuration sanitizer helpers shared across config modules.
 */

export function sanitizeBoolean(value: unknown, fallback: boolean): boolean {
	return typeof value === 'boolean' ? value : fallback;
}

export function sanitizeNumber(value: unknown, fallback: number, min: number, max = Number.POSITIVE_INFINITY): number {
	if (typeof value !== 'number' || Number.isNaN(value) || !Number.isFinite(value)) {
		return fallback;
	}
	return Math.min(max, Math.max(min, Math.floor(value)));
}

/**
 * Like sanitizeNumber but keeps the fraction; out-of-range values are clamped.
 */
export function sanitizeFloat(value: unknown, fallback: number, min: number, max: number): number {
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		return fallback;
	}
	return Math.min(max, Math.max(min, value));
}

export function sanitizeEnum<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
	return allowed.find((entry) => entry === value) ?? fallback;
}

export function sanitizeString(value: unknown, fallback: string): string {
	if (typeof value !== 'string') {
		return fallback;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : fallback;
}

export function sanitizeStringList(value: unknown): string[] {
	if (!Array.isArray(value)) {
		return [];
	}

	return value
		.filter((entry): entry is string => typeof entry === 'string')
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
}

/**
 * Accepts an array of integers or a comma separated list ("1,2,3"). Values
 * outside min..max and duplicates are dropped; an empty result yields the
 * fallback.
 */
export function sanitizeIntegerList(value: unknown, fallback: readonly number[], min: number, max: number): number[] {
	let entries: unknown[];
	if (typeof value === 'string') {
		entries = value
			.split(',')
			.map((part) => part.trim())
			.filter((part) => part.length > 0)
			.map((part) => (/^\d+$/.test(part) ? Number(part) : Number.NaN));
	} else if (Array.isArray(value)) {
		entries = value;
	} else {
		return [...fallback];
	}

	const values = entries.filter(
		(entry): entry is number => typeof entry === 'number' && Number.isInteger(entry) && entry >= min && entry <= max
	);
	const unique = [...new Set(values)];
	return unique.length > 0 ? unique : [...fallback];
}

export function sanitizeMotorIds(value: unknown, fallback: readonly number[], maxId = 253): number[] {
	return sanitizeIntegerList(value, fallback, 0, maxId);
}

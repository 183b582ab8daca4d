export type ArmRole = 'leader' | 'follower';

export type IdentifiedRole = ArmRole | 'unknown';

export const ARM_ROLES: readonly ArmRole[] = ['leader', 'follower'] as const;

export function isArmRole(value: unknown): value is ArmRole {
	return value === 'leader' || value === 'follower';
}

/**
 * Raw encoder ticks keyed by motor id.
 */
export type PositionMap = Map<number, number>;

/**
 * Label of an identified arm, numbered in discovery order ("Leader1", "Follower2").
 */
export type ArmLabel = string;

export function roleLabel(role: ArmRole, index: number): ArmLabel {
	return `${role === 'leader' ? 'Leader' : 'Follower'}${index + 1}`;
}

export function positionsToRecord(positions: PositionMap): Record<string, number> {
	const out: Record<string, number> = {};
	for (const [motorId, value] of positions) {
		out[String(motorId)] = value;
	}
	return out;
}

export function recordToPositions(record: Record<string, number>): PositionMap {
	const out: PositionMap = new Map();
	for (const [key, value] of Object.entries(record)) {
		const motorId = Number(key);
		if (Number.isInteger(motorId)) {
			out.set(motorId, value);
		}
	}
	return out;
}

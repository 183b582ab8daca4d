import type { ArmLabel } from '../device/motorTypes';

export type MappingPairs = ReadonlyArray<readonly [leader: ArmLabel, follower: ArmLabel]>;

/**
 * Frozen view of the mapping taken at a cycle boundary.
 */
export type MappingSnapshot = ReadonlyMap<ArmLabel, ArmLabel>;

export function isBijection(pairs: MappingPairs): boolean {
	const leaders = new Set<string>();
	const followers = new Set<string>();
	for (const [leader, follower] of pairs) {
		if (leaders.has(leader) || followers.has(follower)) {
			return false;
		}
		leaders.add(leader);
		followers.add(follower);
	}
	return true;
}

/**
 * Leader→follower assignment. Always a bijection; only `remap` changes it, and
 * every change is a single synchronous swap.
 */
export class MappingTable {
	private readonly targets = new Map<ArmLabel, ArmLabel>();

	public constructor(pairs: MappingPairs) {
		if (!isBijection(pairs)) {
			throw new Error('Mapping must pair each leader with a distinct follower.');
		}
		for (const [leader, follower] of pairs) {
			this.targets.set(leader, follower);
		}
	}

	/** Leader1→Follower1, Leader2→Follower2, … */
	public static identity(leaders: readonly ArmLabel[], followers: readonly ArmLabel[]): MappingTable {
		MappingTable.assertSameSize(leaders, followers);
		return new MappingTable(leaders.map((leader, index) => [leader, followers[index]] as const));
	}

	public static shuffled(
		leaders: readonly ArmLabel[],
		followers: readonly ArmLabel[],
		random: () => number = Math.random
	): MappingTable {
		MappingTable.assertSameSize(leaders, followers);
		const order = [...followers];
		for (let i = order.length - 1; i > 0; i -= 1) {
			const j = Math.floor(random() * (i + 1));
			[order[i], order[j]] = [order[j], order[i]];
		}
		return new MappingTable(leaders.map((leader, index) => [leader, order[index]] as const));
	}

	/**
	 * Parses a mapping received from elsewhere. Returns undefined unless it is a
	 * bijection onto `knownFollowers` (when given).
	 */
	public static fromRecord(record: Record<string, string>, knownFollowers?: readonly ArmLabel[]): MappingTable | undefined {
		const pairs = Object.entries(record);
		if (pairs.length === 0 || !isBijection(pairs)) {
			return undefined;
		}
		if (knownFollowers && pairs.some(([, follower]) => !knownFollowers.includes(follower))) {
			return undefined;
		}
		return new MappingTable(pairs);
	}

	private static assertSameSize(leaders: readonly ArmLabel[], followers: readonly ArmLabel[]): void {
		if (leaders.length !== followers.length) {
			throw new Error(`Cannot map ${leaders.length} leader(s) onto ${followers.length} follower(s).`);
		}
	}

	public get size(): number {
		return this.targets.size;
	}

	public leaders(): ArmLabel[] {
		return [...this.targets.keys()];
	}

	public followerFor(leader: ArmLabel): ArmLabel | undefined {
		return this.targets.get(leader);
	}

	/**
	 * Swaps the followers of two leaders. With no arguments the first two
	 * leaders are swapped, which for two pairs swaps both. Returns false when
	 * there is nothing to swap.
	 */
	public remap(first?: ArmLabel, second?: ArmLabel): boolean {
		const leaders = this.leaders();
		const a = first ?? leaders[0];
		const b = second ?? leaders.find((leader) => leader !== a);
		if (a === undefined || b === undefined || a === b) {
			return false;
		}
		const targetA = this.targets.get(a);
		const targetB = this.targets.get(b);
		if (targetA === undefined || targetB === undefined) {
			throw new Error(`Unknown leader in remap: ${targetA === undefined ? a : b}.`);
		}
		this.targets.set(a, targetB);
		this.targets.set(b, targetA);
		return true;
	}

	public snapshot(): MappingSnapshot {
		return new Map(this.targets);
	}

	public toRecord(): Record<ArmLabel, ArmLabel> {
		return Object.fromEntries(this.targets);
	}

	public describe(): string {
		return [...this.targets].map(([leader, follower]) => `${leader} → ${follower}`).join(', ');
	}
}

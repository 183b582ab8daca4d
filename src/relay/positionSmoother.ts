export interface PositionSmootherOptions {
	/** Weight of the previous value, 0 ≤ α < 1. */
	alpha: number;
	/** Largest change allowed per update, in ticks. */
	maxStep: number;
	resolution: number;
}

/**
 * Exponential smoothing with a per-update step limit, tracked per key
 * (one key per follower motor). Keys should be seeded with the motor's present
 * position; an unseeded key takes its first value as is.
 * State is kept unrounded so small remaining errors still converge.
 */
export class PositionSmoother {
	private readonly alpha: number;
	private readonly maxStep: number;
	private readonly max: number;
	private readonly state = new Map<string, number>();

	public constructor(options: PositionSmootherOptions) {
		if (!(options.alpha >= 0 && options.alpha < 1)) {
			throw new RangeError(`Smoothing factor must be in [0, 1), got ${options.alpha}.`);
		}
		if (!(options.maxStep > 0)) {
			throw new RangeError(`Max step must be positive, got ${options.maxStep}.`);
		}
		this.alpha = options.alpha;
		this.maxStep = options.maxStep;
		this.max = options.resolution - 1;
	}

	public apply(key: string, target: number): number {
		const clampedTarget = this.clamp(target);
		const previous = this.state.get(key);
		if (previous === undefined) {
			this.state.set(key, clampedTarget);
			return Math.round(clampedTarget);
		}
		const blended = this.alpha * previous + (1 - this.alpha) * clampedTarget;
		const step = Math.max(-this.maxStep, Math.min(this.maxStep, blended - previous));
		const next = this.clamp(previous + step);
		this.state.set(key, next);
		return Math.round(next);
	}

	/** Starts a key from a known position, usually the motor's present one. */
	public seed(key: string, value: number): void {
		this.state.set(key, this.clamp(value));
	}

	public isSeeded(key: string): boolean {
		return this.state.has(key);
	}

	public current(key: string): number | undefined {
		const value = this.state.get(key);
		return value === undefined ? undefined : Math.round(value);
	}

	public reset(key?: string): void {
		if (key === undefined) {
			this.state.clear();
		} else {
			this.state.delete(key);
		}
	}

	private clamp(value: number): number {
		if (!Number.isFinite(value)) {
			return 0;
		}
		return Math.max(0, Math.min(this.max, value));
	}
}

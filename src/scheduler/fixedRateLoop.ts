import type { Logger } from '../diagnostics/logger';

export type LoopStopReason = 'aborted' | 'duration' | 'max-cycles';

export interface FixedRateLoopOptions {
	periodMs: number;
	onCycle: (cycle: number) => Promise<void> | void;
	signal?: AbortSignal;
	/** Stop once this much time has elapsed since the first cycle. */
	durationMs?: number;
	maxCycles?: number;
	now?: () => number;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
	logger?: Logger;
}

export interface FixedRateLoopResult {
	cycles: number;
	overruns: number;
	elapsedMs: number;
	stopReason: LoopStopReason;
}

/** Longest delay a single Node timer accepts; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolves after `ms`, or as soon as the signal aborts. Never rejects.
 * Delays beyond one timer's range are re-armed in pieces; `Infinity` waits
 * for the signal alone.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise<void>((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		let remaining = Math.max(0, ms);
		let timer: NodeJS.Timeout | undefined;
		const done = (): void => {
			clearTimeout(timer);
			signal?.removeEventListener('abort', done);
			resolve();
		};
		const arm = (): void => {
			const delay = Math.min(remaining, MAX_TIMER_DELAY_MS);
			remaining -= delay;
			timer = setTimeout(remaining > 0 ? arm : done, delay);
		};
		signal?.addEventListener('abort', done, { once: true });
		arm();
	});
}

/**
 * Runs `onCycle` every `periodMs` against absolute deadlines, so time spent in
 * a cycle is subtracted from the following sleep. A cycle that overruns by a
 * whole period resets the schedule instead of bursting to catch up. Stop
 * conditions are checked only between cycles.
 */
export async function runFixedRateLoop(options: FixedRateLoopOptions): Promise<FixedRateLoopResult> {
	const now = options.now ?? Date.now;
	const sleep = options.sleep ?? abortableSleep;
	const periodMs = Math.max(1, options.periodMs);
	const startedAt = now();
	let deadline = startedAt;
	let cycles = 0;
	let overruns = 0;

	const stopReason = (): LoopStopReason | undefined => {
		if (options.signal?.aborted) {
			return 'aborted';
		}
		if (options.maxCycles !== undefined && cycles >= options.maxCycles) {
			return 'max-cycles';
		}
		if (options.durationMs !== undefined && now() - startedAt >= options.durationMs) {
			return 'duration';
		}
		return undefined;
	};

	for (;;) {
		const reason = stopReason();
		if (reason) {
			return { cycles, overruns, elapsedMs: now() - startedAt, stopReason: reason };
		}

		await options.onCycle(cycles);
		cycles += 1;

		deadline += periodMs;
		const current = now();
		if (current - deadline >= periodMs) {
			overruns += 1;
			options.logger?.debug('Loop cycle overran its period', { periodMs, lateByMs: current - deadline });
			deadline = current;
			continue;
		}
		if (deadline > current) {
			await sleep(deadline - current, options.signal);
		}
	}
}

import { enableTorque, readPositions, writePositions } from '../device/channelOps';
import type { DeviceChannel } from '../device/deviceChannel';
import type { ArmLabel } from '../device/motorTypes';
import { Logger, NoopLogger } from '../diagnostics/logger';
import { runFixedRateLoop, LoopStopReason } from '../scheduler/fixedRateLoop';
import type { DeviceError } from '../errors/DeviceError';
import type { MappingTable } from './mappingTable';
import { formatArmPositions, PositionDisplay } from './positionDisplay';
import { RemapQueue } from './remapQueue';

export type MirrorLoopState = 'idle' | 'running' | 'stopped';

export interface MirrorLoopStats {
	cycles: number;
	readFailures: number;
	writeFailures: number;
	remaps: number;
	overruns: number;
}

export interface MirrorLoopResult extends MirrorLoopStats {
	stopReason: LoopStopReason;
	elapsedMs: number;
}

export interface LocalMirrorLoopOptions {
	leaders: readonly DeviceChannel[];
	followers: readonly DeviceChannel[];
	mapping: MappingTable;
	fps: number;
	durationMs?: number;
	maxCycles?: number;
	display?: PositionDisplay;
	remapQueue?: RemapQueue;
	logger?: Logger;
	now?: () => number;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Reads every leader each cycle and writes the raw positions, clamped to the
 * encoder range, to the follower the mapping assigns it. No smoothing is
 * applied locally. Per-motor failures are counted and the loop carries on.
 */
export class LocalMirrorLoop {
	private readonly options: LocalMirrorLoopOptions;
	private readonly logger: Logger;
	private readonly remapQueue: RemapQueue;
	private readonly abortController = new AbortController();
	private readonly followersByLabel = new Map<ArmLabel, DeviceChannel>();
	private currentState: MirrorLoopState = 'idle';
	private readonly stats: MirrorLoopStats = {
		cycles: 0,
		readFailures: 0,
		writeFailures: 0,
		remaps: 0,
		overruns: 0
	};

	public constructor(options: LocalMirrorLoopOptions) {
		this.options = options;
		this.logger = options.logger ?? new NoopLogger();
		this.remapQueue = options.remapQueue ?? new RemapQueue();
		for (const follower of options.followers) {
			this.followersByLabel.set(follower.label, follower);
		}
	}

	public get state(): MirrorLoopState {
		return this.currentState;
	}

	public getStats(): MirrorLoopStats {
		return { ...this.stats };
	}

	/** Queues a swap; it takes effect at the next cycle boundary. */
	public remap(first?: ArmLabel, second?: ArmLabel): void {
		this.remapQueue.post({ first, second, source: 'api' });
	}

	/** Requests a stop; observed at the next cycle boundary. */
	public stop(): void {
		this.abortController.abort();
	}

	public async run(signal?: AbortSignal): Promise<MirrorLoopResult> {
		if (this.currentState !== 'idle') {
			throw new Error(`Mirror loop cannot start from state "${this.currentState}".`);
		}
		this.currentState = 'running';
		const onExternalAbort = (): void => this.stop();
		signal?.addEventListener('abort', onExternalAbort, { once: true });
		if (signal?.aborted) {
			this.stop();
		}

		try {
			for (const follower of this.options.followers) {
				await enableTorque(follower, this.logger);
			}
			this.logger.info('Mirror loop started', {
				fps: this.options.fps,
				mapping: this.options.mapping.toRecord()
			});

			const result = await runFixedRateLoop({
				periodMs: 1000 / this.options.fps,
				onCycle: () => this.cycle(),
				signal: this.abortController.signal,
				durationMs: this.options.durationMs,
				maxCycles: this.options.maxCycles,
				now: this.options.now,
				sleep: this.options.sleep,
				logger: this.logger
			});
			this.stats.overruns = result.overruns;
			this.logger.info('Mirror loop stopped', { reason: result.stopReason, ...this.stats });
			return { ...this.stats, stopReason: result.stopReason, elapsedMs: result.elapsedMs };
		} finally {
			signal?.removeEventListener('abort', onExternalAbort);
			this.currentState = 'stopped';
			await this.closeChannels();
		}
	}

	private async cycle(): Promise<void> {
		const { mapping, leaders } = this.options;
		this.stats.remaps += this.remapQueue.drain(mapping, this.logger);
		const snapshot = mapping.snapshot();

		const reads = await Promise.all(leaders.map((leader) => readPositions(leader)));

		const writes: Promise<DeviceError[]>[] = [];
		reads.forEach((read, index) => {
			const leader = leaders[index];
			this.countFailures('readFailures', read.failures);
			const followerLabel = snapshot.get(leader.label);
			const follower = followerLabel === undefined ? undefined : this.followersByLabel.get(followerLabel);
			if (follower && read.positions.size > 0) {
				writes.push(writePositions(follower, read.positions));
			}
		});
		for (const failures of await Promise.all(writes)) {
			this.countFailures('writeFailures', failures);
		}

		this.stats.cycles += 1;
		this.options.display?.render([
			...reads.map((read, index) => {
				const leader = leaders[index];
				return `${formatArmPositions(leader.label, read.positions, leader.resolution)}  → ${snapshot.get(leader.label) ?? '-'}`;
			}),
			`cycle ${this.stats.cycles}  read errors ${this.stats.readFailures}  write errors ${this.stats.writeFailures}  [s] switch  [q] quit`
		]);
	}

	private countFailures(counter: 'readFailures' | 'writeFailures', failures: readonly DeviceError[]): void {
		this.stats[counter] += failures.length;
		for (const failure of failures) {
			this.logger.debug('Motor command failed', {
				op: failure.op,
				port: failure.port,
				motorId: failure.motorId,
				code: failure.code
			});
		}
	}

	private async closeChannels(): Promise<void> {
		for (const channel of [...this.options.leaders, ...this.options.followers]) {
			try {
				await channel.close();
			} catch (error) {
				this.logger.warn('Failed to close motor bus', {
					port: channel.port,
					error: error instanceof Error ? error.message : String(error)
				});
			}
		}
	}
}

import { Logger, NoopLogger } from '../diagnostics/logger';
import {
	BusCommandContext,
	BusCommandRequest,
	BusCommandResult,
	BusQueueError,
	BusQueueState
} from './types';

interface BusQueueOptions {
	defaultTimeoutMs?: number;
	logger?: Logger;
	label?: string;
}

interface QueuedItem<TReply> {
	requestId: string;
	timeoutMs: number;
	enqueuedAt: number;
	externalSignal?: AbortSignal;
	execute: (ctx: BusCommandContext) => Promise<TReply>;
	resolve: (value: BusCommandResult<TReply>) => void;
	reject: (reason: unknown) => void;
	removeQueuedAbortListener?: () => void;
}

/** Default per-command timeout (ms) on the servo bus. */
const DEFAULT_BUS_TIMEOUT_MS = 100;

/**
 * Runs commands for one half-duplex bus strictly one at a time, in enqueue
 * order. Failed commands are surfaced to the caller and never retried.
 */
export class BusQueue {
	private readonly defaultTimeoutMs: number;
	private readonly logger: Logger;
	private readonly label: string;
	private readonly queue: QueuedItem<unknown>[] = [];

	private state: BusQueueState = 'idle';
	private inFlightAbortController?: AbortController;
	private processScheduled = false;
	private requestSeq = 0;

	public constructor(options: BusQueueOptions = {}) {
		this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_BUS_TIMEOUT_MS;
		this.logger = options.logger ?? new NoopLogger();
		this.label = options.label ?? 'bus';
	}

	public getState(): BusQueueState {
		return this.state;
	}

	public getQueueSize(): number {
		return this.queue.length;
	}

	public enqueue<TReply>(request: BusCommandRequest<TReply>): Promise<BusCommandResult<TReply>> {
		const requestId = request.id ?? this.nextRequestId();
		if (this.state === 'disposed') {
			return Promise.reject(new BusQueueError('DISPOSED', requestId, `${this.label} queue is disposed.`));
		}

		if (request.signal?.aborted) {
			return Promise.reject(
				new BusQueueError('CANCELLED', requestId, 'Request was aborted before it reached the bus queue.')
			);
		}

		return new Promise<BusCommandResult<TReply>>((resolve, reject) => {
			const item: QueuedItem<TReply> = {
				requestId,
				timeoutMs: request.timeoutMs ?? this.defaultTimeoutMs,
				enqueuedAt: Date.now(),
				externalSignal: request.signal,
				execute: request.execute,
				resolve,
				reject
			};

			if (request.signal) {
				const signal = request.signal;
				const onAbort = () => {
					const index = this.queue.indexOf(item);
					if (index >= 0) {
						this.queue.splice(index, 1);
						reject(new BusQueueError('CANCELLED', requestId, 'Request was cancelled while queued.'));
					}
				};
				signal.addEventListener('abort', onAbort, { once: true });
				item.removeQueuedAbortListener = () => signal.removeEventListener('abort', onAbort);
			}

			this.queue.push(item);
			this.scheduleProcess();
		});
	}

	/**
	 * Rejects everything still queued and aborts the in-flight command.
	 */
	public dispose(): void {
		if (this.state === 'disposed') {
			return;
		}
		this.state = 'disposed';
		this.inFlightAbortController?.abort();
		for (const item of this.queue.splice(0)) {
			item.removeQueuedAbortListener?.();
			item.reject(new BusQueueError('DISPOSED', item.requestId, `${this.label} queue was disposed.`));
		}
	}

	private scheduleProcess(): void {
		if (this.processScheduled || this.state !== 'idle') {
			return;
		}
		this.processScheduled = true;
		queueMicrotask(() => {
			this.processScheduled = false;
			void this.processNext();
		});
	}

	private async processNext(): Promise<void> {
		if (this.state !== 'idle') {
			return;
		}

		const item = this.queue.shift();
		if (!item) {
			return;
		}

		item.removeQueuedAbortListener?.();
		this.state = 'running';
		const startedAt = Date.now();
		const controller = new AbortController();
		this.inFlightAbortController = controller;

		let timedOut = false;
		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort();
		}, item.timeoutMs);
		const onExternalAbort = () => controller.abort();
		item.externalSignal?.addEventListener('abort', onExternalAbort, { once: true });

		try {
			const reply = await item.execute({
				timeoutMs: item.timeoutMs,
				signal: controller.signal,
				enqueuedAt: item.enqueuedAt
			});
			const finishedAt = Date.now();
			item.resolve({
				requestId: item.requestId,
				reply,
				enqueuedAt: item.enqueuedAt,
				startedAt,
				finishedAt,
				durationMs: finishedAt - startedAt
			});
		} catch (error) {
			item.reject(this.classifyFailure(item, error, timedOut, controller.signal.aborted));
		} finally {
			clearTimeout(timer);
			item.externalSignal?.removeEventListener('abort', onExternalAbort);
			this.inFlightAbortController = undefined;
			if (this.state === 'running') {
				this.state = 'idle';
			}
			this.scheduleProcess();
		}
	}

	private classifyFailure(item: QueuedItem<unknown>, error: unknown, timedOut: boolean, aborted: boolean): BusQueueError {
		if (error instanceof BusQueueError) {
			return error;
		}
		if (timedOut) {
			this.logger.debug('Bus command timed out', { bus: this.label, requestId: item.requestId, timeoutMs: item.timeoutMs });
			return new BusQueueError('TIMEOUT', item.requestId, `Command timed out after ${item.timeoutMs}ms.`, error);
		}
		if (aborted) {
			return new BusQueueError(
				this.state === 'disposed' ? 'DISPOSED' : 'CANCELLED',
				item.requestId,
				'Command was cancelled.',
				error
			);
		}
		const detail = error instanceof Error ? error.message : String(error);
		return new BusQueueError('EXECUTION_FAILED', item.requestId, detail, error);
	}

	private nextRequestId(): string {
		this.requestSeq += 1;
		return `${this.label}-${this.requestSeq}`;
	}
}

import { TeleopError } from '../errors/TeleopError';

export type BusQueueState = 'idle' | 'running' | 'disposed';

export type BusQueueErrorCode = 'TIMEOUT' | 'CANCELLED' | 'DISPOSED' | 'EXECUTION_FAILED';

export interface BusCommandContext {
	timeoutMs: number;
	signal: AbortSignal;
	enqueuedAt: number;
}

export interface BusCommandRequest<TReply> {
	id?: string;
	timeoutMs?: number;
	signal?: AbortSignal;
	execute: (ctx: BusCommandContext) => Promise<TReply>;
}

export interface BusCommandResult<TReply> {
	requestId: string;
	reply: TReply;
	enqueuedAt: number;
	startedAt: number;
	finishedAt: number;
	durationMs: number;
}

export class BusQueueError extends TeleopError {
	public readonly requestId: string;

	public constructor(code: BusQueueErrorCode, requestId: string, message: string, cause?: unknown) {
		super(code, message, cause);
		this.name = 'BusQueueError';
		this.requestId = requestId;
	}
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export type LogMeta = Record<string, unknown>;

export interface Logger {
	error(message: string, meta?: LogMeta): void;
	warn(message: string, meta?: LogMeta): void;
	info(message: string, meta?: LogMeta): void;
	debug(message: string, meta?: LogMeta): void;
	trace(message: string, meta?: LogMeta): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
	trace: 4
};

/** Errors log as their message, packets as spaced hex. */
function metaReplacer(_key: string, value: unknown): unknown {
	if (value instanceof Error) {
		return value.message;
	}
	if (value instanceof Uint8Array) {
		return Array.from(value, (byte) => byte.toString(16).padStart(2, '0')).join(' ');
	}
	if (typeof value === 'bigint') {
		return value.toString();
	}
	return value;
}

export function formatLogLine(level: LogLevel, message: string, meta?: LogMeta, now: Date = new Date()): string {
	const prefix = `[${now.toISOString()}] [${level}] ${message}`;
	if (!meta || Object.keys(meta).length === 0) {
		return prefix;
	}

	let serialized: string;
	try {
		serialized = JSON.stringify(meta, metaReplacer);
	} catch {
		serialized = '{"meta":"unserializable"}';
	}
	return `${prefix} ${serialized}`;
}

export class NoopLogger implements Logger {
	public error(_message: string, _meta?: LogMeta): void {}
	public warn(_message: string, _meta?: LogMeta): void {}
	public info(_message: string, _meta?: LogMeta): void {}
	public debug(_message: string, _meta?: LogMeta): void {}
	public trace(_message: string, _meta?: LogMeta): void {}
}

/**
 * Formats every record as one text line and hands it to a sink
 * (stderr in the CLI, an array in tests).
 */
export class LineLogger implements Logger {
	private readonly minLevel: number;
	private readonly appendLine: (line: string) => void;

	public constructor(appendLine: (line: string) => void, level: LogLevel = 'info') {
		this.appendLine = appendLine;
		this.minLevel = LEVEL_ORDER[level];
	}

	public error(message: string, meta?: LogMeta): void {
		this.log('error', message, meta);
	}

	public warn(message: string, meta?: LogMeta): void {
		this.log('warn', message, meta);
	}

	public info(message: string, meta?: LogMeta): void {
		this.log('info', message, meta);
	}

	public debug(message: string, meta?: LogMeta): void {
		this.log('debug', message, meta);
	}

	public trace(message: string, meta?: LogMeta): void {
		this.log('trace', message, meta);
	}

	private log(level: LogLevel, message: string, meta?: LogMeta): void {
		if (LEVEL_ORDER[level] > this.minLevel) {
			return;
		}
		this.appendLine(formatLogLine(level, message, meta));
	}
}

/**
 * Adds fixed fields (usually the bus port) to every record. Fields passed
 * with a record win over the bound ones.
 */
export class ScopedLogger implements Logger {
	public constructor(private readonly inner: Logger, private readonly bound: LogMeta) {}

	public error(message: string, meta?: LogMeta): void {
		this.inner.error(message, this.merge(meta));
	}

	public warn(message: string, meta?: LogMeta): void {
		this.inner.warn(message, this.merge(meta));
	}

	public info(message: string, meta?: LogMeta): void {
		this.inner.info(message, this.merge(meta));
	}

	public debug(message: string, meta?: LogMeta): void {
		this.inner.debug(message, this.merge(meta));
	}

	public trace(message: string, meta?: LogMeta): void {
		this.inner.trace(message, this.merge(meta));
	}

	private merge(meta?: LogMeta): LogMeta {
		return { ...this.bound, ...meta };
	}
}

export function createStderrLogger(level: LogLevel = 'info'): Logger {
	return new LineLogger((line) => process.stderr.write(`${line}\n`), level);
}

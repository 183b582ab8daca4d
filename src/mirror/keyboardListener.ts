import type { Logger } from '../diagnostics/logger';

/**
 * The parts of a readable key stream the listener needs; process.stdin and a
 * PassThrough both qualify.
 */
export interface KeyInputStream {
	on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
	removeListener(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
	resume(): unknown;
	pause(): unknown;
	isTTY?: boolean;
	setRawMode?: (mode: boolean) => unknown;
}

export interface KeyboardListenerOptions {
	input: KeyInputStream;
	onRemap: () => void;
	onStop: () => void;
	logger?: Logger;
}

export interface KeyboardListener {
	dispose(): void;
}

const CTRL_C = '\u0003';

/**
 * Listens for single key presses: `s` requests a remap, `q` or Ctrl+C stops.
 * Raw mode is enabled only on a TTY and restored on dispose.
 */
export function startKeyboardListener(options: KeyboardListenerOptions): KeyboardListener {
	const { input } = options;
	const raw = input.isTTY === true && typeof input.setRawMode === 'function';
	let disposed = false;

	const onData = (chunk: Buffer | string): void => {
		const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
		for (const key of text) {
			if (key === 's' || key === 'S') {
				options.logger?.debug('Remap key pressed');
				options.onRemap();
			} else if (key === 'q' || key === 'Q' || key === CTRL_C) {
				options.logger?.debug('Stop key pressed');
				options.onStop();
			}
		}
	};

	if (raw) {
		input.setRawMode?.(true);
	}
	input.on('data', onData);
	input.resume();

	return {
		dispose: () => {
			if (disposed) {
				return;
			}
			disposed = true;
			input.removeListener('data', onData);
			if (raw) {
				input.setRawMode?.(false);
			}
			input.pause();
		}
	};
}

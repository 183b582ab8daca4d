import inquirer from 'inquirer';
import type { Logger, LogLevel } from '../diagnostics/logger';
import { KeyboardListener, KeyInputStream, startKeyboardListener } from '../mirror/keyboardListener';
import type { ChannelFactory } from './session';

/**
 * Process-level dependencies of the commands, swapped out in tests.
 */
export interface CliRuntime {
	createLogger: (level: LogLevel) => Logger;
	write: (text: string) => void;
	input: KeyInputStream;
	confirm: (message: string) => Promise<boolean>;
	createChannel?: ChannelFactory;
	discoverPorts?: () => Promise<string[]>;
}

export async function promptConfirm(message: string): Promise<boolean> {
	const answer: { proceed?: unknown } = await inquirer.prompt([
		{ type: 'confirm', name: 'proceed', message, default: true }
	]);
	return answer.proceed === true;
}

export interface StopHandle {
	signal: AbortSignal;
	dispose(): void;
}

/**
 * Aborts on SIGINT/SIGTERM and, when the input is a terminal, on `q`/Ctrl+C.
 * `onRemap` receives `s` presses.
 */
export function createStopHandle(runtime: CliRuntime, logger: Logger, onRemap?: () => void): StopHandle {
	const controller = new AbortController();
	const stop = (): void => {
		if (!controller.signal.aborted) {
			logger.info('Stop requested');
			controller.abort();
		}
	};
	process.once('SIGINT', stop);
	process.once('SIGTERM', stop);
	let keyboard: KeyboardListener | undefined;
	if (runtime.input.isTTY === true) {
		keyboard = startKeyboardListener({
			input: runtime.input,
			onRemap: onRemap ?? (() => logger.info('Remapping is not available in this mode')),
			onStop: stop,
			logger
		});
	}
	return {
		signal: controller.signal,
		dispose: () => {
			process.removeListener('SIGINT', stop);
			process.removeListener('SIGTERM', stop);
			keyboard?.dispose();
		}
	};
}

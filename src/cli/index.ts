#!/usr/bin/env node
import { Command, CommanderError } from 'commander';
import { createStderrLogger } from '../diagnostics/logger';
import { isDeviceError } from '../errors/DeviceError';
import { registerArmCommands } from './armCommands';
import { registerRelayCommands } from './relayCommands';
import { CliRuntime, promptConfirm } from './runtime';
import { EXIT_CODES, exitCodeFor } from './session';

export function createDefaultRuntime(): CliRuntime {
	return {
		createLogger: (level) => createStderrLogger(level),
		write: (text) => {
			process.stdout.write(text);
		},
		input: process.stdin,
		confirm: promptConfirm
	};
}

export function buildProgram(runtime: CliRuntime): Command {
	const program = new Command();
	program
		.name('arm-mirror')
		.description('Mirror leader robot arms onto follower arms, locally or through a relay')
		.version('0.1.0')
		.exitOverride();
	registerArmCommands(program, runtime);
	registerRelayCommands(program, runtime);
	return program;
}

export function describeFailure(error: unknown): string {
	if (isDeviceError(error)) {
		return `${error.message} ${error.hint} (op ${error.op}, recommended action: ${error.recommendedAction})`;
	}
	return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one command and maps the outcome to a process exit code.
 */
export async function main(argv: readonly string[], runtime: CliRuntime = createDefaultRuntime()): Promise<number> {
	const program = buildProgram(runtime);
	try {
		await program.parseAsync([...argv]);
		return EXIT_CODES.ok;
	} catch (error) {
		if (error instanceof CommanderError) {
			return error.exitCode;
		}
		process.stderr.write(`arm-mirror: ${describeFailure(error)}\n`);
		return exitCodeFor(error);
	}
}

if (require.main === module) {
	void main(process.argv).then(
		(code) => {
			process.exitCode = code;
		},
		(error: unknown) => {
			process.stderr.write(`arm-mirror: unhandled error: ${describeFailure(error)}\n`);
			process.exitCode = 1;
		}
	);
}

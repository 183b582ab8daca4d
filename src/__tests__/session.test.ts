import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import test from 'node:test';
import { channelsFor, ChannelFactory, exitCodeFor, startArmSession } from '../cli/session';
import { readTeleopConfig } from '../config/teleopConfig';
import { CalibrationStore } from '../device/calibrationStore';
import type { ArmRole } from '../device/motorTypes';
import { NoopLogger } from '../diagnostics/logger';
import {
	CalibrationAbortedError,
	CalibrationIncompleteError,
	ChannelOpenError,
	RoleCountMismatchError
} from '../errors/sessionErrors';
import { FakeChannel } from './testHelpers';

class UnopenableChannel extends FakeChannel {
	public override async open(): Promise<void> {
		throw new Error('Permission denied');
	}
}

const VOLTAGES: Record<string, number> = { '/dev/ttyACM0': 12.1, '/dev/ttyACM1': 5.0 };

function createFactory(created: FakeChannel[], unopenable?: string): ChannelFactory {
	return (port, config) => {
		const options = { port, motorIds: config.motorIds, voltage: VOLTAGES[port] ?? 0 };
		const channel = port === unopenable ? new UnopenableChannel(options) : new FakeChannel(options);
		created.push(channel);
		return channel;
	};
}

async function withStore(run: (store: CalibrationStore) => Promise<void>): Promise<void> {
	const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'arm-mirror-session-'));
	try {
		await run(new CalibrationStore(directory));
	} finally {
		await fs.rm(directory, { recursive: true, force: true });
	}
}

async function saveCalibration(store: CalibrationStore, role: ArmRole, port: string, motorIds: number[]): Promise<void> {
	await store.save({
		motorIds,
		homingOffsets: Object.fromEntries(motorIds.map((motorId) => [String(motorId), 0])),
		resolution: 4096,
		timestamp: 1_700_000_000,
		role,
		port
	});
}

const config = readTeleopConfig({ ports: '/dev/ttyACM0,/dev/ttyACM1', motorIds: '1,2' });
const logger = new NoopLogger();

test('startArmSession identifies arms and loads their calibration', async () => {
	await withStore(async (store) => {
		await saveCalibration(store, 'follower', '/dev/ttyACM0', [1, 2]);
		await saveCalibration(store, 'leader', '/dev/ttyACM1', [1, 2]);
		const created: FakeChannel[] = [];

		const session = await startArmSession({
			config,
			logger,
			createChannel: createFactory(created),
			expected: { leader: 1, follower: 1 },
			store
		});

		assert.deepEqual(
			session.assignments.map((assignment) => [assignment.label, assignment.channel.port]),
			[
				['Leader1', '/dev/ttyACM1'],
				['Follower1', '/dev/ttyACM0']
			]
		);
		assert.deepEqual([...session.calibrations.keys()], ['Leader1', 'Follower1']);
		assert.deepEqual(
			channelsFor(session, 'follower').map((channel) => channel.label),
			['Follower1']
		);
		assert.ok(created.every((channel) => channel.isOpen()));
	});
});

test('startArmSession refuses an arm without a complete calibration and closes the buses', async () => {
	await withStore(async (store) => {
		await saveCalibration(store, 'follower', '/dev/ttyACM0', [1]);
		await saveCalibration(store, 'leader', '/dev/ttyACM1', [1, 2]);
		const created: FakeChannel[] = [];

		await assert.rejects(
			startArmSession({ config, logger, createChannel: createFactory(created), expected: { leader: 1, follower: 1 }, store }),
			(error: unknown) =>
				error instanceof CalibrationIncompleteError && error.label === 'Follower1' && error.missingIds.join() === '2'
		);
		assert.deepEqual(
			created.map((channel) => channel.closeCount),
			[1, 1]
		);
	});
});

test('startArmSession reports a role count mismatch', async () => {
	await withStore(async (store) => {
		const created: FakeChannel[] = [];

		await assert.rejects(
			startArmSession({ config, logger, createChannel: createFactory(created), expected: { leader: 2, follower: 2 }, store }),
			RoleCountMismatchError
		);
		assert.ok(created.every((channel) => !channel.isOpen()));
	});
});

test('openChannels closes what it opened when a later port fails', async () => {
	const created: FakeChannel[] = [];

	await assert.rejects(
		startArmSession({
			config,
			logger,
			createChannel: createFactory(created, '/dev/ttyACM1'),
			expected: { leader: 1, follower: 1 }
		}),
		(error: unknown) =>
			error instanceof ChannelOpenError &&
			error.port === '/dev/ttyACM1' &&
			error.message === 'Failed to open motor bus at /dev/ttyACM1: Permission denied'
	);
	assert.equal(created[0].closeCount, 1);
});

test('openChannels fails when no port is configured or discovered', async () => {
	await assert.rejects(
		startArmSession({
			config: readTeleopConfig({}),
			logger,
			createChannel: createFactory([]),
			discoverPorts: async () => [],
			expected: { leader: 1 }
		}),
		(error: unknown) => error instanceof ChannelOpenError && error.port === '(none)'
	);
});

test('exitCodeFor maps startup failures to distinct exit codes', () => {
	assert.equal(exitCodeFor(new RoleCountMismatchError({ leader: 1 }, { leader: [], follower: [], unknown: [] })), 2);
	assert.equal(exitCodeFor(new ChannelOpenError('/dev/ttyACM0')), 3);
	assert.equal(exitCodeFor(new CalibrationIncompleteError('Leader1', [1])), 4);
	assert.equal(exitCodeFor(new CalibrationAbortedError('Leader1')), 4);
	assert.equal(exitCodeFor(new Error('boom')), 1);
});

import assert from 'node:assert/strict';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import test from 'node:test';
import type { CalibrationRecord } from '../device/calibrationEngine';
import {
	calibrationFileName,
	CalibrationStore,
	parseCalibration,
	requireCalibration,
	serializeCalibration
} from '../device/calibrationStore';
import { CalibrationIncompleteError } from '../errors/sessionErrors';

const RECORD: CalibrationRecord = {
	motorIds: [1, 2],
	homingOffsets: { '1': 952, '2': -1048 },
	resolution: 4096,
	timestamp: 1_700_000_000,
	role: 'follower',
	port: '/dev/ttyACM0',
	voltage: 12.1
};

test('calibrationFileName derives a file name from role and port', () => {
	assert.equal(calibrationFileName('leader', '/dev/ttyACM0'), 'leader-ttyACM0.json');
	assert.equal(calibrationFileName('follower', '/dev/serial/by-id/usb-1a86:55d3'), 'follower-serial_by-id_usb-1a86_55d3.json');
	assert.equal(calibrationFileName('leader', 'COM5'), 'leader-COM5.json');
	assert.equal(calibrationFileName('leader', '///'), 'leader-port.json');
});

test('serializeCalibration writes the snake_case file layout', () => {
	const text = serializeCalibration(RECORD);

	assert.deepEqual(JSON.parse(text), {
		motor_ids: [1, 2],
		home_positions: { '1': 952, '2': -1048 },
		resolution: 4096,
		timestamp: 1_700_000_000,
		role: 'follower',
		port: '/dev/ttyACM0',
		voltage: 12.1
	});
	assert.ok(text.endsWith('}\n'));
	assert.deepEqual(parseCalibration(text), RECORD);
});

test('parseCalibration rejects malformed files', () => {
	assert.throws(() => parseCalibration('[]'), /must contain a JSON object/);
	assert.throws(
		() => parseCalibration(JSON.stringify({ ...JSON.parse(serializeCalibration(RECORD)), role: 'pilot' })),
		/"role" must be "leader" or "follower"/
	);
	assert.throws(
		() =>
			parseCalibration(JSON.stringify({ ...JSON.parse(serializeCalibration(RECORD)), home_positions: { '1': 2048 } })),
		/offset for motor 1/
	);
});

test('CalibrationStore saves and loads records per role and port', async () => {
	const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'arm-mirror-calibration-'));
	try {
		const store = new CalibrationStore(path.join(directory, 'nested'));

		assert.equal(await store.load('follower', '/dev/ttyACM0'), undefined);
		const saved = await store.save(RECORD);

		assert.equal(saved, path.join(directory, 'nested', 'follower-ttyACM0.json'));
		assert.deepEqual(await store.load('follower', '/dev/ttyACM0'), RECORD);
		assert.equal(await store.load('leader', '/dev/ttyACM0'), undefined);
	} finally {
		await fs.rm(directory, { recursive: true, force: true });
	}
});

test('requireCalibration lists the motors without an offset', () => {
	assert.equal(requireCalibration('Follower1', [1, 2], RECORD), RECORD);
	assert.throws(
		() => requireCalibration('Follower1', [1, 2, 3], RECORD),
		(error: unknown) => error instanceof CalibrationIncompleteError && error.missingIds.join() === '3'
	);
	assert.throws(
		() => requireCalibration('Leader1', [1, 2], undefined),
		(error: unknown) =>
			error instanceof CalibrationIncompleteError &&
			error.message === 'Calibration incomplete for Leader1: no homing offset for motor(s) 1, 2.'
	);
});

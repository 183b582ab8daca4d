import assert from 'node:assert/strict';
import test from 'node:test';
import { DeviceError, isDeviceError } from '../errors/DeviceError';
import {
	CalibrationAbortedError,
	CalibrationIncompleteError,
	ChannelOpenError,
	RoleCountMismatchError
} from '../errors/sessionErrors';
import { TeleopError } from '../errors/TeleopError';

test('DeviceError derives the recovery action from its code', () => {
	const error = new DeviceError({
		code: 'DEVICE_UNRESPONSIVE',
		message: 'motor 3 did not answer',
		op: 'read',
		port: '/dev/ttyACM0',
		motorId: 3
	});
	assert.equal(error.recommendedAction, 'check-motor-id');
	assert.equal(
		error.hint,
		'The motor did not answer before the command timeout. Check the daisy-chain cable and the motor id.'
	);
	assert.equal(error.motorId, 3);
	assert.equal(error.name, 'DeviceError');
	assert.ok(error instanceof TeleopError);
	assert.equal(isDeviceError(error), true);
	assert.equal(isDeviceError(new Error('x')), false);
});

test('DeviceError keeps an explicit recovery action', () => {
	const error = new DeviceError({ code: 'UNKNOWN', message: 'x', op: 'write', recommendedAction: 'none' });
	assert.equal(error.recommendedAction, 'none');
});

test('RoleCountMismatchError lists expected counts and unidentified ports', () => {
	const error = new RoleCountMismatchError(
		{ leader: 2, follower: 2 },
		{ leader: ['/dev/ttyACM1'], follower: ['/dev/ttyACM0'], unknown: ['/dev/ttyACM2'] }
	);
	assert.equal(
		error.message,
		'Role count mismatch: expected 2 leader(s), found 1; expected 2 follower(s), found 1; unidentified: /dev/ttyACM2.'
	);
	assert.equal(error.code, 'ROLE_COUNT_MISMATCH');
});

test('session errors carry their codes and context', () => {
	const incomplete = new CalibrationIncompleteError('Follower1', [2, 5]);
	assert.equal(incomplete.message, 'Calibration incomplete for Follower1: no homing offset for motor(s) 2, 5.');
	assert.deepEqual(incomplete.missingIds, [2, 5]);

	const open = new ChannelOpenError('/dev/ttyUSB0', 'busy');
	assert.equal(open.message, 'Failed to open motor bus at /dev/ttyUSB0: busy');
	assert.equal(open.code, 'CHANNEL_OPEN_FAILED');

	assert.equal(new CalibrationAbortedError('Leader1').message, 'Calibration of Leader1 was cancelled by the operator.');
});

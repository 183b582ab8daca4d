import { TeleopError } from './TeleopError';
import type { ArmRole } from '../device/motorTypes';

/**
 * Startup-fatal: the number of leaders or followers found on the buses does
 * not match what the session was configured for.
 */
export class RoleCountMismatchError extends TeleopError {
	public readonly expected: Partial<Record<ArmRole, number>>;
	public readonly observed: Record<ArmRole | 'unknown', string[]>;

	public constructor(
		expected: Partial<Record<ArmRole, number>>,
		observed: Record<ArmRole | 'unknown', string[]>
	) {
		const parts: string[] = [];
		if (expected.leader !== undefined) {
			parts.push(`expected ${expected.leader} leader(s), found ${observed.leader.length}`);
		}
		if (expected.follower !== undefined) {
			parts.push(`expected ${expected.follower} follower(s), found ${observed.follower.length}`);
		}
		if (observed.unknown.length > 0) {
			parts.push(`unidentified: ${observed.unknown.join(', ')}`);
		}
		super('ROLE_COUNT_MISMATCH', `Role count mismatch: ${parts.join('; ')}.`);
		this.name = 'RoleCountMismatchError';
		this.expected = expected;
		this.observed = observed;
	}
}

/**
 * Blocks entry into the mirror or relay loop: one or more motors have no
 * homing offset on record, or calibration could not reach every motor.
 */
export class CalibrationIncompleteError extends TeleopError {
	public readonly label: string;
	public readonly missingIds: number[];

	public constructor(label: string, missingIds: number[], cause?: unknown) {
		super(
			'CALIBRATION_INCOMPLETE',
			`Calibration incomplete for ${label}: no homing offset for motor(s) ${missingIds.join(', ')}.`,
			cause
		);
		this.name = 'CalibrationIncompleteError';
		this.label = label;
		this.missingIds = missingIds;
	}
}

export class ChannelOpenError extends TeleopError {
	public readonly port: string;

	public constructor(port: string, cause?: unknown) {
		const detail = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
		super('CHANNEL_OPEN_FAILED', `Failed to open motor bus at ${port}: ${detail}`, cause);
		this.name = 'ChannelOpenError';
		this.port = port;
	}
}

export class CalibrationAbortedError extends TeleopError {
	public constructor(label: string) {
		super('CALIBRATION_ABORTED', `Calibration of ${label} was cancelled by the operator.`);
		this.name = 'CalibrationAbortedError';
	}
}

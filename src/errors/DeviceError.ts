import { TeleopError } from './TeleopError';

/**
 * Error codes for motor-bus command failures.
 */
export type DeviceErrorCode =
	| 'DEVICE_UNRESPONSIVE'
	| 'CORRUPT_PACKET'
	| 'TRANSPORT_CLOSED'
	| 'INVALID_ARGUMENT'
	| 'UNKNOWN';

/**
 * Recommended operator action for recovery.
 */
export type DeviceRecoveryAction =
	| 'check-wiring'
	| 'reconnect'
	| 'check-motor-id'
	| 'none';

/**
 * Failure of a single command on one motor of one bus. Carries enough context
 * to be reported per motor id while the channel keeps serving the other ids.
 */
export class DeviceError extends TeleopError {
	public readonly op: string;
	public readonly port?: string;
	public readonly motorId?: number;
	public readonly recommendedAction: DeviceRecoveryAction;
	/** Operator-facing explanation of the code. */
	public readonly hint: string;

	public constructor(options: {
		code: DeviceErrorCode;
		message: string;
		op: string;
		port?: string;
		motorId?: number;
		recommendedAction?: DeviceRecoveryAction;
		cause?: unknown;
	}) {
		super(options.code, options.message, options.cause);
		this.name = 'DeviceError';
		this.op = options.op;
		this.port = options.port;
		this.motorId = options.motorId;
		this.recommendedAction = options.recommendedAction ?? DEVICE_ERROR_MESSAGES[options.code].action;
		this.hint = DEVICE_ERROR_MESSAGES[options.code].message;
	}
}

export const DEVICE_ERROR_MESSAGES: Record<DeviceErrorCode, { message: string; action: DeviceRecoveryAction }> = {
	DEVICE_UNRESPONSIVE: {
		message: 'The motor did not answer before the command timeout. Check the daisy-chain cable and the motor id.',
		action: 'check-motor-id'
	},
	CORRUPT_PACKET: {
		message: 'A reply failed its checksum or framing check.',
		action: 'check-wiring'
	},
	TRANSPORT_CLOSED: {
		message: 'The serial port was closed or unplugged.',
		action: 'reconnect'
	},
	INVALID_ARGUMENT: {
		message: 'An invalid argument was passed to a motor command.',
		action: 'none'
	},
	UNKNOWN: {
		message: 'An unexpected error occurred while talking to the motor bus.',
		action: 'reconnect'
	}
};

export function isDeviceError(error: unknown): error is DeviceError {
	return error instanceof DeviceError;
}

/**
 * STS3215 control table. Only the registers the mirror needs are listed.
 * Addresses 0..39 live in EEPROM and need Lock=0 before they persist.
 */
export const FEETECH_REGISTERS = {
	Model_Number: { address: 3, size: 2 },
	ID: { address: 5, size: 1 },
	Baud_Rate: { address: 6, size: 1 },
	Min_Position_Limit: { address: 9, size: 2 },
	Max_Position_Limit: { address: 11, size: 2 },
	Phase: { address: 18, size: 1 },
	Homing_Offset: { address: 31, size: 2 },
	Operating_Mode: { address: 33, size: 1 },
	Torque_Enable: { address: 40, size: 1 },
	Acceleration: { address: 41, size: 1 },
	Goal_Position: { address: 42, size: 2 },
	Lock: { address: 55, size: 1 },
	Present_Position: { address: 56, size: 2 },
	Present_Velocity: { address: 58, size: 2 },
	Present_Load: { address: 60, size: 2 },
	Present_Voltage: { address: 62, size: 1 },
	Present_Temperature: { address: 63, size: 1 },
	Moving: { address: 66, size: 1 }
} as const satisfies Record<string, { address: number; size: 1 | 2 }>;

export type RegisterName = keyof typeof FEETECH_REGISTERS;

export function isRegisterName(value: string): value is RegisterName {
	return Object.prototype.hasOwnProperty.call(FEETECH_REGISTERS, value);
}

export type MotorModel = 'sts3215' | 'sts3250' | 'scs0009' | 'sm8512bl';

export const MOTOR_MODELS: readonly MotorModel[] = ['sts3215', 'sts3250', 'scs0009', 'sm8512bl'];

/**
 * Number of discrete encoder positions per model.
 */
export const MODEL_RESOLUTION: Record<MotorModel, number> = {
	sts3215: 4096,
	sts3250: 4096,
	scs0009: 1024,
	sm8512bl: 65536
};

/** Operating_Mode value for closed-loop position control. */
export const OPERATING_MODE_POSITION = 0;

/** Present_Voltage is reported in tenths of a volt. */
export const VOLTAGE_UNIT = 0.1;

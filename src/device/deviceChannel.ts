import type { RegisterName } from '../protocol/feetechRegisters';

/**
 * One physical connection to one multi-motor bus. Commands on a channel are
 * strictly sequential; different channels run independently.
 */
export interface DeviceChannel {
	readonly port: string;
	readonly motorIds: readonly number[];
	readonly resolution: number;
	label: string;

	open(): Promise<void>;
	close(): Promise<void>;
	isOpen(): boolean;

	ping(motorId: number): Promise<boolean>;
	readPosition(motorId: number): Promise<number>;
	writePosition(motorId: number, value: number): Promise<void>;
	readVoltage(motorId: number): Promise<number>;
	setRegister(motorId: number, name: RegisterName, value: number): Promise<void>;
	readRegister(motorId: number, name: RegisterName): Promise<number>;
}

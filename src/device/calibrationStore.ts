import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CalibrationIncompleteError } from '../errors/sessionErrors';
import { isValidOffset } from '../protocol/homingOffset';
import type { CalibrationRecord } from './calibrationEngine';
import { ArmRole, isArmRole } from './motorTypes';

/**
 * On-disk layout of one calibration file.
 */
interface CalibrationFile {
	motor_ids: number[];
	home_positions: Record<string, number>;
	resolution: number;
	timestamp: number;
	role: ArmRole;
	port: string;
	voltage?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInteger(value: unknown): value is number {
	return typeof value === 'number' && Number.isInteger(value);
}

export function calibrationFileName(role: ArmRole, port: string): string {
	const slug = port
		.replace(/^\/dev\//, '')
		.replace(/[^A-Za-z0-9._-]+/g, '_')
		.replace(/^_+|_+$/g, '');
	return `${role}-${slug || 'port'}.json`;
}

export function serializeCalibration(record: CalibrationRecord): string {
	const file: CalibrationFile = {
		motor_ids: [...record.motorIds],
		home_positions: { ...record.homingOffsets },
		resolution: record.resolution,
		timestamp: record.timestamp,
		role: record.role,
		port: record.port
	};
	if (record.voltage !== undefined) {
		file.voltage = record.voltage;
	}
	return `${JSON.stringify(file, null, 2)}\n`;
}

export function parseCalibration(text: string): CalibrationRecord {
	const raw: unknown = JSON.parse(text);
	if (!isRecord(raw)) {
		throw new Error('Calibration file must contain a JSON object.');
	}

	const motorIds = raw.motor_ids;
	if (!Array.isArray(motorIds) || !motorIds.every(isInteger)) {
		throw new Error('Calibration file: "motor_ids" must be an array of integers.');
	}
	if (!isInteger(raw.resolution) || raw.resolution < 2) {
		throw new Error('Calibration file: "resolution" must be an integer >= 2.');
	}
	const resolution = raw.resolution;
	if (typeof raw.timestamp !== 'number' || !Number.isFinite(raw.timestamp)) {
		throw new Error('Calibration file: "timestamp" must be a number.');
	}
	if (!isArmRole(raw.role)) {
		throw new Error('Calibration file: "role" must be "leader" or "follower".');
	}
	if (typeof raw.port !== 'string') {
		throw new Error('Calibration file: "port" must be a string.');
	}
	if (raw.voltage !== undefined && (typeof raw.voltage !== 'number' || !Number.isFinite(raw.voltage))) {
		throw new Error('Calibration file: "voltage" must be a number when present.');
	}
	if (!isRecord(raw.home_positions)) {
		throw new Error('Calibration file: "home_positions" must be an object.');
	}

	const homingOffsets: Record<string, number> = {};
	for (const [key, value] of Object.entries(raw.home_positions)) {
		if (!isInteger(value) || !isValidOffset(value, resolution)) {
			throw new Error(`Calibration file: offset for motor ${key} must be an integer with magnitude < ${resolution / 2}.`);
		}
		homingOffsets[key] = value;
	}

	const record: CalibrationRecord = {
		motorIds: [...motorIds],
		homingOffsets,
		resolution,
		timestamp: raw.timestamp,
		role: raw.role,
		port: raw.port
	};
	if (typeof raw.voltage === 'number') {
		record.voltage = raw.voltage;
	}
	return record;
}

/**
 * Stores one JSON file per arm (role + port) in a directory.
 */
export class CalibrationStore {
	private readonly directory: string;

	public constructor(directory: string) {
		this.directory = directory;
	}

	public pathFor(role: ArmRole, port: string): string {
		return path.join(this.directory, calibrationFileName(role, port));
	}

	public async save(record: CalibrationRecord): Promise<string> {
		const filePath = this.pathFor(record.role, record.port);
		await fs.mkdir(this.directory, { recursive: true });
		const tmpPath = `${filePath}.tmp`;
		await fs.writeFile(tmpPath, serializeCalibration(record), 'utf8');
		await fs.rename(tmpPath, filePath);
		return filePath;
	}

	public async load(role: ArmRole, port: string): Promise<CalibrationRecord | undefined> {
		let text: string;
		try {
			text = await fs.readFile(this.pathFor(role, port), 'utf8');
		} catch (error) {
			if (isRecord(error) && error.code === 'ENOENT') {
				return undefined;
			}
			throw error;
		}
		return parseCalibration(text);
	}
}

/**
 * Throws CalibrationIncompleteError unless every motor id has an offset.
 */
export function requireCalibration(
	label: string,
	motorIds: readonly number[],
	record: CalibrationRecord | undefined
): CalibrationRecord {
	const missing = motorIds.filter((motorId) => record?.homingOffsets[String(motorId)] === undefined);
	if (!record || missing.length > 0) {
		throw new CalibrationIncompleteError(label, missing.length > 0 ? missing : [...motorIds]);
	}
	return record;
}

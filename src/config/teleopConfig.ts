import { LOG_LEVELS, LogLevel } from '../diagnostics/logger';
import { MODEL_RESOLUTION, MOTOR_MODELS, MotorModel } from '../protocol/feetechRegisters';
import { sanitizeBoolean, sanitizeEnum, sanitizeFloat, sanitizeMotorIds, sanitizeNumber, sanitizeString } from './sanitizers';

export const DEFAULT_MOTOR_IDS: readonly number[] = [1, 2, 3, 4, 5, 6];
export const DEFAULT_BAUD_RATE = 1_000_000;
export const DEFAULT_FPS = 60;
export const DEFAULT_SMOOTHING = 0.8;
export const DEFAULT_MAX_LATENCY_MS = 200;
export const DEFAULT_MAX_STEP = 200;
export const DEFAULT_STATUS_INTERVAL_MS = 2_000;
export const DEFAULT_LATENCY_WARNING_MS = 100;
export const DEFAULT_LATENCY_WARNING_RUN = 10;
export const DEFAULT_CLOCK_SKEW_TOLERANCE_MS = 50;
export const DEFAULT_RECONNECT_DELAY_MS = 2_000;
export const DEFAULT_COMMAND_TIMEOUT_MS = 100;
export const DEFAULT_RELAY_URL = 'ws://127.0.0.1:8765';
export const DEFAULT_CALIBRATION_DIR = './calibration';
export const DEFAULT_EXPECTED_LEADERS = 2;
export const DEFAULT_EXPECTED_FOLLOWERS = 2;
export const DEFAULT_PHASE_FOLLOWER = 76;
export const DEFAULT_PHASE_LEADER = 12;
export const DEFAULT_SIGN_BIT = 11;

const MAX_FPS = 1_000;
const MIN_TIMEOUT_MS = 5;
const MIN_INTERVAL_MS = 100;

export const LOG_LEVEL_ENV = 'ARM_MIRROR_LOG_LEVEL';
export const RELAY_URL_ENV = 'ARM_MIRROR_RELAY_URL';

/**
 * Unvalidated settings as they arrive from the command line. Numeric options
 * may still be strings.
 */
export interface RawTeleopSettings {
	ports?: unknown;
	motorIds?: unknown;
	baudRate?: unknown;
	model?: unknown;
	fps?: unknown;
	smoothing?: unknown;
	maxLatencyMs?: unknown;
	maxStep?: unknown;
	statusIntervalMs?: unknown;
	latencyWarningMs?: unknown;
	latencyWarningRun?: unknown;
	clockSkewToleranceMs?: unknown;
	reconnectDelayMs?: unknown;
	timeoutMs?: unknown;
	duration?: unknown;
	display?: unknown;
	shuffleMapping?: unknown;
	relayUrl?: unknown;
	calibrationDir?: unknown;
	leaders?: unknown;
	followers?: unknown;
	probeId?: unknown;
	phaseLeader?: unknown;
	phaseFollower?: unknown;
	signBit?: unknown;
	logLevel?: unknown;
}

export interface TeleopConfigSnapshot {
	ports: string[];
	motorIds: number[];
	baudRate: number;
	model: MotorModel;
	resolution: number;
	fps: number;
	smoothing: number;
	maxLatencyMs: number;
	maxStep: number;
	statusIntervalMs: number;
	latencyWarningMs: number;
	latencyWarningRun: number;
	clockSkewToleranceMs: number;
	reconnectDelayMs: number;
	timeoutMs: number;
	/** Seconds; undefined runs until stopped. */
	durationS: number | undefined;
	display: boolean;
	shuffleMapping: boolean;
	relayUrl: string;
	calibrationDir: string;
	expectedLeaders: number;
	expectedFollowers: number;
	probeId: number;
	phase: { leader: number; follower: number };
	signBit: number;
	logLevel: LogLevel;
}

function numeric(value: unknown): unknown {
	if (typeof value === 'string' && value.trim().length > 0) {
		const parsed = Number(value);
		return Number.isNaN(parsed) ? value : parsed;
	}
	return value;
}

function sanitizePorts(value: unknown): string[] {
	const entries = typeof value === 'string' ? value.split(',') : Array.isArray(value) ? value : [];
	const ports = entries
		.filter((entry): entry is string => typeof entry === 'string')
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
	return [...new Set(ports)];
}

export function readTeleopConfig(
	raw: RawTeleopSettings = {},
	env: Record<string, string | undefined> = {}
): TeleopConfigSnapshot {
	const model = sanitizeEnum(raw.model, MOTOR_MODELS, 'sts3215');
	const motorIds = sanitizeMotorIds(raw.motorIds, DEFAULT_MOTOR_IDS);
	const durationRaw = numeric(raw.duration);
	const durationS =
		typeof durationRaw === 'number' && Number.isFinite(durationRaw) && durationRaw > 0 ? durationRaw : undefined;
	const probeRaw = numeric(raw.probeId);
	const probeId =
		typeof probeRaw === 'number' && motorIds.includes(probeRaw) ? probeRaw : motorIds[0] ?? DEFAULT_MOTOR_IDS[0];

	return {
		ports: sanitizePorts(raw.ports),
		motorIds,
		baudRate: sanitizeNumber(numeric(raw.baudRate), DEFAULT_BAUD_RATE, 9_600),
		model,
		resolution: MODEL_RESOLUTION[model],
		fps: sanitizeFloat(numeric(raw.fps), DEFAULT_FPS, 1, MAX_FPS),
		smoothing: sanitizeFloat(numeric(raw.smoothing), DEFAULT_SMOOTHING, 0, 0.99),
		maxLatencyMs: sanitizeNumber(numeric(raw.maxLatencyMs), DEFAULT_MAX_LATENCY_MS, 1),
		maxStep: sanitizeNumber(numeric(raw.maxStep), DEFAULT_MAX_STEP, 1),
		statusIntervalMs: sanitizeNumber(numeric(raw.statusIntervalMs), DEFAULT_STATUS_INTERVAL_MS, MIN_INTERVAL_MS),
		latencyWarningMs: sanitizeNumber(numeric(raw.latencyWarningMs), DEFAULT_LATENCY_WARNING_MS, 1),
		latencyWarningRun: sanitizeNumber(numeric(raw.latencyWarningRun), DEFAULT_LATENCY_WARNING_RUN, 1),
		clockSkewToleranceMs: sanitizeNumber(numeric(raw.clockSkewToleranceMs), DEFAULT_CLOCK_SKEW_TOLERANCE_MS, 0),
		reconnectDelayMs: sanitizeNumber(numeric(raw.reconnectDelayMs), DEFAULT_RECONNECT_DELAY_MS, MIN_INTERVAL_MS),
		timeoutMs: sanitizeNumber(numeric(raw.timeoutMs), DEFAULT_COMMAND_TIMEOUT_MS, MIN_TIMEOUT_MS),
		durationS,
		display: sanitizeBoolean(raw.display, true),
		shuffleMapping: sanitizeBoolean(raw.shuffleMapping, false),
		relayUrl: sanitizeString(raw.relayUrl ?? env[RELAY_URL_ENV], DEFAULT_RELAY_URL),
		calibrationDir: sanitizeString(raw.calibrationDir, DEFAULT_CALIBRATION_DIR),
		expectedLeaders: sanitizeNumber(numeric(raw.leaders), DEFAULT_EXPECTED_LEADERS, 0),
		expectedFollowers: sanitizeNumber(numeric(raw.followers), DEFAULT_EXPECTED_FOLLOWERS, 0),
		probeId,
		phase: {
			leader: sanitizeNumber(numeric(raw.phaseLeader), DEFAULT_PHASE_LEADER, 0, 255),
			follower: sanitizeNumber(numeric(raw.phaseFollower), DEFAULT_PHASE_FOLLOWER, 0, 255)
		},
		signBit: sanitizeNumber(numeric(raw.signBit), DEFAULT_SIGN_BIT, 1, 15),
		logLevel: sanitizeEnum(raw.logLevel ?? env[LOG_LEVEL_ENV], LOG_LEVELS, 'info')
	};
}

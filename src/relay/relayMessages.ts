import { ArmRole, isArmRole } from '../device/motorTypes';

/** Raw ticks keyed by leader label, then by motor id. */
export type ArmPositions = Record<string, Record<string, number>>;

export interface TelemetryMessage {
	type: 'telemetry';
	sequence: number;
	/** Capture time on the leader, epoch ms. */
	timestamp?: number;
	positions: ArmPositions;
	/** Leader label → follower label, as the leader currently maps them. */
	mapping?: Record<string, string>;
	/** Latest round-trip estimate on the leader, ms. */
	rttMs?: number;
	leaderId: string;
}

export interface AckMessage {
	type: 'ack';
	sequence: number;
	/** Capture time echoed from the telemetry. */
	timestamp?: number;
	receivedAt: number;
	followerId: string;
}

export interface StatusMessage {
	type: 'status';
	role: ArmRole;
	senderId: string;
	timestamp: number;
	motorsActive: number;
	armsConnected: number;
	counters?: Record<string, number>;
}

export interface DisconnectMessage {
	type: 'disconnect';
	role: ArmRole;
	senderId: string;
	timestamp: number;
}

export type RelayMessage = TelemetryMessage | AckMessage | StatusMessage | DisconnectMessage;

export type DecodeResult = { ok: true; message: RelayMessage } | { ok: false; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSequence(value: unknown): value is number {
	return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

function isFiniteNumber(value: unknown): value is number {
	return typeof value === 'number' && Number.isFinite(value);
}

function isNonEmptyString(value: unknown): value is string {
	return typeof value === 'string' && value.length > 0;
}

function optionalNumber(value: unknown): value is number | undefined {
	return value === undefined || isFiniteNumber(value);
}

function parsePositions(value: unknown): ArmPositions | undefined {
	if (!isRecord(value)) {
		return undefined;
	}
	const out: ArmPositions = {};
	for (const [label, motors] of Object.entries(value)) {
		if (!isRecord(motors)) {
			return undefined;
		}
		const arm: Record<string, number> = {};
		for (const [motorId, raw] of Object.entries(motors)) {
			if (!/^\d+$/.test(motorId) || !isFiniteNumber(raw)) {
				return undefined;
			}
			arm[motorId] = raw;
		}
		out[label] = arm;
	}
	return out;
}

function parseStringRecord(value: unknown): Record<string, string> | undefined {
	if (!isRecord(value)) {
		return undefined;
	}
	const out: Record<string, string> = {};
	for (const [key, entry] of Object.entries(value)) {
		if (typeof entry !== 'string') {
			return undefined;
		}
		out[key] = entry;
	}
	return out;
}

function parseCounters(value: unknown): Record<string, number> | undefined {
	if (!isRecord(value)) {
		return undefined;
	}
	const out: Record<string, number> = {};
	for (const [key, entry] of Object.entries(value)) {
		if (!isFiniteNumber(entry)) {
			return undefined;
		}
		out[key] = entry;
	}
	return out;
}

function fail(reason: string): DecodeResult {
	return { ok: false, reason };
}

export function validateRelayMessage(value: unknown): DecodeResult {
	if (!isRecord(value)) {
		return fail('message is not an object');
	}

	switch (value.type) {
		case 'telemetry': {
			if (!isSequence(value.sequence)) {
				return fail('telemetry.sequence must be a non-negative integer');
			}
			if (!optionalNumber(value.timestamp) || !optionalNumber(value.rttMs)) {
				return fail('telemetry.timestamp and telemetry.rttMs must be numbers when present');
			}
			if (!isNonEmptyString(value.leaderId)) {
				return fail('telemetry.leaderId is required');
			}
			const positions = parsePositions(value.positions);
			if (!positions) {
				return fail('telemetry.positions must map labels to motor positions');
			}
			const mapping = value.mapping === undefined ? undefined : parseStringRecord(value.mapping);
			if (value.mapping !== undefined && !mapping) {
				return fail('telemetry.mapping must map labels to labels');
			}
			const message: TelemetryMessage = {
				type: 'telemetry',
				sequence: value.sequence,
				positions,
				leaderId: value.leaderId
			};
			if (value.timestamp !== undefined) {
				message.timestamp = value.timestamp;
			}
			if (mapping) {
				message.mapping = mapping;
			}
			if (value.rttMs !== undefined) {
				message.rttMs = value.rttMs;
			}
			return { ok: true, message };
		}
		case 'ack': {
			if (!isSequence(value.sequence) || !isFiniteNumber(value.receivedAt) || !optionalNumber(value.timestamp)) {
				return fail('ack needs sequence and receivedAt');
			}
			if (!isNonEmptyString(value.followerId)) {
				return fail('ack.followerId is required');
			}
			const message: AckMessage = {
				type: 'ack',
				sequence: value.sequence,
				receivedAt: value.receivedAt,
				followerId: value.followerId
			};
			if (value.timestamp !== undefined) {
				message.timestamp = value.timestamp;
			}
			return { ok: true, message };
		}
		case 'status': {
			if (!isArmRole(value.role) || !isNonEmptyString(value.senderId) || !isFiniteNumber(value.timestamp)) {
				return fail('status needs role, senderId and timestamp');
			}
			if (!isSequence(value.motorsActive) || !isSequence(value.armsConnected)) {
				return fail('status.motorsActive and status.armsConnected must be counts');
			}
			const counters = value.counters === undefined ? undefined : parseCounters(value.counters);
			if (value.counters !== undefined && !counters) {
				return fail('status.counters must map names to numbers');
			}
			const message: StatusMessage = {
				type: 'status',
				role: value.role,
				senderId: value.senderId,
				timestamp: value.timestamp,
				motorsActive: value.motorsActive,
				armsConnected: value.armsConnected
			};
			if (counters) {
				message.counters = counters;
			}
			return { ok: true, message };
		}
		case 'disconnect': {
			if (!isArmRole(value.role) || !isNonEmptyString(value.senderId) || !isFiniteNumber(value.timestamp)) {
				return fail('disconnect needs role, senderId and timestamp');
			}
			return {
				ok: true,
				message: { type: 'disconnect', role: value.role, senderId: value.senderId, timestamp: value.timestamp }
			};
		}
		default:
			return fail(`unknown message type ${JSON.stringify(value.type)}`);
	}
}

export function encodeRelayMessage(message: RelayMessage): string {
	return JSON.stringify(message);
}

export function decodeRelayMessage(payload: string): DecodeResult {
	let parsed: unknown;
	try {
		parsed = JSON.parse(payload);
	} catch (error) {
		return fail(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`);
	}
	return validateRelayMessage(parsed);
}

import type { RawData } from 'ws';

/** Frames a client sends to the hub. */
export type ClientFrame =
	| { op: 'subscribe'; channel: string }
	| { op: 'unsubscribe'; channel: string }
	| { op: 'publish'; channel: string; data: string };

/** Frames the hub sends to a client. */
export interface HubMessageFrame {
	op: 'message';
	channel: string;
	data: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function rawDataToString(data: RawData): string {
	if (Buffer.isBuffer(data)) {
		return data.toString('utf8');
	}
	if (Array.isArray(data)) {
		return Buffer.concat(data).toString('utf8');
	}
	return Buffer.from(data).toString('utf8');
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

export function parseClientFrame(text: string): ClientFrame | undefined {
	const value = parseJson(text);
	if (!isRecord(value) || typeof value.channel !== 'string' || value.channel.length === 0) {
		return undefined;
	}
	switch (value.op) {
		case 'subscribe':
		case 'unsubscribe':
			return { op: value.op, channel: value.channel };
		case 'publish':
			return typeof value.data === 'string' ? { op: 'publish', channel: value.channel, data: value.data } : undefined;
		default:
			return undefined;
	}
}

export function parseHubFrame(text: string): HubMessageFrame | undefined {
	const value = parseJson(text);
	if (!isRecord(value) || value.op !== 'message') {
		return undefined;
	}
	if (typeof value.channel !== 'string' || typeof value.data !== 'string') {
		return undefined;
	}
	return { op: 'message', channel: value.channel, data: value.data };
}

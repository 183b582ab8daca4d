/**
 * Feetech SCS/STS serial protocol ("protocol 0").
 *
 * Instruction: FF FF ID LEN INSTR P1..Pn CHK   (LEN = n + 2)
 * Status:      FF FF ID LEN ERR   P1..Pn CHK   (LEN = n + 2)
 * CHK = ~(ID + LEN + INSTR/ERR + P1 + .. + Pn) & 0xFF
 *
 * Multi-byte register values are little-endian on STS series servos.
 */

export interface FeetechStatusPacket {
	id: number;
	error: number;
	params: Uint8Array;
}

export const FEETECH_HEADER = 0xff;
export const BROADCAST_ID = 0xfe;
export const MAX_MOTOR_ID = 0xfd;

const MIN_STATUS_PACKET_BYTES = 6;

export const FEETECH_INSTRUCTION = {
	PING: 0x01,
	READ: 0x02,
	WRITE: 0x03,
	REG_WRITE: 0x04,
	ACTION: 0x05,
	SYNC_READ: 0x82,
	SYNC_WRITE: 0x83
} as const;

export type FeetechInstruction = (typeof FEETECH_INSTRUCTION)[keyof typeof FEETECH_INSTRUCTION];

/**
 * Status error bits reported in the ERR byte.
 */
export const FEETECH_STATUS_ERROR = {
	VOLTAGE: 0x01,
	ANGLE: 0x02,
	OVERHEAT: 0x04,
	OVERCURRENT: 0x08,
	OVERLOAD: 0x20
} as const;

export function checksum(bytes: Uint8Array, start: number, endExclusive: number): number {
	let sum = 0;
	for (let i = start; i < endExclusive; i += 1) {
		sum += bytes[i];
	}
	return ~sum & 0xff;
}

export function encodeInstructionPacket(
	id: number,
	instruction: FeetechInstruction,
	params: Uint8Array = new Uint8Array()
): Uint8Array {
	if (!Number.isInteger(id) || id < 0 || id > BROADCAST_ID) {
		throw new Error(`Invalid Feetech motor id ${id}.`);
	}

	const length = params.length + 2;
	const out = new Uint8Array(4 + length);
	out[0] = FEETECH_HEADER;
	out[1] = FEETECH_HEADER;
	out[2] = id;
	out[3] = length;
	out[4] = instruction;
	out.set(params, 5);
	out[out.length - 1] = checksum(out, 2, out.length - 1);
	return out;
}

export function encodePing(id: number): Uint8Array {
	return encodeInstructionPacket(id, FEETECH_INSTRUCTION.PING);
}

export function encodeRead(id: number, address: number, byteCount: number): Uint8Array {
	return encodeInstructionPacket(id, FEETECH_INSTRUCTION.READ, new Uint8Array([address & 0xff, byteCount & 0xff]));
}

export function encodeWrite(id: number, address: number, data: Uint8Array): Uint8Array {
	const params = new Uint8Array(1 + data.length);
	params[0] = address & 0xff;
	params.set(data, 1);
	return encodeInstructionPacket(id, FEETECH_INSTRUCTION.WRITE, params);
}

export function decodeStatusPacket(packet: Uint8Array): FeetechStatusPacket {
	if (packet.length < MIN_STATUS_PACKET_BYTES) {
		throw new Error(`Invalid Feetech packet: expected at least ${MIN_STATUS_PACKET_BYTES} bytes, got ${packet.length}.`);
	}
	if (packet[0] !== FEETECH_HEADER || packet[1] !== FEETECH_HEADER) {
		throw new Error('Invalid Feetech packet: missing 0xFF 0xFF header.');
	}

	const declaredLength = packet[3];
	const actualLength = packet.length - 4;
	if (declaredLength !== actualLength) {
		throw new Error(`Invalid Feetech packet length: declared ${declaredLength}, actual ${actualLength}.`);
	}

	const expected = checksum(packet, 2, packet.length - 1);
	const received = packet[packet.length - 1];
	if (expected !== received) {
		throw new Error(
			`Invalid Feetech packet checksum: expected 0x${expected.toString(16)}, got 0x${received.toString(16)}.`
		);
	}

	return {
		id: packet[2],
		error: packet[4],
		params: packet.subarray(5, packet.length - 1)
	};
}

export function describeStatusError(error: number): string[] {
	const flags: string[] = [];
	if (error & FEETECH_STATUS_ERROR.VOLTAGE) {
		flags.push('voltage');
	}
	if (error & FEETECH_STATUS_ERROR.ANGLE) {
		flags.push('angle');
	}
	if (error & FEETECH_STATUS_ERROR.OVERHEAT) {
		flags.push('overheat');
	}
	if (error & FEETECH_STATUS_ERROR.OVERCURRENT) {
		flags.push('overcurrent');
	}
	if (error & FEETECH_STATUS_ERROR.OVERLOAD) {
		flags.push('overload');
	}
	return flags;
}

/**
 * Pulls the next complete status packet out of a receive buffer.
 * Bytes before a 0xFF 0xFF header are line noise and are dropped.
 */
export function extractStatusPacket(
	receiveBuffer: Buffer
): { packet: Uint8Array; remaining: Buffer; discarded: number } | undefined {
	let start = 0;
	while (start + 1 < receiveBuffer.length) {
		if (receiveBuffer[start] === FEETECH_HEADER && receiveBuffer[start + 1] === FEETECH_HEADER) {
			break;
		}
		start += 1;
	}
	// A third 0xFF means the first byte was noise: the id can never be 0xFF.
	while (start + 2 < receiveBuffer.length && receiveBuffer[start + 2] === FEETECH_HEADER) {
		start += 1;
	}

	if (start + 4 > receiveBuffer.length) {
		return undefined;
	}

	const length = receiveBuffer[start + 3];
	const totalLength = 4 + length;
	if (start + totalLength > receiveBuffer.length) {
		return undefined;
	}

	const packet = new Uint8Array(Buffer.from(receiveBuffer.subarray(start, start + totalLength)));
	const remaining = Buffer.from(receiveBuffer.subarray(start + totalLength));
	return { packet, remaining, discarded: start };
}

export function encodeUint(value: number, byteCount: 1 | 2): Uint8Array {
	if (byteCount === 1) {
		return new Uint8Array([value & 0xff]);
	}
	return new Uint8Array([value & 0xff, (value >> 8) & 0xff]);
}

export function decodeUint(params: Uint8Array, byteCount: 1 | 2): number {
	if (params.length < byteCount) {
		throw new Error(`Feetech reply too short: expected ${byteCount} byte(s), got ${params.length}.`);
	}
	return byteCount === 1 ? params[0] : params[0] | (params[1] << 8);
}

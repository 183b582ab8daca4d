import { Logger, NoopLogger } from '../diagnostics/logger';

export interface SerialCandidate {
	path: string;
	manufacturer?: string;
	serialNumber?: string;
	pnpId?: string;
}

const ROBOT_PORT_PATTERNS: Partial<Record<NodeJS.Platform, RegExp>> = {
	darwin: /usbmodem|usbserial/,
	linux: /ttyUSB|ttyACM/,
	win32: /^COM\d+$/i
};

export type SerialPortLister = () => Promise<SerialCandidate[]>;

const listWithSerialPort: SerialPortLister = async () => {
	const { SerialPort } = await import('serialport');
	const ports = await SerialPort.list();
	return ports.map((entry) => ({
		path: entry.path,
		manufacturer: entry.manufacturer,
		serialNumber: entry.serialNumber,
		pnpId: entry.pnpId
	}));
};

/**
 * Serial ports known to the OS. Enumeration failures leave discovery empty;
 * ports can still be named explicitly.
 */
export async function listSerialCandidates(
	list: SerialPortLister = listWithSerialPort,
	logger: Logger = new NoopLogger()
): Promise<SerialCandidate[]> {
	try {
		return await list();
	} catch (error) {
		logger.warn('Serial port enumeration failed', { error: error instanceof Error ? error.message : String(error) });
		return [];
	}
}

/**
 * Keeps the ports that look like USB servo adapters on this platform,
 * sorted by path so labels stay stable across runs.
 */
export function filterRobotPorts(candidates: SerialCandidate[], platform: NodeJS.Platform = process.platform): string[] {
	const pattern = ROBOT_PORT_PATTERNS[platform];
	const paths = candidates
		.map((candidate) => candidate.path)
		.filter((path) => (pattern ? pattern.test(path) : true));
	return [...new Set(paths)].sort((left, right) => left.localeCompare(right, undefined, { numeric: true }));
}

export async function findRobotPorts(
	platform: NodeJS.Platform = process.platform,
	logger?: Logger
): Promise<string[]> {
	return filterRobotPorts(await listSerialCandidates(listWithSerialPort, logger), platform);
}

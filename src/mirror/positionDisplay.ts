import type { PositionMap } from '../device/motorTypes';
import { rawToDegrees, rawToPercent } from '../protocol/homingOffset';

export type LimitStatus = 'MIN' | 'MAX' | 'OK';

/** Ticks from either limit that still count as "at the limit". */
export const LIMIT_TOLERANCE_TICKS = 10;

export function limitStatus(raw: number, min: number, max: number, tolerance = LIMIT_TOLERANCE_TICKS): LimitStatus {
	if (raw <= min + tolerance) {
		return 'MIN';
	}
	if (raw >= max - tolerance) {
		return 'MAX';
	}
	return 'OK';
}

export function formatPercent(raw: number, resolution: number): string {
	return `${rawToPercent(raw, resolution).toFixed(1)}%`;
}

export function formatArmPositions(label: string, positions: PositionMap, resolution: number): string {
	const cells = [...positions]
		.sort(([a], [b]) => a - b)
		.map(([motorId, raw]) => `M${motorId} ${formatPercent(raw, resolution)}`);
	return `${label}: ${cells.length > 0 ? cells.join('  ') : '(no data)'}`;
}

export interface MonitorReading {
	motorId: number;
	raw: number;
	resolution: number;
	minLimit?: number;
	maxLimit?: number;
	voltage?: number;
	temperature?: number;
	load?: number;
}

export function formatMonitorRow(reading: MonitorReading): string {
	const { motorId, raw, resolution } = reading;
	const status = limitStatus(raw, reading.minLimit ?? 0, reading.maxLimit ?? resolution - 1);
	const parts = [
		`M${motorId}`,
		`raw ${String(raw).padStart(5)}`,
		`${rawToDegrees(raw, resolution).toFixed(1).padStart(6)}°`,
		formatPercent(raw, resolution).padStart(6),
		`[${status}]`
	];
	if (reading.voltage !== undefined) {
		parts.push(`${reading.voltage.toFixed(1)}V`);
	}
	if (reading.temperature !== undefined) {
		parts.push(`${reading.temperature}°C`);
	}
	if (reading.load !== undefined) {
		parts.push(`load ${reading.load}`);
	}
	return parts.join('  ');
}

/**
 * Redraws a block of lines in place on an ANSI terminal.
 */
export class PositionDisplay {
	private readonly write: (text: string) => void;
	private previousLines = 0;

	public constructor(write: (text: string) => void) {
		this.write = write;
	}

	public render(lines: readonly string[]): void {
		let out = '';
		if (this.previousLines > 0) {
			out += `\u001b[${this.previousLines}A`;
		}
		for (const line of lines) {
			out += `\u001b[2K${line}\n`;
		}
		this.write(out);
		this.previousLines = lines.length;
	}

	public reset(): void {
		this.previousLines = 0;
	}
}

import { Logger, NoopLogger } from '../diagnostics/logger';
import { RoleCountMismatchError } from '../errors/sessionErrors';
import type { DeviceChannel } from './deviceChannel';
import { ArmLabel, ArmRole, IdentifiedRole, roleLabel } from './motorTypes';

export interface VoltageBand {
	nominal: number;
	tolerance: number;
}

export type RoleBands = Record<ArmRole, VoltageBand>;

/** Leader arms run from a 5V supply, followers from 12V. */
export const DEFAULT_ROLE_BANDS: RoleBands = {
	leader: { nominal: 5, tolerance: 0.5 },
	follower: { nominal: 12, tolerance: 1 }
};

export interface RoleAssignment<TChannel extends DeviceChannel = DeviceChannel> {
	channel: TChannel;
	role: ArmRole;
	label: ArmLabel;
	voltage: number;
}

export interface Identification {
	role: IdentifiedRole;
	voltage?: number;
	error?: string;
}

export type ExpectedRoleCounts = Partial<Record<ArmRole, number>>;

const BAND_EPSILON = 1e-9;

function withinBand(voltage: number, band: VoltageBand): boolean {
	return Math.abs(voltage - band.nominal) <= band.tolerance + BAND_EPSILON;
}

export function classifyVoltage(voltage: number, bands: RoleBands = DEFAULT_ROLE_BANDS): IdentifiedRole {
	if (!Number.isFinite(voltage)) {
		return 'unknown';
	}
	if (withinBand(voltage, bands.leader)) {
		return 'leader';
	}
	if (withinBand(voltage, bands.follower)) {
		return 'follower';
	}
	return 'unknown';
}

/**
 * Classifies one opened channel by the supply voltage seen at its probe motor.
 * A probe that does not answer yields `unknown`; misclassification is left to
 * the operator rather than retried.
 */
export async function identify(
	channel: DeviceChannel,
	probeId: number = channel.motorIds[0],
	bands: RoleBands = DEFAULT_ROLE_BANDS
): Promise<Identification> {
	try {
		const voltage = await channel.readVoltage(probeId);
		return { role: classifyVoltage(voltage, bands), voltage };
	} catch (error) {
		return { role: 'unknown', error: error instanceof Error ? error.message : String(error) };
	}
}

export interface AssignRolesOptions<TChannel extends DeviceChannel> {
	channels: readonly TChannel[];
	expected: ExpectedRoleCounts;
	probeId?: number;
	bands?: RoleBands;
	logger?: Logger;
}

/**
 * Identifies every channel and labels them per role in channel order. Throws
 * RoleCountMismatchError when a role with an expected count comes out short
 * or over.
 */
export async function assignRoles<TChannel extends DeviceChannel>(
	options: AssignRolesOptions<TChannel>
): Promise<RoleAssignment<TChannel>[]> {
	const logger = options.logger ?? new NoopLogger();
	const bands = options.bands ?? DEFAULT_ROLE_BANDS;
	const found: Record<ArmRole, Array<{ channel: TChannel; voltage: number }>> = { leader: [], follower: [] };
	const unknown: string[] = [];

	for (const channel of options.channels) {
		const result = await identify(channel, options.probeId ?? channel.motorIds[0], bands);
		if (result.role === 'unknown' || result.voltage === undefined) {
			unknown.push(channel.port);
			logger.warn('Could not identify arm role', {
				port: channel.port,
				voltage: result.voltage,
				error: result.error
			});
			continue;
		}
		found[result.role].push({ channel, voltage: result.voltage });
		logger.info('Identified arm', { port: channel.port, role: result.role, voltage: result.voltage });
	}

	const leaderMismatch = options.expected.leader !== undefined && found.leader.length !== options.expected.leader;
	const followerMismatch =
		options.expected.follower !== undefined && found.follower.length !== options.expected.follower;
	if (leaderMismatch || followerMismatch) {
		throw new RoleCountMismatchError(options.expected, {
			leader: found.leader.map((entry) => entry.channel.port),
			follower: found.follower.map((entry) => entry.channel.port),
			unknown
		});
	}

	const assignments: RoleAssignment<TChannel>[] = [];
	for (const role of ['leader', 'follower'] as const) {
		if (options.expected[role] === undefined) {
			continue;
		}
		found[role].forEach((entry, index) => {
			const label = roleLabel(role, index);
			entry.channel.label = label;
			assignments.push({ channel: entry.channel, role, label, voltage: entry.voltage });
		});
	}
	return assignments;
}

export function assignmentsFor<TChannel extends DeviceChannel>(
	assignments: readonly RoleAssignment<TChannel>[],
	role: ArmRole
): RoleAssignment<TChannel>[] {
	return assignments.filter((assignment) => assignment.role === role);
}

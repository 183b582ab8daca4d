import type { Logger } from '../diagnostics/logger';
import type { ArmLabel } from '../device/motorTypes';
import type { MappingTable } from './mappingTable';

export interface RemapRequest {
	first?: ArmLabel;
	second?: ArmLabel;
	source?: string;
}

/**
 * Remap requests posted from input handlers, applied by the loop between
 * cycles so a cycle always sees one consistent mapping.
 */
export class RemapQueue {
	private pending: RemapRequest[] = [];

	public post(request: RemapRequest = {}): void {
		this.pending.push(request);
	}

	public get size(): number {
		return this.pending.length;
	}

	/**
	 * Applies every pending request in order; returns how many changed the table.
	 */
	public drain(table: MappingTable, logger?: Logger): number {
		const requests = this.pending;
		this.pending = [];
		let applied = 0;
		for (const request of requests) {
			try {
				if (table.remap(request.first, request.second)) {
					applied += 1;
					logger?.info('Mapping switched', { mapping: table.toRecord(), source: request.source });
				} else {
					logger?.warn('Remap ignored: fewer than two pairs to swap', { size: table.size });
				}
			} catch (error) {
				logger?.warn('Remap rejected', { error: error instanceof Error ? error.message : String(error) });
			}
		}
		return applied;
	}
}

// ---------------------------------------------------------------------------
// StatusWriter — marks exported rows as consumed in their origin table
// ---------------------------------------------------------------------------

import { CONSUMED_STATUS, PENDING_STATUS } from "../filter/row-filter";
import type { SourceError } from "../result/errors";
import { Ok, type Result } from "../result/result";
import { cellRef } from "../source/a1";
import type { FilteredRow, RangeUpdate, SourceRef, TabularApi } from "../source/types";

/** Options for {@link StatusWriter}. */
export interface StatusWriterOptions {
	/** Status a row must still carry to be marked (default {@link PENDING_STATUS}). */
	pendingStatus?: string;
	/** Status written into column A (default {@link CONSUMED_STATUS}). */
	consumedStatus?: string;
}

/**
 * Writes the consumed status back into the rows a pass exported.
 *
 * Rows are matched on column B against the table's current contents, not
 * the copy fetched earlier in the pass. Each accepted row marks at most one
 * table row and each table row takes at most one mark, first match wins.
 * All writes go out in a single batch; nothing is sent when there is nothing
 * to mark. There is no rollback: a failed batch leaves the rows unmarked.
 */
export class StatusWriter {
	private readonly pendingStatus: string;
	private readonly consumedStatus: string;

	constructor(
		private readonly api: TabularApi,
		options: StatusWriterOptions = {},
	) {
		this.pendingStatus = options.pendingStatus ?? PENDING_STATUS;
		this.consumedStatus = options.consumedStatus ?? CONSUMED_STATUS;
	}

	/** Mark `acceptedRows` as consumed. Resolves to the number of table rows marked. */
	async markConsumed(
		ref: SourceRef,
		acceptedRows: readonly FilteredRow[],
	): Promise<Result<number, SourceError>> {
		if (acceptedRows.length === 0) return Ok(0);

		const current = await this.api.getValues(ref.sourceId, ref.tableName);
		if (!current.ok) return current;

		const updates = this.planUpdates(ref, current.value, acceptedRows);
		if (updates.length === 0) return Ok(0);

		const applied = await this.api.batchUpdate(ref.sourceId, updates);
		if (!applied.ok) return applied;
		return Ok(updates.length);
	}

	/** Range writes needed to mark `acceptedRows` within `values` (header row included). */
	planUpdates(
		ref: SourceRef,
		values: ReadonlyArray<ReadonlyArray<string | null | undefined>>,
		acceptedRows: readonly FilteredRow[],
	): RangeUpdate[] {
		const used = new Array<boolean>(acceptedRows.length).fill(false);
		const updates: RangeUpdate[] = [];

		// Row 0 is the header; sheet rows are one-based.
		for (let i = 1; i < values.length; i++) {
			const row = values[i];
			if (!row || row[0] !== this.pendingStatus) continue;
			const key = row[1];
			if (key == null || key === "") continue;

			const match = acceptedRows.findIndex((accepted, j) => !used[j] && accepted.values[1] === key);
			if (match === -1) continue;

			used[match] = true;
			updates.push({ rangeRef: cellRef(ref.tableName, 0, i + 1), values: [[this.consumedStatus]] });
		}

		return updates;
	}
}

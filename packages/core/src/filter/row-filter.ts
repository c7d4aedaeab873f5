import { ConfigurationError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import type { FilteredRow, RawRow, SourceRef } from "../source/types";

/** Status marking a row as awaiting processing. */
export const PENDING_STATUS = "New Request";

/** Status written back once a row has been exported. */
export const CONSUMED_STATUS = "Submitted / In Progress";

/** Options for {@link RowFilter}. */
export interface RowFilterOptions {
	/** Value column A must equal for a row to be included (default {@link PENDING_STATUS}). */
	pendingStatus?: string;
}

/**
 * Inclusion predicate over raw rows.
 *
 * A row survives iff its first cell equals the pending status and its
 * second cell is non-null and non-empty. Pure and order-preserving.
 */
export class RowFilter {
	readonly pendingStatus: string;

	constructor(options: RowFilterOptions = {}) {
		this.pendingStatus = options.pendingStatus ?? PENDING_STATUS;
	}

	/** Whether a single row satisfies the predicate. */
	matches(row: RawRow): boolean {
		const key = row[1];
		return row[0] === this.pendingStatus && key != null && key !== "";
	}

	/**
	 * Filter the rows of one table and tag survivors with their origin.
	 *
	 * Tables declaring fewer than two columns are a {@link ConfigurationError}.
	 */
	apply(
		ref: SourceRef,
		headers: readonly string[],
		rows: readonly RawRow[],
	): Result<FilteredRow[], ConfigurationError> {
		if (headers.length < 2) {
			return Err(
				new ConfigurationError(
					`Spreadsheet ${ref.sourceId}, sheet ${ref.tableName} has ${headers.length} column(s); at least 2 are required`,
				),
			);
		}

		const out: FilteredRow[] = [];
		for (const row of rows) {
			if (this.matches(row)) {
				out.push({ sourceId: ref.sourceId, tableName: ref.tableName, headers, values: row });
			}
		}
		return Ok(out);
	}
}

// ---------------------------------------------------------------------------
// SourceReader — fetches metadata and rectangular rows for one table
// ---------------------------------------------------------------------------

import { NotFoundError, type SourceError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import type { Cell, RawRow, RawTable, SourceRef, TableMetadata, TabularApi } from "./types";

/**
 * Reads tables through a {@link TabularApi}.
 *
 * Metadata and rows are separate calls: metadata is cheap, rows are not.
 * Rows come back rectangular: every data row is padded with `null` or
 * truncated to the header width.
 */
export class SourceReader {
	constructor(private readonly api: TabularApi) {}

	/** Metadata for one table, or {@link NotFoundError} when the spreadsheet has no table of that name. */
	async fetchMetadata(ref: SourceRef): Promise<Result<TableMetadata, SourceError>> {
		const result = await this.api.getMetadata(ref.sourceId);
		if (!result.ok) return result;

		const table = result.value.tables.find((t) => t.name === ref.tableName);
		if (!table) {
			return Err(
				new NotFoundError(`Table "${ref.tableName}" not found in spreadsheet ${ref.sourceId}`),
			);
		}

		return Ok({
			rowCount: table.rowCount,
			columnCount: table.columnCount,
			modifiedTime: result.value.modifiedTime,
		});
	}

	/**
	 * Current rows of one table with the header row split off.
	 *
	 * Resolves to `null` when the table holds no values at all.
	 */
	async fetchRows(ref: SourceRef): Promise<Result<RawTable | null, SourceError>> {
		const result = await this.api.getValues(ref.sourceId, ref.tableName);
		if (!result.ok) return result;
		return Ok(toRawTable(result.value));
	}
}

/** Split off the header row and normalise every data row to the header width. */
export function toRawTable(values: ReadonlyArray<ReadonlyArray<string | null | undefined>>): RawTable | null {
	const [headerRow, ...dataRows] = values;
	if (!headerRow) return null;

	const headers = headerRow.map((cell) => (cell == null ? "" : String(cell)));
	const rows = dataRows.map((row) => normaliseRow(row, headers.length));
	return { headers, rows };
}

/** Pad with `null` or truncate `row` to exactly `width` cells. */
export function normaliseRow(row: ReadonlyArray<string | null | undefined>, width: number): RawRow {
	const out: Cell[] = [];
	for (let i = 0; i < width; i++) {
		const cell = row[i];
		out.push(cell === undefined ? null : cell);
	}
	return out;
}

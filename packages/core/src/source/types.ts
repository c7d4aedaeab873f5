// ---------------------------------------------------------------------------
// Source model — identities, rows and metadata of remote tables
// ---------------------------------------------------------------------------

import type { Result } from "../result/result";
import type { SourceError } from "../result/errors";

/** Identifies one fetchable table: a spreadsheet and one of its sheets. */
export interface SourceRef {
	readonly sourceId: string;
	readonly tableName: string;
}

/** A single cell. `null` marks a cell the remote did not return (padding). */
export type Cell = string | null;

/** One data row, normalised to the header width. */
export type RawRow = readonly Cell[];

/** Header row plus rectangular data rows of one table. */
export interface RawTable {
	readonly headers: readonly string[];
	readonly rows: readonly RawRow[];
}

/** A raw row that passed the inclusion predicate, tagged with its origin. */
export interface FilteredRow {
	readonly sourceId: string;
	readonly tableName: string;
	/** Column names, shared by every row of the same table. */
	readonly headers: readonly string[];
	readonly values: RawRow;
}

/** Cheap per-table metadata used for advisory change signals. */
export interface TableMetadata {
	readonly rowCount: number;
	readonly columnCount: number;
	/** Opaque; only ever compared for equality. */
	readonly modifiedTime: string;
}

// ---------------------------------------------------------------------------
// Remote tabular API — the collaborator contract
// ---------------------------------------------------------------------------

/** Grid dimensions of one table as reported by the remote. */
export interface RemoteTableInfo {
	name: string;
	rowCount: number;
	columnCount: number;
}

/** Spreadsheet-level metadata as reported by the remote. */
export interface RemoteMetadata {
	tables: RemoteTableInfo[];
	modifiedTime: string;
}

/** A single range write, e.g. `{ rangeRef: "'Intake'!A5", values: [["Done"]] }`. */
export interface RangeUpdate {
	rangeRef: string;
	values: string[][];
}

/**
 * Operations the core needs from a remote spreadsheet service.
 *
 * Implementations convert every failure into a {@link SourceError}; they never throw.
 */
export interface TabularApi {
	getMetadata(sourceId: string): Promise<Result<RemoteMetadata, SourceError>>;
	/** All values of the table, first row being the headers. Empty array when the table is blank. */
	getValues(sourceId: string, tableName: string): Promise<Result<string[][], SourceError>>;
	/** Apply all updates in one request. Resolves to the number of cells written. */
	batchUpdate(sourceId: string, updates: RangeUpdate[]): Promise<Result<number, SourceError>>;
}

/** Tracking key for a source: `sourceId + "_" + tableName`. */
export function sourceKey(ref: SourceRef): string {
	return `${ref.sourceId}_${ref.tableName}`;
}

/** Human-readable label used in log lines and reports. */
export function describeSource(ref: SourceRef): string {
	return `${ref.sourceId}/${ref.tableName}`;
}

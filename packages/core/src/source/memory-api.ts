// ---------------------------------------------------------------------------
// MemoryTabularApi — in-process TabularApi for tests and dry runs
// ---------------------------------------------------------------------------

import { NotFoundError, type SourceError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import type { RangeUpdate, RemoteMetadata, TabularApi } from "./types";

/** Operation names that can be made to fail. */
export type MemoryApiOperation = "getMetadata" | "getValues" | "batchUpdate";

interface MemorySpreadsheet {
	modifiedTime: string;
	revision: number;
	tables: Map<string, string[][]>;
}

const SINGLE_CELL_REF = /^'((?:[^']|'')*)'!([A-Z]+)(\d+)$/;

/**
 * Spreadsheets held in memory.
 *
 * Every successful `batchUpdate` is appended to {@link updates} and bumps
 * the spreadsheet's `modifiedTime`, the way a real edit would.
 */
export class MemoryTabularApi implements TabularApi {
	private readonly spreadsheets = new Map<string, MemorySpreadsheet>();
	private readonly failures = new Map<string, SourceError>();

	/** Every applied batch, in call order. */
	readonly updates: Array<{ sourceId: string; updates: RangeUpdate[] }> = [];

	/** Number of calls per operation. */
	readonly calls: Record<MemoryApiOperation, number> = {
		getMetadata: 0,
		getValues: 0,
		batchUpdate: 0,
	};

	/** Create or replace a table. The first row is the header row. */
	setTable(sourceId: string, tableName: string, values: string[][]): this {
		const sheet = this.ensureSpreadsheet(sourceId);
		sheet.tables.set(
			tableName,
			values.map((row) => [...row]),
		);
		this.touch(sheet);
		return this;
	}

	/** Override the reported modified time of a spreadsheet. */
	setModifiedTime(sourceId: string, modifiedTime: string): this {
		this.ensureSpreadsheet(sourceId).modifiedTime = modifiedTime;
		return this;
	}

	/** Current stored values of a table, or `undefined` when absent. */
	getTable(sourceId: string, tableName: string): string[][] | undefined {
		return this.spreadsheets
			.get(sourceId)
			?.tables.get(tableName)
			?.map((row) => [...row]);
	}

	/** Make every call of `operation` against `sourceId` fail with `error` until cleared. */
	failWith(operation: MemoryApiOperation, sourceId: string, error: SourceError): this {
		this.failures.set(`${operation}:${sourceId}`, error);
		return this;
	}

	/** Remove all injected failures. */
	clearFailures(): void {
		this.failures.clear();
	}

	async getMetadata(sourceId: string): Promise<Result<RemoteMetadata, SourceError>> {
		this.calls.getMetadata++;
		const failure = this.failures.get(`getMetadata:${sourceId}`);
		if (failure) return Err(failure);

		const sheet = this.spreadsheets.get(sourceId);
		if (!sheet) return Err(new NotFoundError(`Spreadsheet ${sourceId} not found`));

		const tables = [...sheet.tables].map(([name, values]) => ({
			name,
			rowCount: values.length,
			columnCount: values.reduce((max, row) => Math.max(max, row.length), 0),
		}));
		return Ok({ tables, modifiedTime: sheet.modifiedTime });
	}

	async getValues(sourceId: string, tableName: string): Promise<Result<string[][], SourceError>> {
		this.calls.getValues++;
		const failure = this.failures.get(`getValues:${sourceId}`);
		if (failure) return Err(failure);

		const values = this.getTable(sourceId, tableName);
		if (!values) {
			return Err(new NotFoundError(`Table "${tableName}" not found in spreadsheet ${sourceId}`));
		}
		return Ok(values);
	}

	async batchUpdate(sourceId: string, updates: RangeUpdate[]): Promise<Result<number, SourceError>> {
		this.calls.batchUpdate++;
		const failure = this.failures.get(`batchUpdate:${sourceId}`);
		if (failure) return Err(failure);

		const sheet = this.spreadsheets.get(sourceId);
		if (!sheet) return Err(new NotFoundError(`Spreadsheet ${sourceId} not found`));

		let written = 0;
		for (const update of updates) {
			const match = SINGLE_CELL_REF.exec(update.rangeRef);
			const value = update.values[0]?.[0];
			if (!match || value === undefined) {
				return Err(new NotFoundError(`Unsupported range ${update.rangeRef}`));
			}
			const [, quotedName = "", letters = "", rowText = ""] = match;
			const table = sheet.tables.get(quotedName.replace(/''/g, "'"));
			if (!table) {
				return Err(new NotFoundError(`Unable to parse range: ${update.rangeRef}`));
			}

			const rowIndex = Number.parseInt(rowText, 10) - 1;
			const colIndex = columnIndex(letters);
			while (table.length <= rowIndex) table.push([]);
			const row = table[rowIndex] ?? [];
			while (row.length <= colIndex) row.push("");
			row[colIndex] = value;
			table[rowIndex] = row;
			written++;
		}

		this.updates.push({ sourceId, updates });
		this.touch(sheet);
		return Ok(written);
	}

	private ensureSpreadsheet(sourceId: string): MemorySpreadsheet {
		let sheet = this.spreadsheets.get(sourceId);
		if (!sheet) {
			sheet = { modifiedTime: "", revision: 0, tables: new Map() };
			this.spreadsheets.set(sourceId, sheet);
		}
		return sheet;
	}

	private touch(sheet: MemorySpreadsheet): void {
		sheet.revision++;
		sheet.modifiedTime = `rev-${sheet.revision}`;
	}
}

/** Inverse of `columnLetter`: "A" → 0, "AA" → 26. */
function columnIndex(letters: string): number {
	let n = 0;
	for (const ch of letters) {
		n = n * 26 + (ch.charCodeAt(0) - 64);
	}
	return n - 1;
}

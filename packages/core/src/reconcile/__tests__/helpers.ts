import { Err, Ok, type Result } from "../../result/result";
import type { SerializationError } from "../../result/errors";
import { MemoryTabularApi } from "../../source/memory-api";
import type { Cell, FilteredRow } from "../../source/types";
import type { ExportWriter } from "../export-writer";
import type { MergedResult } from "../merge";

/** Fixed pass start used across reconciler tests. */
export const NOW = new Date("2026-03-01T09:00:00.000Z");

/** Build a filtered row for `sheet-a/Intake` unless told otherwise. */
export function filteredRow(
	values: Cell[],
	headers: string[] = ["Status", "Name"],
	sourceId = "sheet-a",
	tableName = "Intake",
): FilteredRow {
	return { sourceId, tableName, headers, values };
}

/**
 * Two spreadsheets:
 * - `sheet-a/Intake`: one pending row (Alice), one done row, one pending row without a name
 * - `sheet-b/Orders`: one pending row (Carol) with an extra column
 */
export function createApi(): MemoryTabularApi {
	return new MemoryTabularApi()
		.setTable("sheet-a", "Intake", [
			["Status", "Name"],
			["New Request", "Alice"],
			["Done", "Bob"],
			["New Request", ""],
		])
		.setTable("sheet-b", "Orders", [
			["Status", "Name", "Qty"],
			["New Request", "Carol", "2"],
		]);
}

/** Export writer that records what it was given. */
export class RecordingExporter implements ExportWriter {
	readonly writes: Array<{ merged: MergedResult; at: Date }> = [];
	private failure: SerializationError | null = null;

	failWith(error: SerializationError): this {
		this.failure = error;
		return this;
	}

	async write(merged: MergedResult, at: Date): Promise<Result<string, SerializationError>> {
		if (this.failure) return Err(this.failure);
		this.writes.push({ merged, at });
		return Ok(`memory://export-${this.writes.length}`);
	}
}

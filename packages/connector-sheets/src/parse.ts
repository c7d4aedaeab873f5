// ---------------------------------------------------------------------------
// Response parsing — narrow untyped JSON bodies to the response types
// ---------------------------------------------------------------------------

import { Err, Ok, type Result, TransientNetworkError } from "@sheetmerge/core";
import type {
	BatchUpdateResponse,
	DriveFileResponse,
	SheetProperties,
	SpreadsheetResponse,
	ValueRangeResponse,
} from "./types";

type Parsed<T> = Result<T, TransientNetworkError>;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isArray(value: unknown): value is unknown[] {
	return Array.isArray(value);
}

function malformed(what: string): Parsed<never> {
	return Err(new TransientNetworkError(`Malformed ${what} response from the Sheets API`));
}

function toCount(value: unknown): number {
	return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : 0;
}

/** Spreadsheet metadata. Sheets without a title are dropped; missing grid sizes read as 0. */
export function parseSpreadsheet(body: unknown): Parsed<SpreadsheetResponse> {
	if (!isRecord(body)) return malformed("spreadsheet");
	const rawSheets = body.sheets ?? [];
	if (!isArray(rawSheets)) return malformed("spreadsheet");

	const sheets: Array<{ properties: SheetProperties }> = [];
	for (const sheet of rawSheets) {
		if (!isRecord(sheet) || !isRecord(sheet.properties)) continue;
		const { title, gridProperties } = sheet.properties;
		if (typeof title !== "string") continue;
		const grid = isRecord(gridProperties) ? gridProperties : {};
		sheets.push({
			properties: {
				title,
				gridProperties: {
					rowCount: toCount(grid.rowCount),
					columnCount: toCount(grid.columnCount),
				},
			},
		});
	}
	return Ok({ sheets });
}

/**
 * Value range. The API omits `values` for a blank range; formatted cells
 * arrive as strings, anything else is stringified.
 */
export function parseValueRange(body: unknown): Parsed<ValueRangeResponse> {
	if (!isRecord(body)) return malformed("values");
	const range = typeof body.range === "string" ? body.range : "";
	const rawRows = body.values ?? [];
	if (!isArray(rawRows)) return malformed("values");

	const values: string[][] = [];
	for (const row of rawRows) {
		if (!isArray(row)) return malformed("values");
		values.push(row.map((cell) => (typeof cell === "string" ? cell : String(cell ?? ""))));
	}
	return Ok({ range, values });
}

export function parseBatchUpdate(body: unknown): Parsed<BatchUpdateResponse> {
	if (!isRecord(body)) return malformed("batch update");
	return Ok({ totalUpdatedCells: toCount(body.totalUpdatedCells) });
}

export function parseDriveFile(body: unknown): Parsed<DriveFileResponse> {
	if (!isRecord(body) || typeof body.modifiedTime !== "string") return malformed("file metadata");
	return Ok({ modifiedTime: body.modifiedTime });
}

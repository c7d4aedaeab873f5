// ---------------------------------------------------------------------------
// Sheets Connector — Type Definitions
// ---------------------------------------------------------------------------

/** Where `getMetadata` takes a spreadsheet's modified time from. */
export type ModifiedTimeSource = "drive" | "none";

export const MODIFIED_TIME_SOURCES: readonly ModifiedTimeSource[] = ["drive", "none"];

/** Connection configuration for the Google Sheets connector. */
export interface SheetsClientConfig {
	/** OAuth 2.0 bearer token with spreadsheet (and, for "drive", file metadata) scope. */
	accessToken: string;
	/** Sheets API origin (default "https://sheets.googleapis.com"). */
	sheetsBaseUrl?: string;
	/** Drive API origin used for modified times (default "https://www.googleapis.com"). */
	driveBaseUrl?: string;
	/**
	 * "drive" reads `modifiedTime` from the Drive file metadata endpoint;
	 * "none" skips that request and reports `""` (default "drive").
	 */
	modifiedTimeSource?: ModifiedTimeSource;
	/** Retries after a 429 or 5xx response before giving up (default 3). */
	maxRetries?: number;
	/** Wait used between retries. Tests pass a resolved stub. */
	sleep?: (ms: number) => Promise<void>;
}

// ---------------------------------------------------------------------------
// Sheets API v4 / Drive API v3 — Minimal Response Types
// ---------------------------------------------------------------------------

/** Sheet properties from GET /v4/spreadsheets/{id}. */
export interface SheetProperties {
	title: string;
	gridProperties: {
		rowCount: number;
		columnCount: number;
	};
}

/** Spreadsheet response, restricted to the requested fields. */
export interface SpreadsheetResponse {
	sheets: Array<{ properties: SheetProperties }>;
}

/** Value range from GET /v4/spreadsheets/{id}/values/{range}. Trailing empty rows and cells are omitted by the API. */
export interface ValueRangeResponse {
	range: string;
	values: string[][];
}

/** Response from POST /v4/spreadsheets/{id}/values:batchUpdate. */
export interface BatchUpdateResponse {
	totalUpdatedCells: number;
}

/** File response from GET /drive/v3/files/{id}?fields=modifiedTime. */
export interface DriveFileResponse {
	modifiedTime: string;
}

// ---------------------------------------------------------------------------
// SheetsClient — HTTP wrapper for Google Sheets API v4
// ---------------------------------------------------------------------------

import {
	Err,
	Ok,
	quoteSheetName,
	type RangeUpdate,
	type RemoteMetadata,
	type Result,
	type SourceError,
	type TabularApi,
	TransientNetworkError,
	toError,
} from "@sheetmerge/core";
import { errorForStatus, isRetryableStatus, retryDelayMs } from "./errors";
import { parseBatchUpdate, parseDriveFile, parseSpreadsheet, parseValueRange } from "./parse";
import type { ModifiedTimeSource, SheetsClientConfig } from "./types";

const DEFAULT_SHEETS_BASE_URL = "https://sheets.googleapis.com";
const DEFAULT_DRIVE_BASE_URL = "https://www.googleapis.com";
const DEFAULT_MAX_RETRIES = 3;

const SPREADSHEET_FIELDS = "sheets.properties(title,gridProperties(rowCount,columnCount))";

/**
 * HTTP client for the Google Sheets API v4.
 *
 * Uses a bearer access token and global `fetch`. Every public method
 * returns a `Result`; HTTP and network failures are mapped onto the core
 * error taxonomy and never thrown.
 */
export class SheetsClient implements TabularApi {
	private readonly authHeader: string;
	private readonly sheetsBaseUrl: string;
	private readonly driveBaseUrl: string;
	private readonly modifiedTimeSource: ModifiedTimeSource;
	private readonly maxRetries: number;
	private readonly sleep: (ms: number) => Promise<void>;

	constructor(config: SheetsClientConfig) {
		this.authHeader = `Bearer ${config.accessToken}`;
		this.sheetsBaseUrl = config.sheetsBaseUrl ?? DEFAULT_SHEETS_BASE_URL;
		this.driveBaseUrl = config.driveBaseUrl ?? DEFAULT_DRIVE_BASE_URL;
		this.modifiedTimeSource = config.modifiedTimeSource ?? "drive";
		this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
		this.sleep = config.sleep ?? sleep;
	}

	/**
	 * Fetch grid sizes of every sheet plus the spreadsheet's modified time.
	 *
	 * The Sheets API does not expose a modified time, so it is read from the
	 * Drive file resource unless `modifiedTimeSource` is "none".
	 */
	async getMetadata(sourceId: string): Promise<Result<RemoteMetadata, SourceError>> {
		const url = `${this.sheetsBaseUrl}/v4/spreadsheets/${encodeURIComponent(sourceId)}?fields=${encodeURIComponent(SPREADSHEET_FIELDS)}`;
		const body = await this.request(url, "GET");
		if (!body.ok) return body;

		const spreadsheet = parseSpreadsheet(body.value);
		if (!spreadsheet.ok) return spreadsheet;

		const modifiedTime = await this.getModifiedTime(sourceId);
		if (!modifiedTime.ok) return modifiedTime;

		return Ok({
			tables: spreadsheet.value.sheets.map(({ properties }) => ({
				name: properties.title,
				rowCount: properties.gridProperties.rowCount,
				columnCount: properties.gridProperties.columnCount,
			})),
			modifiedTime: modifiedTime.value,
		});
	}

	/** Fetch every value of a sheet, header row first. A blank sheet yields `[]`. */
	async getValues(sourceId: string, tableName: string): Promise<Result<string[][], SourceError>> {
		const range = encodeURIComponent(quoteSheetName(tableName));
		const url = `${this.sheetsBaseUrl}/v4/spreadsheets/${encodeURIComponent(sourceId)}/values/${range}?majorDimension=ROWS`;
		const body = await this.request(url, "GET");
		if (!body.ok) return body;

		const parsed = parseValueRange(body.value);
		if (!parsed.ok) return parsed;
		return Ok(parsed.value.values);
	}

	/**
	 * Write all `updates` in one `values:batchUpdate` call.
	 *
	 * Values are written RAW so that status strings are stored verbatim.
	 * Resolves to the number of cells the API reports as updated.
	 */
	async batchUpdate(sourceId: string, updates: RangeUpdate[]): Promise<Result<number, SourceError>> {
		if (updates.length === 0) return Ok(0);

		const url = `${this.sheetsBaseUrl}/v4/spreadsheets/${encodeURIComponent(sourceId)}/values:batchUpdate`;
		const body = await this.request(url, "POST", {
			valueInputOption: "RAW",
			data: updates.map((u) => ({ range: u.rangeRef, majorDimension: "ROWS", values: u.values })),
		});
		if (!body.ok) return body;

		const parsed = parseBatchUpdate(body.value);
		if (!parsed.ok) return parsed;
		return Ok(parsed.value.totalUpdatedCells);
	}

	private async getModifiedTime(sourceId: string): Promise<Result<string, SourceError>> {
		if (this.modifiedTimeSource === "none") return Ok("");

		const url = `${this.driveBaseUrl}/drive/v3/files/${encodeURIComponent(sourceId)}?fields=modifiedTime&supportsAllDrives=true`;
		const body = await this.request(url, "GET");
		if (!body.ok) return body;

		const parsed = parseDriveFile(body.value);
		if (!parsed.ok) return parsed;
		return Ok(parsed.value.modifiedTime);
	}

	// -----------------------------------------------------------------------
	// Internal HTTP helpers
	// -----------------------------------------------------------------------

	/** Make an HTTP request, retrying 429 and 5xx responses. Resolves to the parsed JSON body. */
	private async request(
		url: string,
		method: "GET" | "POST",
		body?: unknown,
	): Promise<Result<unknown, SourceError>> {
		for (let attempt = 0; ; attempt++) {
			const headers: Record<string, string> = {
				Authorization: this.authHeader,
				Accept: "application/json",
			};

			const init: RequestInit = { method, headers };

			if (body !== undefined) {
				headers["Content-Type"] = "application/json";
				init.body = JSON.stringify(body);
			}

			let response: Response;
			try {
				response = await fetch(url, init);
			} catch (err) {
				const cause = toError(err);
				return Err(
					new TransientNetworkError(`Request to the Sheets API failed: ${cause.message}`, undefined, cause),
				);
			}

			if (response.ok) {
				try {
					const data: unknown = await response.json();
					return Ok(data);
				} catch (err) {
					return Err(
						new TransientNetworkError(
							"Sheets API returned a body that is not JSON",
							undefined,
							toError(err),
						),
					);
				}
			}

			if (isRetryableStatus(response.status)) {
				const waitMs = retryDelayMs(response.headers.get("Retry-After"), attempt);
				await discardBody(response);
				if (attempt < this.maxRetries) {
					await this.sleep(waitMs);
					continue;
				}
				return Err(
					new TransientNetworkError(
						`Sheets API error (${response.status}) after ${attempt + 1} attempt(s)`,
						waitMs,
					),
				);
			}

			const text = await response.text().catch(() => "");
			return Err(errorForStatus(response.status, text));
		}
	}
}

/** Release a response body that will not be read. */
async function discardBody(response: Response): Promise<void> {
	await response.body?.cancel().catch(() => undefined);
}

/** Sleep for the given number of milliseconds. */
function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export { SheetsClient } from "./client";
export { errorForStatus, errorMessageFromBody, isRetryableStatus, retryDelayMs } from "./errors";
export { parseBatchUpdate, parseDriveFile, parseSpreadsheet, parseValueRange } from "./parse";
export { MODIFIED_TIME_SOURCES } from "./types";
export type {
	BatchUpdateResponse,
	DriveFileResponse,
	ModifiedTimeSource,
	SheetProperties,
	SheetsClientConfig,
	SpreadsheetResponse,
	ValueRangeResponse,
} from "./types";

/** Base error class for all SheetMerge errors */
export class SheetMergeError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** Invalid configuration, or a table whose shape cannot be processed (e.g. fewer than two columns) */
export class ConfigurationError extends SheetMergeError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIGURATION", cause);
	}
}

/** Spreadsheet or table does not exist */
export class NotFoundError extends SheetMergeError {
	constructor(message: string, cause?: Error) {
		super(message, "NOT_FOUND", cause);
	}
}

/** Permission denied by the remote tabular API */
export class AccessError extends SheetMergeError {
	constructor(message: string, cause?: Error) {
		super(message, "ACCESS_DENIED", cause);
	}
}

/** Network failure, rate limit or server error that may succeed on a later pass */
export class TransientNetworkError extends SheetMergeError {
	/** Milliseconds the remote asked us to wait, when it said so. */
	readonly retryAfterMs?: number;

	constructor(message: string, retryAfterMs?: number, cause?: Error) {
		super(message, "TRANSIENT_NETWORK", cause);
		this.retryAfterMs = retryAfterMs;
	}
}

/** Tracking store or export file could not be read or written */
export class SerializationError extends SheetMergeError {
	constructor(message: string, cause?: Error) {
		super(message, "SERIALIZATION", cause);
	}
}

/**
 * Errors a remote fetch or write-back can produce. A request the remote
 * rejects as malformed surfaces as a {@link ConfigurationError}.
 */
export type SourceError = NotFoundError | AccessError | TransientNetworkError | ConfigurationError;

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}

import {
	AccessError,
	ConfigurationError,
	NotFoundError,
	type SourceError,
	TransientNetworkError,
} from "@sheetmerge/core";

const DEFAULT_RETRY_AFTER_MS = 1_000;

/** True for statuses worth another attempt: rate limiting and server faults. */
export function isRetryableStatus(status: number): boolean {
	return status === 429 || status >= 500;
}

/**
 * Milliseconds to wait before retry number `attempt` (zero-based).
 *
 * Honours a numeric `Retry-After` header; otherwise backs off exponentially
 * from one second.
 */
export function retryDelayMs(retryAfter: string | null, attempt: number): number {
	if (retryAfter !== null) {
		const seconds = Number.parseInt(retryAfter, 10);
		if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
	}
	return DEFAULT_RETRY_AFTER_MS * 2 ** attempt;
}

/**
 * Pull the human-readable message out of a Google API error body
 * (`{ "error": { "message": "..." } }`), falling back to the raw text.
 */
export function errorMessageFromBody(body: string): string {
	const parsed = parseJson(body);
	if (typeof parsed === "object" && parsed !== null && "error" in parsed) {
		const { error } = parsed;
		if (typeof error === "object" && error !== null && "message" in error) {
			const { message } = error;
			if (typeof message === "string" && message.length > 0) return message;
		}
	}
	return body.trim();
}

function parseJson(text: string): unknown {
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
}

/** Map a non-retryable HTTP failure onto the core error taxonomy. */
export function errorForStatus(status: number, body: string): SourceError {
	const detail = errorMessageFromBody(body);
	const message = detail ? `Sheets API error (${status}): ${detail}` : `Sheets API error (${status})`;

	if (status === 401 || status === 403) return new AccessError(message);
	if (status === 404) return new NotFoundError(message);
	if (status === 400 && detail.includes("Unable to parse range")) {
		return new NotFoundError(message);
	}
	if (isRetryableStatus(status)) return new TransientNetworkError(message);
	return new ConfigurationError(message);
}

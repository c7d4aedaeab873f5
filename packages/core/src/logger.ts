/** Log severity levels. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Injectable logging callback.
 *
 * Library code calls this instead of writing to `console` directly,
 * allowing consumers to route log output however they wish.
 */
export type Logger = (level: LogLevel, message: string, meta?: Record<string, unknown>) => void;

/** Default logger that writes to `console`. */
export const defaultLogger: Logger = (level, message) => console[level](`[sheetmerge] ${message}`);

/** Logger that discards everything. */
export const noopLogger: Logger = () => {};

/**
 * Bind metadata to every call of `logger`.
 *
 * Per-call metadata wins over bound keys of the same name.
 */
export function withContext(logger: Logger, context: Record<string, unknown>): Logger {
	return (level, message, meta) => logger(level, message, { ...context, ...meta });
}

// ---------------------------------------------------------------------------
// CliLogger — structured logger for the command line, text or JSON lines
// ---------------------------------------------------------------------------

import type { Logger, LogLevel } from "@sheetmerge/core";

/** Output format of a {@link CliLogger}. */
export type LogFormat = "text" | "json";

export const LOG_FORMATS: readonly LogFormat[] = ["text", "json"];

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

export interface CliLoggerOptions {
	/** Minimum level written (default "info"). */
	level?: LogLevel;
	/** Default "text". */
	format?: LogFormat;
	/** Context added to every entry. */
	bindings?: Record<string, unknown>;
	/** Line sink (default stderr). */
	write?: (line: string) => void;
	now?: () => Date;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/**
 * Logger for the `sheetmerge` command.
 *
 * Writes to stderr so that stdout carries only command output. Supports
 * log-level filtering and child loggers with bound context.
 *
 * @example
 * ```ts
 * const logger = new CliLogger({ format: "json" });
 * logger.child({ sourceId: "sheet-a" }).info("Accepted rows", { rows: 3 });
 * // => {"level":"info","msg":"Accepted rows","ts":"...","sourceId":"sheet-a","rows":3}
 * ```
 */
export class CliLogger {
	private readonly level: LogLevel;
	private readonly format: LogFormat;
	private readonly bindings: Record<string, unknown>;
	private readonly writeFn: (line: string) => void;
	private readonly now: () => Date;

	constructor(options: CliLoggerOptions = {}) {
		this.level = options.level ?? "info";
		this.format = options.format ?? "text";
		this.bindings = options.bindings ?? {};
		this.writeFn = options.write ?? ((line) => process.stderr.write(`${line}\n`));
		this.now = options.now ?? (() => new Date());
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	/**
	 * Create a child logger with additional bound context.
	 *
	 * The child inherits level, format and output, and merges the parent's
	 * bindings with the new ones.
	 */
	child(bindings: Record<string, unknown>): CliLogger {
		return new CliLogger({
			level: this.level,
			format: this.format,
			bindings: { ...this.bindings, ...bindings },
			write: this.writeFn,
			now: this.now,
		});
	}

	/** This logger as the callback the core library accepts. */
	asCallback(): Logger {
		return (level, message, meta) => this.log(level, message, meta);
	}

	// -----------------------------------------------------------------------
	// Internal
	// -----------------------------------------------------------------------

	private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (LEVEL_VALUE[level] < LEVEL_VALUE[this.level]) return;

		const entry: LogEntry = {
			level,
			msg,
			ts: this.now().toISOString(),
			...this.bindings,
			...data,
		};

		this.writeFn(this.format === "json" ? JSON.stringify(entry) : formatText(entry));
	}
}

/** `2026-03-01T09:00:00.000Z INFO  message key=value ...` */
function formatText(entry: LogEntry): string {
	const { level, msg, ts, ...rest } = entry;
	const fields = Object.entries(rest)
		.filter(([, value]) => value !== undefined)
		.map(([key, value]) => `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
	const head = `${ts} ${level.toUpperCase().padEnd(5)} ${msg}`;
	return fields.length > 0 ? `${head} ${fields.join(" ")}` : head;
}

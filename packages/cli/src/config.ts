import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { MODIFIED_TIME_SOURCES, type ModifiedTimeSource } from "@sheetmerge/connector-sheets";
import {
	ConfigurationError,
	CONSUMED_STATUS,
	Err,
	Ok,
	PENDING_STATUS,
	RECONCILE_MODES,
	type ReconcileMode,
	type Result,
	type SourceRef,
	toError,
} from "@sheetmerge/core";

/** Project configuration stored in `sheetmerge.config.json`. */
export interface SheetMergeConfig {
	/** Sources in processing order. */
	sources: SourceRef[];
	mode: ReconcileMode;
	/** Tracking store path, relative to the config file. */
	trackingFile: string;
	/** Export directory, relative to the config file. */
	outputDir: string;
	exportBaseName: string;
	pendingStatus: string;
	consumedStatus: string;
	/** "none" skips the file metadata request, for tokens without that scope. */
	modifiedTimeSource: ModifiedTimeSource;
}

/** Config file looked for in the working directory when `--config` is not given. */
export const DEFAULT_CONFIG_FILE = "sheetmerge.config.json";

/** Environment variable holding the API access token. */
export const TOKEN_ENV = "SHEETMERGE_ACCESS_TOKEN";

export const DEFAULT_CONFIG: Readonly<SheetMergeConfig> = {
	sources: [],
	mode: "tracked",
	trackingFile: "sheets_tracking.json",
	outputDir: ".",
	exportBaseName: "combined_requests",
	pendingStatus: PENDING_STATUS,
	consumedStatus: CONSUMED_STATUS,
	modifiedTimeSource: "drive",
};

const STRING_KEYS = [
	"trackingFile",
	"outputDir",
	"exportBaseName",
	"pendingStatus",
	"consumedStatus",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isArray(value: unknown): value is unknown[] {
	return Array.isArray(value);
}

function isReconcileMode(value: unknown): value is ReconcileMode {
	return RECONCILE_MODES.some((mode) => mode === value);
}

function isModifiedTimeSource(value: unknown): value is ModifiedTimeSource {
	return MODIFIED_TIME_SOURCES.some((source) => source === value);
}

/**
 * Validate a parsed config document.
 *
 * Accepts `sources: [{ sourceId, tableName }]` or the older
 * `spreadsheets: [[sourceId, tableName]]`; `sources` wins when both are
 * present. Missing settings take their defaults.
 */
export function validateConfig(raw: unknown): Result<SheetMergeConfig, ConfigurationError> {
	if (!isRecord(raw)) return Err(new ConfigurationError("Config must be a JSON object"));

	const sources = raw.sources !== undefined ? readSources(raw.sources) : readLegacy(raw.spreadsheets);
	if (!sources.ok) return sources;

	const seen = new Set<string>();
	for (const [i, ref] of sources.value.entries()) {
		const label = `${ref.sourceId}/${ref.tableName}`;
		if (seen.has(label)) {
			return Err(new ConfigurationError(`Config source ${i + 1} duplicates ${label}`));
		}
		seen.add(label);
	}

	const config: SheetMergeConfig = { ...DEFAULT_CONFIG, sources: sources.value };

	if (raw.mode !== undefined) {
		if (!isReconcileMode(raw.mode)) {
			return Err(
				new ConfigurationError(`Config "mode" must be one of ${RECONCILE_MODES.join(", ")}`),
			);
		}
		config.mode = raw.mode;
	}

	if (raw.modifiedTimeSource !== undefined) {
		if (!isModifiedTimeSource(raw.modifiedTimeSource)) {
			return Err(
				new ConfigurationError(
					`Config "modifiedTimeSource" must be one of ${MODIFIED_TIME_SOURCES.join(", ")}`,
				),
			);
		}
		config.modifiedTimeSource = raw.modifiedTimeSource;
	}

	for (const key of STRING_KEYS) {
		const value = raw[key];
		if (value === undefined) continue;
		if (typeof value !== "string" || value.trim() === "") {
			return Err(new ConfigurationError(`Config "${key}" must be a non-empty string`));
		}
		config[key] = value;
	}

	return Ok(config);
}

function readSources(value: unknown): Result<SourceRef[], ConfigurationError> {
	if (!isArray(value)) return Err(new ConfigurationError('Config "sources" must be an array'));

	const sources: SourceRef[] = [];
	for (const [i, entry] of value.entries()) {
		if (!isRecord(entry)) {
			return Err(new ConfigurationError(`Config source ${i + 1} must be an object`));
		}
		const ref = toSourceRef(entry.sourceId, entry.tableName, i);
		if (!ref.ok) return ref;
		sources.push(ref.value);
	}
	return Ok(sources);
}

function readLegacy(value: unknown): Result<SourceRef[], ConfigurationError> {
	if (value === undefined) return Ok([]);
	if (!isArray(value)) {
		return Err(new ConfigurationError('Config "spreadsheets" must be an array'));
	}

	const sources: SourceRef[] = [];
	for (const [i, entry] of value.entries()) {
		if (!isArray(entry) || entry.length !== 2) {
			return Err(
				new ConfigurationError(`Config source ${i + 1} must be a [spreadsheetId, sheetName] pair`),
			);
		}
		const ref = toSourceRef(entry[0], entry[1], i);
		if (!ref.ok) return ref;
		sources.push(ref.value);
	}
	return Ok(sources);
}

function toSourceRef(
	sourceId: unknown,
	tableName: unknown,
	index: number,
): Result<SourceRef, ConfigurationError> {
	if (typeof sourceId !== "string" || sourceId.trim() === "") {
		return Err(new ConfigurationError(`Config source ${index + 1} has no spreadsheet ID`));
	}
	if (typeof tableName !== "string" || tableName.trim() === "") {
		return Err(new ConfigurationError(`Config source ${index + 1} has no sheet name`));
	}
	return Ok({ sourceId, tableName });
}

/** Load and validate the config file. A missing file yields the defaults with no sources. */
export function loadConfig(path: string): Result<SheetMergeConfig, ConfigurationError> {
	if (!existsSync(path)) return Ok({ ...DEFAULT_CONFIG, sources: [] });

	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(path, "utf-8"));
	} catch (err) {
		return Err(new ConfigurationError(`Cannot read config ${path}`, toError(err)));
	}

	const config = validateConfig(parsed);
	if (!config.ok) {
		return Err(new ConfigurationError(`${path}: ${config.error.message}`, config.error));
	}
	return config;
}

/** Save the config file in full. Creates its directory if it does not exist. */
export function saveConfig(path: string, config: SheetMergeConfig): Result<void, ConfigurationError> {
	try {
		mkdirSync(dirname(path), { recursive: true });
		writeFileSync(path, `${JSON.stringify(config, null, "\t")}\n`, "utf-8");
		return Ok(undefined);
	} catch (err) {
		return Err(new ConfigurationError(`Cannot write config ${path}`, toError(err)));
	}
}

/** Config file path from `--config`, or the default in `cwd`. */
export function resolveConfigPath(flag: string | undefined, cwd: string): string {
	return resolve(cwd, flag ?? DEFAULT_CONFIG_FILE);
}

/** Resolve a path setting against the directory holding the config file. */
export function resolveFromConfig(configPath: string, path: string): string {
	return resolve(dirname(configPath), path);
}

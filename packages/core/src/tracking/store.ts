// ---------------------------------------------------------------------------
// Tracking store persistence
// ---------------------------------------------------------------------------

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { SerializationError, toError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import type { TableMetadata } from "../source/types";
import { createEmptyStore, setEntry, type TrackingEntry, type TrackingStore } from "./types";

/** Loads and saves the whole {@link TrackingStore}. */
export interface TrackingStoreRepository {
	load(): Promise<Result<TrackingStore, SerializationError>>;
	save(store: TrackingStore): Promise<Result<void, SerializationError>>;
}

/**
 * Tracking store kept in a JSON file.
 *
 * A missing file loads as an empty store. The file is rewritten in full
 * on every save; concurrent writers are not detected (last writer wins).
 */
export class FileTrackingStore implements TrackingStoreRepository {
	constructor(readonly path: string) {}

	async load(): Promise<Result<TrackingStore, SerializationError>> {
		let raw: string;
		try {
			raw = await readFile(this.path, "utf-8");
		} catch (err) {
			if (isNotFound(err)) return Ok(createEmptyStore());
			return Err(new SerializationError(`Cannot read tracking store ${this.path}`, toError(err)));
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch (err) {
			return Err(
				new SerializationError(`Tracking store ${this.path} is not valid JSON`, toError(err)),
			);
		}
		return parseTrackingStore(parsed);
	}

	async save(store: TrackingStore): Promise<Result<void, SerializationError>> {
		try {
			await mkdir(dirname(this.path), { recursive: true });
			await writeFile(this.path, serialiseTrackingStore(store), "utf-8");
			return Ok(undefined);
		} catch (err) {
			return Err(new SerializationError(`Cannot write tracking store ${this.path}`, toError(err)));
		}
	}
}

/** Tracking store held in memory. Saves round-trip through the JSON form. */
export class MemoryTrackingStore implements TrackingStoreRepository {
	private serialised: string | null = null;
	/** Number of successful saves. */
	saves = 0;

	constructor(initial?: TrackingStore) {
		if (initial) this.serialised = serialiseTrackingStore(initial);
	}

	async load(): Promise<Result<TrackingStore, SerializationError>> {
		if (this.serialised === null) return Ok(createEmptyStore());
		return parseTrackingStore(JSON.parse(this.serialised));
	}

	async save(store: TrackingStore): Promise<Result<void, SerializationError>> {
		this.serialised = serialiseTrackingStore(store);
		this.saves++;
		return Ok(undefined);
	}
}

/** JSON text of a store, tab-indented with a trailing newline. */
export function serialiseTrackingStore(store: TrackingStore): string {
	return `${JSON.stringify(store, null, "\t")}\n`;
}

/**
 * Validate parsed JSON as a {@link TrackingStore}.
 *
 * Checks:
 * - `lastRun` is a string or null
 * - `entries` is an object of well-formed entries
 * - every entry's key equals `sourceId_tableName`
 */
export function parseTrackingStore(input: unknown): Result<TrackingStore, SerializationError> {
	if (!isRecord(input)) {
		return Err(new SerializationError("Tracking store must be an object"));
	}
	const lastRun =
		input.lastRun === null ? null : typeof input.lastRun === "string" ? input.lastRun : undefined;
	if (lastRun === undefined) {
		return Err(new SerializationError("Tracking store lastRun must be a string or null"));
	}
	if (!isRecord(input.entries)) {
		return Err(new SerializationError("Tracking store entries must be an object"));
	}

	const entries: Record<string, TrackingEntry> = {};
	for (const [key, value] of Object.entries(input.entries)) {
		const entry = parseEntry(value);
		if (!entry) {
			return Err(new SerializationError(`Tracking entry "${key}" is malformed`));
		}
		if (`${entry.sourceId}_${entry.tableName}` !== key) {
			return Err(new SerializationError(`Tracking entry "${key}" does not match its source`));
		}
		setEntry(entries, key, entry);
	}

	return Ok({ lastRun, entries });
}

function parseEntry(value: unknown): TrackingEntry | null {
	if (!isRecord(value)) return null;
	const { sourceId, tableName, fingerprint, lastProcessedAt, lastCheckedAt } = value;
	if (
		typeof sourceId !== "string" ||
		typeof tableName !== "string" ||
		typeof fingerprint !== "string" ||
		typeof lastProcessedAt !== "string" ||
		typeof lastCheckedAt !== "string"
	) {
		return null;
	}

	let metadata: TableMetadata | null = null;
	if (value.metadata !== null) {
		const m = value.metadata;
		if (
			!isRecord(m) ||
			typeof m.rowCount !== "number" ||
			typeof m.columnCount !== "number" ||
			typeof m.modifiedTime !== "string"
		) {
			return null;
		}
		metadata = { rowCount: m.rowCount, columnCount: m.columnCount, modifiedTime: m.modifiedTime };
	}

	return { sourceId, tableName, metadata, fingerprint, lastProcessedAt, lastCheckedAt };
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

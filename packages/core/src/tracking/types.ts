import type { TableMetadata } from "../source/types";
import type { ContentFingerprint } from "./fingerprint";

/**
 * How the tracker decides.
 *
 * - `tracked` — fingerprint comparison decides; metadata signals are advisory.
 * - `force` — always process; metadata is not consulted before fetching.
 * - `untracked` — always process, but metadata signals are still computed and reported.
 */
export type ReconcileMode = "tracked" | "force" | "untracked";

/** All supported modes, in documentation order. */
export const RECONCILE_MODES: readonly ReconcileMode[] = ["tracked", "force", "untracked"];

/** Last known state of one source. */
export interface TrackingEntry {
	sourceId: string;
	tableName: string;
	/** `null` when metadata could not be obtained at commit time. */
	metadata: TableMetadata | null;
	fingerprint: ContentFingerprint;
	/** ISO-8601 time the content was last accepted. */
	lastProcessedAt: string;
	/** ISO-8601 time the source was last looked at, processed or not. */
	lastCheckedAt: string;
}

/** Whole persisted tracking state, keyed by `sourceId_tableName`. */
export interface TrackingStore {
	lastRun: string | null;
	entries: Record<string, TrackingEntry>;
}

/** Own entry stored under `key`. Inherited properties never count. */
export function getEntry(
	entries: Record<string, TrackingEntry>,
	key: string,
): TrackingEntry | undefined {
	return Object.hasOwn(entries, key) ? entries[key] : undefined;
}

/** Store `entry` as an own property, even for keys such as `__proto__`. */
export function setEntry(
	entries: Record<string, TrackingEntry>,
	key: string,
	entry: TrackingEntry,
): void {
	Object.defineProperty(entries, key, {
		value: entry,
		enumerable: true,
		writable: true,
		configurable: true,
	});
}

/** Create a store with no entries. */
export function createEmptyStore(): TrackingStore {
	return { lastRun: null, entries: {} };
}

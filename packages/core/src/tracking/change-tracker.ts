// ---------------------------------------------------------------------------
// ChangeTracker — per-source fingerprints and skip/process decisions
// ---------------------------------------------------------------------------

import { type SourceRef, sourceKey, type TableMetadata } from "../source/types";
import type { ContentFingerprint } from "./fingerprint";
import {
	getEntry,
	type ReconcileMode,
	setEntry,
	type TrackingEntry,
	type TrackingStore,
} from "./types";

/** Advisory metadata signals. Reported, never used to decide. */
export interface ChangeSignals {
	rowCountChanged: boolean;
	modifiedTimeChanged: boolean;
}

/** Why a decision was reached. */
export type DecisionReason =
	| "forced"
	| "untracked"
	| "first-seen"
	| "content-changed"
	| "content-unchanged";

/** Outcome of {@link ChangeTracker.shouldProcess}. */
export interface ChangeDecision {
	action: "process" | "skip";
	reason: DecisionReason;
	/** `null` in force mode, where metadata is not compared. */
	signals: ChangeSignals | null;
	previousFingerprint: ContentFingerprint | null;
}

/** Options for {@link ChangeTracker}. */
export interface ChangeTrackerOptions {
	mode?: ReconcileMode;
	/** Clock used for timestamps (default `() => new Date()`). */
	now?: () => Date;
}

/**
 * Compare metadata against what was stored last time.
 *
 * A missing side counts as "changed" for both signals.
 */
export function compareMetadata(
	previous: TableMetadata | null | undefined,
	current: TableMetadata | null,
): ChangeSignals {
	if (!previous || !current) {
		return { rowCountChanged: true, modifiedTimeChanged: true };
	}
	return {
		rowCountChanged: previous.rowCount !== current.rowCount,
		modifiedTimeChanged: previous.modifiedTime !== current.modifiedTime,
	};
}

/**
 * Decides whether a source's filtered content is new, and records the outcome.
 *
 * Works on an in-memory {@link TrackingStore}; persisting it is the caller's job.
 * The content fingerprint is authoritative in tracked mode: an unchanged
 * fingerprint skips even when metadata moved, and a changed one processes
 * even when metadata did not.
 */
export class ChangeTracker {
	readonly mode: ReconcileMode;
	private readonly now: () => Date;
	private readonly store: TrackingStore;

	constructor(store: TrackingStore, options: ChangeTrackerOptions = {}) {
		this.store = store;
		this.mode = options.mode ?? "tracked";
		this.now = options.now ?? (() => new Date());
	}

	/** Stored entry for `ref`, if any. */
	get(ref: SourceRef): TrackingEntry | undefined {
		return getEntry(this.store.entries, sourceKey(ref));
	}

	/** Decide whether the content identified by `fingerprint` must be processed. */
	shouldProcess(
		ref: SourceRef,
		metadata: TableMetadata | null,
		fingerprint: ContentFingerprint,
	): ChangeDecision {
		const previous = this.get(ref);
		const previousFingerprint = previous?.fingerprint ?? null;

		if (this.mode === "force") {
			return { action: "process", reason: "forced", signals: null, previousFingerprint };
		}

		const signals = compareMetadata(previous?.metadata, metadata);

		if (this.mode === "untracked") {
			return { action: "process", reason: "untracked", signals, previousFingerprint };
		}
		if (!previous) {
			return { action: "process", reason: "first-seen", signals, previousFingerprint };
		}
		if (previous.fingerprint === fingerprint) {
			return { action: "skip", reason: "content-unchanged", signals, previousFingerprint };
		}
		return { action: "process", reason: "content-changed", signals, previousFingerprint };
	}

	/** Record newly processed content, overwriting any previous entry. */
	commit(
		ref: SourceRef,
		metadata: TableMetadata | null,
		fingerprint: ContentFingerprint,
	): TrackingEntry {
		const at = this.now().toISOString();
		const entry: TrackingEntry = {
			sourceId: ref.sourceId,
			tableName: ref.tableName,
			metadata,
			fingerprint,
			lastProcessedAt: at,
			lastCheckedAt: at,
		};
		setEntry(this.store.entries, sourceKey(ref), entry);
		return entry;
	}

	/**
	 * Refresh metadata and `lastCheckedAt` after a skip.
	 *
	 * Fingerprint and `lastProcessedAt` are left alone. Returns `undefined`
	 * when there is no entry to touch.
	 */
	touch(ref: SourceRef, metadata: TableMetadata | null): TrackingEntry | undefined {
		const entry = this.get(ref);
		if (!entry) return undefined;
		entry.metadata = metadata;
		entry.lastCheckedAt = this.now().toISOString();
		return entry;
	}

	/** Stamp the start of a reconciliation pass. */
	markRun(): void {
		this.store.lastRun = this.now().toISOString();
	}

	/** Deep copy of the current state, safe to serialise. */
	snapshot(): TrackingStore {
		return structuredClone(this.store);
	}
}

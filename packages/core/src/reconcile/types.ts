import type { SourceRef } from "../source/types";
import type { ChangeDecision } from "../tracking/change-tracker";
import type { MergedResult } from "./merge";

/** Result every user-facing operation returns; the caller decides how to render it. */
export interface CommandResult {
	ok: boolean;
	message: string;
}

/**
 * What happened to one source during a pass.
 *
 * - `reconciled` — processed, exported (when it had rows) and marked
 * - `reconciled-unmarked` — exported and tracked, but the status write-back failed
 * - `skipped` — filtered content identical to the last processed content
 * - `empty` — the table holds no values at all
 * - `failed` — nothing from this source this pass
 */
export type SourceStatus = "reconciled" | "reconciled-unmarked" | "skipped" | "empty" | "failed";

/** Per-source line of a {@link ReconcileReport}. */
export interface SourceOutcome {
	ref: SourceRef;
	status: SourceStatus;
	/** `null` when the pass never got as far as deciding. */
	decision: ChangeDecision | null;
	/** Rows forwarded to the export. */
	acceptedRows: number;
	/** Table rows whose status was written back. */
	markedRows: number;
	error: Error | null;
	message: string;
}

/** Overall shape of a pass. */
export type ReconcileOutcome = "merged" | "no-changes" | "export-failed";

/** Result of {@link Reconciler.run}. */
export interface ReconcileReport extends CommandResult {
	outcome: ReconcileOutcome;
	/** ISO-8601 start of the pass; also the export's timestamp. */
	startedAt: string;
	merged: MergedResult | null;
	exportPath: string | null;
	/** False when the store could not be read and the pass started from an empty one. */
	trackingLoaded: boolean;
	trackingSaved: boolean;
	sources: SourceOutcome[];
}

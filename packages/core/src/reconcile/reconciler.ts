// ---------------------------------------------------------------------------
// Reconciler — reader → filter → tracker across all sources, then export,
// persist and write back
// ---------------------------------------------------------------------------

import { RowFilter } from "../filter/row-filter";
import { defaultLogger, type Logger, withContext } from "../logger";
import { toError } from "../result/errors";
import { SourceReader } from "../source/reader";
import {
	describeSource,
	type FilteredRow,
	type SourceRef,
	type TableMetadata,
	type TabularApi,
} from "../source/types";
import { type ChangeDecision, ChangeTracker } from "../tracking/change-tracker";
import { computeFingerprint } from "../tracking/fingerprint";
import type { TrackingStoreRepository } from "../tracking/store";
import { createEmptyStore, type ReconcileMode, type TrackingStore } from "../tracking/types";
import type { ExportWriter } from "./export-writer";
import { mergeRows } from "./merge";
import { StatusWriter } from "./status-writer";
import type { ReconcileReport, SourceOutcome } from "./types";

/** Dependencies and settings for a {@link Reconciler}. */
export interface ReconcilerConfig {
	/** Remote tabular API used for reads and write-back. */
	api: TabularApi;
	trackingStore: TrackingStoreRepository;
	exporter: ExportWriter;
	/** Decision mode (default "tracked"). */
	mode?: ReconcileMode;
	/** Status a row must carry to be picked up (default "New Request"). */
	pendingStatus?: string;
	/** Status written back to consumed rows (default "Submitted / In Progress"). */
	consumedStatus?: string;
	/** Optional logger callback. Defaults to `console[level]`. */
	logger?: Logger;
	/** Clock (default `() => new Date()`). */
	now?: () => Date;
}

/** A source that produced a Process decision, waiting for export and write-back. */
interface ProcessedSource {
	outcome: SourceOutcome;
	rows: FilteredRow[];
}

/**
 * Runs reconciliation passes over an ordered list of sources.
 *
 * Sources are handled strictly one after another, in the order given. A
 * failure in one source is recorded on its {@link SourceOutcome} and the
 * pass moves on. Once every source has been looked at, accepted rows are
 * exported, the tracking store is saved, and only then are the consumed
 * rows marked in their origin tables. A failed write-back is reported as
 * `reconciled-unmarked`; the export and tracking commit stand.
 *
 * Overlapping `run()` calls on the same store are not guarded against.
 */
export class Reconciler {
	private readonly reader: SourceReader;
	private readonly filter: RowFilter;
	private readonly statusWriter: StatusWriter;
	private readonly trackingStore: TrackingStoreRepository;
	private readonly exporter: ExportWriter;
	private readonly mode: ReconcileMode;
	private readonly logger: Logger;
	private readonly now: () => Date;

	constructor(config: ReconcilerConfig) {
		this.reader = new SourceReader(config.api);
		this.filter = new RowFilter({ pendingStatus: config.pendingStatus });
		this.statusWriter = new StatusWriter(config.api, {
			pendingStatus: config.pendingStatus,
			consumedStatus: config.consumedStatus,
		});
		this.trackingStore = config.trackingStore;
		this.exporter = config.exporter;
		this.mode = config.mode ?? "tracked";
		this.logger = config.logger ?? defaultLogger;
		this.now = config.now ?? (() => new Date());
	}

	/** Run one pass over `sources`. Never throws for per-source problems. */
	async run(sources: readonly SourceRef[]): Promise<ReconcileReport> {
		const startedAt = this.now();
		this.logger("info", `Starting reconciliation of ${sources.length} source(s)`, {
			mode: this.mode,
		});

		const { store, loaded } = await this.loadStore();
		const tracker = new ChangeTracker(store, { mode: this.mode, now: this.now });
		tracker.markRun();

		const outcomes: SourceOutcome[] = [];
		const processed: ProcessedSource[] = [];

		for (const ref of sources) {
			const log = withContext(this.logger, { sourceId: ref.sourceId, tableName: ref.tableName });
			let result: { outcome: SourceOutcome; rows: FilteredRow[] | null };
			try {
				result = await this.reconcileSource(ref, tracker, log);
			} catch (err) {
				const error = toError(err);
				log("error", `Error processing ${describeSource(ref)}: ${error.message}`);
				result = { outcome: failed(ref, error), rows: null };
			}

			outcomes.push(result.outcome);
			if (result.rows) {
				processed.push({ outcome: result.outcome, rows: result.rows });
			}
		}

		const batches = processed.map((p) => p.rows);
		const totalRows = batches.reduce((sum, rows) => sum + rows.length, 0);
		const base = { startedAt: startedAt.toISOString(), trackingLoaded: loaded, sources: outcomes };

		if (totalRows === 0) {
			this.logger("warn", "No new data was downloaded from any spreadsheet");
			const trackingSaved = await this.saveStore(tracker.snapshot());
			const notes = summaryNotes(outcomes, trackingSaved);
			const allFailed = outcomes.length > 0 && outcomes.every((o) => o.status === "failed");
			return {
				...base,
				ok: !allFailed,
				message:
					notes.length > 0
						? `No new data was downloaded from any spreadsheet (${notes.join("; ")}).`
						: "No new data was downloaded from any spreadsheet.",
				outcome: "no-changes",
				merged: null,
				exportPath: null,
				trackingSaved,
			};
		}

		const merged = mergeRows(batches);
		const exported = await this.exporter.write(merged, startedAt);
		if (!exported.ok) {
			this.logger("error", `Export failed: ${exported.error.message}`);
			for (const p of processed) {
				p.outcome.status = "failed";
				p.outcome.error = exported.error;
				p.outcome.message = `Export failed: ${exported.error.message}`;
			}
			return {
				...base,
				ok: false,
				message: `Export failed, nothing was recorded: ${exported.error.message}`,
				outcome: "export-failed",
				merged,
				exportPath: null,
				trackingSaved: false,
			};
		}

		const contributing = processed.filter((p) => p.rows.length > 0).length;
		this.logger(
			"info",
			`Combined ${merged.rows.length} rows from ${contributing} sheet(s) into ${exported.value}`,
		);

		const trackingSaved = await this.saveStore(tracker.snapshot());

		for (const p of processed) {
			await this.writeBack(p);
		}

		const notes = summaryNotes(outcomes, trackingSaved);

		return {
			...base,
			ok: true,
			message:
				`Combined ${merged.rows.length} rows from ${contributing} sheet(s) into ${exported.value}` +
				(notes.length > 0 ? ` (${notes.join("; ")})` : ""),
			outcome: "merged",
			merged,
			exportPath: exported.value,
			trackingSaved,
		};
	}

	// -----------------------------------------------------------------------
	// Per-source pipeline
	// -----------------------------------------------------------------------

	private async reconcileSource(
		ref: SourceRef,
		tracker: ChangeTracker,
		log: Logger,
	): Promise<{ outcome: SourceOutcome; rows: FilteredRow[] | null }> {
		const label = describeSource(ref);
		let metadata: TableMetadata | null = null;

		if (this.mode === "force") {
			log("info", `Force refresh enabled - downloading all data from ${label}`);
		} else {
			const fetched = await this.reader.fetchMetadata(ref);
			if (!fetched.ok) {
				log("error", `Could not get metadata for ${label}: ${fetched.error.message}`);
				return { outcome: failed(ref, fetched.error), rows: null };
			}
			metadata = fetched.value;
		}

		const table = await this.reader.fetchRows(ref);
		if (!table.ok) {
			log("error", `Error downloading ${label}: ${table.error.message}`);
			return { outcome: failed(ref, table.error), rows: null };
		}
		if (!table.value) {
			log("warn", `No data found in ${label}`);
			return {
				outcome: {
					ref,
					status: "empty",
					decision: null,
					acceptedRows: 0,
					markedRows: 0,
					error: null,
					message: "No data found",
				},
				rows: null,
			};
		}

		const filtered = this.filter.apply(ref, table.value.headers, table.value.rows);
		if (!filtered.ok) {
			log("error", filtered.error.message);
			return { outcome: failed(ref, filtered.error), rows: null };
		}
		const rows = filtered.value;
		log(
			"info",
			`Filtered from ${table.value.rows.length} to ${rows.length} rows where column A = '${this.filter.pendingStatus}' and column B is not empty in ${label}`,
		);

		if (this.mode === "force") {
			const fetched = await this.reader.fetchMetadata(ref);
			if (fetched.ok) {
				metadata = fetched.value;
			} else {
				log("warn", `Could not record metadata for ${label}: ${fetched.error.message}`);
			}
		}

		const fingerprint = await computeFingerprint(rows);
		const decision = tracker.shouldProcess(ref, metadata, fingerprint);
		this.reportSignals(decision, tracker, ref, metadata, log);

		if (decision.action === "skip") {
			tracker.touch(ref, metadata);
			log("info", `Content is identical to previous run for ${label} after filtering - skipping`);
			return {
				outcome: {
					ref,
					status: "skipped",
					decision,
					acceptedRows: 0,
					markedRows: 0,
					error: null,
					message: "Content unchanged since last processed",
				},
				rows: null,
			};
		}

		tracker.commit(ref, metadata, fingerprint);
		log("info", `Downloaded ${rows.length} new or changed rows from ${label}`, {
			reason: decision.reason,
		});
		return {
			outcome: {
				ref,
				status: "reconciled",
				decision,
				acceptedRows: rows.length,
				markedRows: 0,
				error: null,
				message: `Accepted ${rows.length} row(s)`,
			},
			rows,
		};
	}

	/** Log the advisory metadata signals. They never influence the decision. */
	private reportSignals(
		decision: ChangeDecision,
		tracker: ChangeTracker,
		ref: SourceRef,
		metadata: TableMetadata | null,
		log: Logger,
	): void {
		const { signals } = decision;
		if (!signals) return;

		const previous = tracker.get(ref)?.metadata;
		if (signals.rowCountChanged) {
			log(
				"info",
				`Row count changed from ${previous?.rowCount ?? 0} to ${metadata?.rowCount ?? 0} in ${ref.tableName}`,
			);
		}
		if (signals.modifiedTimeChanged) {
			log("info", `Last modified time changed in ${ref.tableName}`);
		}
		if (this.mode === "tracked" && !signals.rowCountChanged && !signals.modifiedTimeChanged) {
			log("info", `No metadata changes detected in ${ref.tableName} - checking content anyway`);
		}
	}

	// -----------------------------------------------------------------------
	// Write-back
	// -----------------------------------------------------------------------

	private async writeBack(processed: ProcessedSource): Promise<void> {
		const { outcome, rows } = processed;
		if (rows.length === 0) return;

		const log = withContext(this.logger, {
			sourceId: outcome.ref.sourceId,
			tableName: outcome.ref.tableName,
		});

		let error: Error;
		try {
			const marked = await this.statusWriter.markConsumed(outcome.ref, rows);
			if (marked.ok) {
				outcome.markedRows = marked.value;
				outcome.message = `Accepted ${rows.length} row(s), marked ${marked.value}`;
				if (marked.value < rows.length) {
					log(
						"warn",
						`Only ${marked.value} of ${rows.length} exported rows were still pending in ${describeSource(outcome.ref)}`,
					);
				}
				return;
			}
			error = marked.error;
		} catch (err) {
			error = toError(err);
		}

		outcome.status = "reconciled-unmarked";
		outcome.error = error;
		outcome.message = `Exported ${rows.length} row(s) but could not mark them: ${error.message}`;
		log("error", `Status write-back failed for ${describeSource(outcome.ref)}: ${error.message}`);
	}

	// -----------------------------------------------------------------------
	// Tracking store
	// -----------------------------------------------------------------------

	private async loadStore(): Promise<{ store: TrackingStore; loaded: boolean }> {
		const result = await this.trackingStore.load();
		if (result.ok) return { store: result.value, loaded: true };
		this.logger(
			"error",
			`Error loading tracking data, treating every source as new: ${result.error.message}`,
		);
		return { store: createEmptyStore(), loaded: false };
	}

	private async saveStore(store: TrackingStore): Promise<boolean> {
		const result = await this.trackingStore.save(store);
		if (result.ok) {
			this.logger("info", "Saved tracking data");
			return true;
		}
		this.logger("error", `Error saving tracking data: ${result.error.message}`);
		return false;
	}
}

function failed(ref: SourceRef, error: Error): SourceOutcome {
	return {
		ref,
		status: "failed",
		decision: null,
		acceptedRows: 0,
		markedRows: 0,
		error,
		message: error.message,
	};
}

/** Parenthetical notes for the pass summary: failures, unmarked sources, an unsaved store. */
function summaryNotes(outcomes: readonly SourceOutcome[], trackingSaved: boolean): string[] {
	const failedCount = outcomes.filter((o) => o.status === "failed").length;
	const unmarked = outcomes.filter((o) => o.status === "reconciled-unmarked").length;
	const notes: string[] = [];
	if (failedCount > 0) notes.push(`${failedCount} source(s) failed`);
	if (unmarked > 0) notes.push(`${unmarked} source(s) could not be marked`);
	if (!trackingSaved) notes.push("tracking data was not saved");
	return notes;
}

export {
	CONSUMED_STATUS,
	PENDING_STATUS,
	RowFilter,
	type RowFilterOptions,
} from "./filter/row-filter";
export { defaultLogger, type Logger, type LogLevel, noopLogger, withContext } from "./logger";
export {
	type CsvExportOptions,
	CsvExportWriter,
	type ExportWriter,
	exportTimestamp,
	toCsv,
} from "./reconcile/export-writer";
export {
	type MergedResult,
	mergeRows,
	PROVENANCE_COLUMNS,
	toMatrix,
	uniqueHeaders,
} from "./reconcile/merge";
export { Reconciler, type ReconcilerConfig } from "./reconcile/reconciler";
export { StatusWriter, type StatusWriterOptions } from "./reconcile/status-writer";
export type {
	CommandResult,
	ReconcileOutcome,
	ReconcileReport,
	SourceOutcome,
	SourceStatus,
} from "./reconcile/types";
export * from "./result";
export { cellRef, columnLetter, quoteSheetName } from "./source/a1";
export { MemoryTabularApi, type MemoryApiOperation } from "./source/memory-api";
export { normaliseRow, SourceReader, toRawTable } from "./source/reader";
export {
	type Cell,
	describeSource,
	type FilteredRow,
	type RangeUpdate,
	type RawRow,
	type RawTable,
	type RemoteMetadata,
	type RemoteTableInfo,
	type SourceRef,
	sourceKey,
	type TableMetadata,
	type TabularApi,
} from "./source/types";
export {
	type ChangeDecision,
	type ChangeSignals,
	ChangeTracker,
	type ChangeTrackerOptions,
	compareMetadata,
	type DecisionReason,
} from "./tracking/change-tracker";
export { type ContentFingerprint, computeFingerprint, EMPTY_FINGERPRINT } from "./tracking/fingerprint";
export {
	FileTrackingStore,
	MemoryTrackingStore,
	parseTrackingStore,
	serialiseTrackingStore,
	type TrackingStoreRepository,
} from "./tracking/store";
export {
	createEmptyStore,
	getEntry,
	RECONCILE_MODES,
	type ReconcileMode,
	setEntry,
	type TrackingEntry,
	type TrackingStore,
} from "./tracking/types";

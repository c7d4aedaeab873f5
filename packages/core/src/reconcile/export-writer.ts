// ---------------------------------------------------------------------------
// Export writer — one uniquely named CSV per successful pass
// ---------------------------------------------------------------------------

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import Papa from "papaparse";
import { SerializationError, toError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import { type MergedResult, toMatrix } from "./merge";

/** Persists a merged result. Resolves to the artifact's location. */
export interface ExportWriter {
	write(merged: MergedResult, at: Date): Promise<Result<string, SerializationError>>;
}

/** Options for {@link CsvExportWriter}. */
export interface CsvExportOptions {
	/** Directory receiving the files (created when missing). */
	outputDir: string;
	/** File name prefix (default "combined_requests"). */
	baseName?: string;
}

const DEFAULT_BASE_NAME = "combined_requests";
const MAX_NAME_ATTEMPTS = 1000;

/** Sortable UTC stamp: `2026-03-01T09:05:07.123Z` → `2026-03-01_09-05-07`. */
export function exportTimestamp(at: Date): string {
	return at.toISOString().slice(0, 19).replace("T", "_").replace(/:/g, "-");
}

/** Render a merged result as CSV text with `\n` line endings and a trailing newline. */
export function toCsv(merged: MergedResult): string {
	const csv = Papa.unparse(
		{ fields: [...merged.headers], data: toMatrix(merged) },
		{ newline: "\n" },
	);
	return `${csv}\n`;
}

/**
 * Writes `<baseName>_<timestamp>.csv` into the output directory.
 *
 * Files are created exclusively: when the name is taken, `_2`, `_3`, …
 * is appended, so no pass ever overwrites an earlier export.
 */
export class CsvExportWriter implements ExportWriter {
	private readonly outputDir: string;
	private readonly baseName: string;

	constructor(options: CsvExportOptions) {
		this.outputDir = options.outputDir;
		this.baseName = options.baseName ?? DEFAULT_BASE_NAME;
	}

	async write(merged: MergedResult, at: Date): Promise<Result<string, SerializationError>> {
		const stem = `${this.baseName}_${exportTimestamp(at)}`;
		const content = toCsv(merged);

		try {
			await mkdir(this.outputDir, { recursive: true });
		} catch (err) {
			return Err(
				new SerializationError(`Cannot create export directory ${this.outputDir}`, toError(err)),
			);
		}

		for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt++) {
			const name = attempt === 1 ? `${stem}.csv` : `${stem}_${attempt}.csv`;
			const path = join(this.outputDir, name);
			try {
				await writeFile(path, content, { encoding: "utf-8", flag: "wx" });
				return Ok(path);
			} catch (err) {
				if (isAlreadyExists(err)) continue;
				return Err(new SerializationError(`Cannot write export ${path}`, toError(err)));
			}
		}

		return Err(new SerializationError(`No free export name for ${stem} in ${this.outputDir}`));
	}
}

function isAlreadyExists(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "EEXIST";
}

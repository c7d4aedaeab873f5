import type { Cell, FilteredRow } from "../source/types";

/** Provenance columns appended to every exported row. */
export const PROVENANCE_COLUMNS = ["source_spreadsheet", "source_sheet"] as const;

/** Accepted rows of one pass, in source order then fetch order. */
export interface MergedResult {
	/** Union of column names in first-appearance order, then the provenance columns. */
	readonly headers: readonly string[];
	readonly rows: readonly FilteredRow[];
}

/**
 * Make repeated column names within one table distinct.
 *
 * The first occurrence keeps its name; later ones become `Note_2`, `Note_3`,
 * skipping any name the table already uses. Blank names are treated alike.
 */
export function uniqueHeaders(headers: readonly string[]): string[] {
	const original = new Set(headers);
	const taken = new Set<string>();
	return headers.map((header) => {
		let name = header;
		if (taken.has(name)) {
			let n = 2;
			while (taken.has(`${header}_${n}`) || original.has(`${header}_${n}`)) n++;
			name = `${header}_${n}`;
		}
		taken.add(name);
		return name;
	});
}

/** Concatenate per-source batches into one {@link MergedResult}. */
export function mergeRows(batches: ReadonlyArray<readonly FilteredRow[]>): MergedResult {
	const provenance = new Set<string>(PROVENANCE_COLUMNS);
	const seen = new Set<string>();
	const headers: string[] = [];
	const rows: FilteredRow[] = [];

	for (const batch of batches) {
		for (const row of batch) {
			for (const header of uniqueHeaders(row.headers)) {
				if (provenance.has(header) || seen.has(header)) continue;
				seen.add(header);
				headers.push(header);
			}
			rows.push(row);
		}
	}

	return { headers: [...headers, ...PROVENANCE_COLUMNS], rows };
}

/**
 * Lay out merged rows under the merged headers.
 *
 * A column a row's table does not have is `null`. Repeated names are told
 * apart with {@link uniqueHeaders}. Provenance always comes from the row's
 * origin, even when the table has its own column of that name.
 */
export function toMatrix(merged: MergedResult): Cell[][] {
	return merged.rows.map((row) => {
		const byName = new Map<string, Cell>();
		uniqueHeaders(row.headers).forEach((header, i) => {
			byName.set(header, row.values[i] ?? null);
		});
		byName.set("source_spreadsheet", row.sourceId);
		byName.set("source_sheet", row.tableName);
		return merged.headers.map((header) => byName.get(header) ?? null);
	});
}

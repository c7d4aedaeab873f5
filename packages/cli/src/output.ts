/** Print a message to stdout. */
export function print(message: string): void {
	process.stdout.write(`${message}\n`);
}

/** Print an error to stderr. */
export function printError(message: string): void {
	process.stderr.write(`Error: ${message}\n`);
}

/** Render rows as an aligned plain-text table, header first. */
export function formatTable(rows: Array<Record<string, string | number | undefined>>): string {
	const first = rows[0];
	if (!first) return "(none)";

	const keys = Object.keys(first);
	return formatGrid(
		keys,
		rows.map((row) => keys.map((key) => String(row[key] ?? ""))),
	);
}

/** Render positional rows under `headers` as an aligned plain-text table. */
export function formatGrid(
	headers: readonly string[],
	rows: ReadonlyArray<ReadonlyArray<string | null>>,
): string {
	const widths = headers.map((header, i) =>
		Math.max(header.length, ...rows.map((row) => (row[i] ?? "").length)),
	);

	const line = (cells: ReadonlyArray<string | null>): string =>
		widths
			.map((width, i) => (cells[i] ?? "").padEnd(width))
			.join("  ")
			.trimEnd();

	return [line(headers), line(widths.map((w) => "-".repeat(w))), ...rows.map(line)].join("\n");
}

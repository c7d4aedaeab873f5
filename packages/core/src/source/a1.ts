/**
 * Convert a zero-based column index to its letter form (0 → "A", 26 → "AA").
 */
export function columnLetter(index: number): string {
	if (!Number.isInteger(index) || index < 0) {
		throw new RangeError(`Column index must be a non-negative integer, got ${index}`);
	}
	let n = index + 1;
	let letters = "";
	while (n > 0) {
		const rem = (n - 1) % 26;
		letters = String.fromCharCode(65 + rem) + letters;
		n = Math.floor((n - 1) / 26);
	}
	return letters;
}

/** Quote a sheet name for use in an A1 range: `Intake` → `'Intake'`, `Bob's` → `'Bob''s'`. */
export function quoteSheetName(tableName: string): string {
	return `'${tableName.replace(/'/g, "''")}'`;
}

/**
 * Build a single-cell A1 reference.
 *
 * @param rowNumber one-based sheet row (the header is row 1).
 */
export function cellRef(tableName: string, columnIndex: number, rowNumber: number): string {
	return `${quoteSheetName(tableName)}!${columnLetter(columnIndex)}${rowNumber}`;
}

import { describe, expect, it } from "vitest";
import { mergeRows, PROVENANCE_COLUMNS, toMatrix, uniqueHeaders } from "../merge";
import { filteredRow } from "./helpers";

describe("uniqueHeaders", () => {
	it("numbers repeated names from the second occurrence", () => {
		expect(uniqueHeaders(["Status", "Name", "Note", "Note", "Note"])).toEqual([
			"Status",
			"Name",
			"Note",
			"Note_2",
			"Note_3",
		]);
	});

	it("skips suffixes the table already uses", () => {
		expect(uniqueHeaders(["Note", "Note", "Note_2"])).toEqual(["Note", "Note_3", "Note_2"]);
	});

	it("numbers repeated blank names", () => {
		expect(uniqueHeaders(["Status", "Name", "", ""])).toEqual(["Status", "Name", "", "_2"]);
	});

	it("leaves distinct names alone", () => {
		expect(uniqueHeaders(["Status", "Name", "Qty"])).toEqual(["Status", "Name", "Qty"]);
	});
});

describe("mergeRows", () => {
	it("unions headers in first-appearance order and appends provenance", () => {
		const merged = mergeRows([
			[filteredRow(["New Request", "Alice"])],
			[filteredRow(["New Request", "Carol", "2"], ["Status", "Name", "Qty"], "sheet-b", "Orders")],
		]);

		expect(merged.headers).toEqual(["Status", "Name", "Qty", ...PROVENANCE_COLUMNS]);
		expect(merged.rows.map((r) => r.values[1])).toEqual(["Alice", "Carol"]);
	});

	it("keeps source order, then row order", () => {
		const merged = mergeRows([
			[filteredRow(["New Request", "B1"], undefined, "b"), filteredRow(["New Request", "B2"], undefined, "b")],
			[filteredRow(["New Request", "A1"], undefined, "a")],
		]);
		expect(merged.rows.map((r) => r.values[1])).toEqual(["B1", "B2", "A1"]);
	});

	it("does not duplicate provenance columns a table already has", () => {
		const merged = mergeRows([
			[filteredRow(["New Request", "Alice", "stale"], ["Status", "Name", "source_sheet"])],
		]);
		expect(merged.headers).toEqual(["Status", "Name", "source_spreadsheet", "source_sheet"]);
	});
});

describe("toMatrix", () => {
	it("fills missing columns with null and stamps provenance", () => {
		const merged = mergeRows([
			[filteredRow(["New Request", "Alice"])],
			[filteredRow(["New Request", "Carol", "2"], ["Status", "Name", "Qty"], "sheet-b", "Orders")],
		]);

		expect(toMatrix(merged)).toEqual([
			["New Request", "Alice", null, "sheet-a", "Intake"],
			["New Request", "Carol", "2", "sheet-b", "Orders"],
		]);
	});

	it("places columns by name when tables order them differently", () => {
		const merged = mergeRows([
			[filteredRow(["New Request", "Alice", "x@example.com"], ["Status", "Name", "Email"])],
			[filteredRow(["New Request", "d@example.com", "Dan"], ["Status", "Email", "Name"], "sheet-c", "Web")],
		]);

		expect(toMatrix(merged)[1]).toEqual(["New Request", "Dan", "d@example.com", "sheet-c", "Web"]);
	});

	it("keeps every cell of a repeated column", () => {
		const merged = mergeRows([
			[filteredRow(["New Request", "Alice", "first", "second"], ["Status", "Name", "Note", "Note"])],
			[filteredRow(["New Request", "Carol", "third"], ["Status", "Name", "Note"], "sheet-b", "Orders")],
		]);

		expect(merged.headers).toEqual(["Status", "Name", "Note", "Note_2", ...PROVENANCE_COLUMNS]);
		expect(toMatrix(merged)).toEqual([
			["New Request", "Alice", "first", "second", "sheet-a", "Intake"],
			["New Request", "Carol", "third", null, "sheet-b", "Orders"],
		]);
	});

	it("keeps cells under blank headers", () => {
		const merged = mergeRows([[filteredRow(["New Request", "Alice", "x", "y"], ["Status", "Name", "", ""])]]);

		expect(merged.headers).toEqual(["Status", "Name", "", "_2", ...PROVENANCE_COLUMNS]);
		expect(toMatrix(merged)).toEqual([["New Request", "Alice", "x", "y", "sheet-a", "Intake"]]);
	});

	it("overrides a table's own provenance column", () => {
		const merged = mergeRows([
			[filteredRow(["New Request", "Alice", "stale"], ["Status", "Name", "source_sheet"])],
		]);
		expect(toMatrix(merged)).toEqual([["New Request", "Alice", "sheet-a", "Intake"]]);
	});
});

import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../result/errors";
import type { SourceRef } from "../../source/types";
import { RowFilter } from "../row-filter";

const ref: SourceRef = { sourceId: "sheet-a", tableName: "Intake" };

describe("RowFilter", () => {
	it("keeps only pending rows with a non-empty second column", () => {
		const filter = new RowFilter();
		const headers = ["Status", "Name"];
		const result = filter.apply(ref, headers, [
			["New Request", "Alice"],
			["Done", "Bob"],
			["New Request", ""],
		]);

		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value).toEqual([
				{ sourceId: "sheet-a", tableName: "Intake", headers, values: ["New Request", "Alice"] },
			]);
		}
	});

	it("excludes rows whose second column is null", () => {
		const result = new RowFilter().apply(ref, ["Status", "Name"], [["New Request", null]]);
		expect(result).toEqual({ ok: true, value: [] });
	});

	it("preserves the original row order", () => {
		const result = new RowFilter().apply(
			ref,
			["Status", "Name", "Notes"],
			[
				["New Request", "Zed", null],
				["Done", "Yan", "x"],
				["New Request", "Abe", "first"],
			],
		);

		expect(result.ok).toBe(true);
		if (result.ok) {
			expect(result.value.map((r) => r.values[1])).toEqual(["Zed", "Abe"]);
		}
	});

	it("compares the status exactly", () => {
		const result = new RowFilter().apply(
			ref,
			["Status", "Name"],
			[
				["new request", "Alice"],
				["New Request ", "Bob"],
			],
		);
		expect(result).toEqual({ ok: true, value: [] });
	});

	it("reports a single-column table as a configuration error", () => {
		const result = new RowFilter().apply(ref, ["Status"], [["New Request"]]);

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ConfigurationError);
			expect(result.error.message).toBe(
				"Spreadsheet sheet-a, sheet Intake has 1 column(s); at least 2 are required",
			);
		}
	});

	it("accepts a custom pending status", () => {
		const filter = new RowFilter({ pendingStatus: "Ready" });
		expect(filter.matches(["Ready", "Alice"])).toBe(true);
		expect(filter.matches(["New Request", "Alice"])).toBe(false);
	});
});

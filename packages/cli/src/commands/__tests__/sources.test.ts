import { readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { sourcesAdd, sourcesList, sourcesRemove } from "../sources";
import { createContext, makeTestDir, writeConfig } from "./helpers";

describe("sources commands", () => {
	let dir: string;

	function savedSources(): unknown {
		return JSON.parse(readFileSync(join(dir, "sheetmerge.config.json"), "utf-8")).sources;
	}

	beforeEach(() => {
		dir = makeTestDir("sources");
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	describe("list", () => {
		it("reports when nothing is configured", () => {
			expect(sourcesList(createContext(dir))).toEqual({
				ok: true,
				message: "No spreadsheets configured",
			});
		});

		it("lists sources with their 1-based positions", () => {
			writeConfig(dir, { spreadsheets: [["sheet-a", "Intake"], ["sheet-b", "Orders"]] });

			const result = sourcesList(createContext(dir));

			expect(result.ok).toBe(true);
			expect(result.message.split("\n")).toEqual([
				"#  spreadsheet  sheet",
				"-  -----------  ------",
				"1  sheet-a      Intake",
				"2  sheet-b      Orders",
			]);
		});

		it("reports an invalid config file", () => {
			writeConfig(dir, { sources: "sheet-a" });

			const result = sourcesList(createContext(dir));

			expect(result.ok).toBe(false);
			expect(result.message).toBe(
				`${join(dir, "sheetmerge.config.json")}: Config "sources" must be an array`,
			);
		});
	});

	describe("add", () => {
		it("creates the config file on first add", () => {
			const result = sourcesAdd(createContext(dir, { spreadsheet: "sheet-a", sheet: "Intake" }));

			expect(result).toEqual({ ok: true, message: "Added sheet-a/Intake as source 1" });
			expect(savedSources()).toEqual([{ sourceId: "sheet-a", tableName: "Intake" }]);
		});

		it("appends after existing sources", () => {
			writeConfig(dir, { sources: [{ sourceId: "sheet-a", tableName: "Intake" }] });

			const result = sourcesAdd(createContext(dir, { spreadsheet: "sheet-b", sheet: "Orders" }));

			expect(result.message).toBe("Added sheet-b/Orders as source 2");
			expect(savedSources()).toEqual([
				{ sourceId: "sheet-a", tableName: "Intake" },
				{ sourceId: "sheet-b", tableName: "Orders" },
			]);
		});

		it("requires both the spreadsheet and the sheet", () => {
			expect(sourcesAdd(createContext(dir, { spreadsheet: "sheet-a" }))).toEqual({
				ok: false,
				message: "Please provide both --spreadsheet <id> and --sheet <name>",
			});
		});

		it("refuses duplicates", () => {
			writeConfig(dir, { sources: [{ sourceId: "sheet-a", tableName: "Intake" }] });

			const result = sourcesAdd(createContext(dir, { spreadsheet: "sheet-a", sheet: "Intake" }));

			expect(result).toEqual({ ok: false, message: "sheet-a/Intake is already configured" });
		});

		it("writes to the file named by --config", () => {
			sourcesAdd(
				createContext(dir, { spreadsheet: "sheet-a", sheet: "Intake", config: "alt/sources.json" }),
			);

			const raw = JSON.parse(readFileSync(join(dir, "alt", "sources.json"), "utf-8"));
			expect(raw.sources).toEqual([{ sourceId: "sheet-a", tableName: "Intake" }]);
		});
	});

	describe("remove", () => {
		beforeEach(() => {
			writeConfig(dir, {
				sources: [
					{ sourceId: "sheet-a", tableName: "Intake" },
					{ sourceId: "sheet-b", tableName: "Orders" },
				],
			});
		});

		it("removes by position", () => {
			const result = sourcesRemove(createContext(dir, { index: "1" }));

			expect(result).toEqual({ ok: true, message: "Removed sheet-a/Intake" });
			expect(savedSources()).toEqual([{ sourceId: "sheet-b", tableName: "Orders" }]);
		});

		it("removes by spreadsheet and sheet", () => {
			const result = sourcesRemove(createContext(dir, { spreadsheet: "sheet-b", sheet: "Orders" }));

			expect(result).toEqual({ ok: true, message: "Removed sheet-b/Orders" });
			expect(savedSources()).toEqual([{ sourceId: "sheet-a", tableName: "Intake" }]);
		});

		it.each([["0"], ["3"], ["1.5"], ["two"]])("rejects position %s", (index) => {
			expect(sourcesRemove(createContext(dir, { index }))).toEqual({
				ok: false,
				message: "--index must be between 1 and 2",
			});
		});

		it("reports a source that is not configured", () => {
			const result = sourcesRemove(createContext(dir, { spreadsheet: "sheet-c", sheet: "Intake" }));

			expect(result).toEqual({ ok: false, message: "sheet-c/Intake is not configured" });
		});

		it("requires a selector", () => {
			expect(sourcesRemove(createContext(dir)).ok).toBe(false);
		});
	});
});

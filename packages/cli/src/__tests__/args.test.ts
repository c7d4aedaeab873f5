import { describe, expect, it } from "vitest";
import { flagValue, hasFlag, parseArgs } from "../args";

describe("parseArgs", () => {
	it("parses a simple command", () => {
		const result = parseArgs(["node", "sheetmerge", "run"]);
		expect(result.command).toEqual(["run"]);
		expect(result.flags).toEqual({});
		expect(result.positional).toEqual([]);
	});

	it("parses a two-word command", () => {
		const result = parseArgs(["node", "sheetmerge", "sources", "list"]);
		expect(result.command).toEqual(["sources", "list"]);
	});

	it("does not join unknown second words into the command", () => {
		const result = parseArgs(["node", "sheetmerge", "sources", "purge"]);
		expect(result.command).toEqual(["sources"]);
		expect(result.positional).toEqual(["purge"]);
	});

	it("parses --flag value pairs", () => {
		const result = parseArgs([
			"node", "sheetmerge", "sources", "add",
			"--spreadsheet", "sheet-a",
			"--sheet", "Form Responses 1",
		]);
		expect(result.command).toEqual(["sources", "add"]);
		expect(result.flags).toEqual({ spreadsheet: "sheet-a", sheet: "Form Responses 1" });
	});

	it("parses --flag=value syntax", () => {
		const result = parseArgs(["node", "sheetmerge", "run", "--log-format=json", "--token=test-token"]);
		expect(result.flags).toEqual({ "log-format": "json", token: "test-token" });
	});

	it("never gives boolean flags a value", () => {
		const result = parseArgs(["node", "sheetmerge", "run", "--force", "extra", "--verbose"]);
		expect(result.flags).toEqual({ force: "true", verbose: "true" });
		expect(result.positional).toEqual(["extra"]);
	});

	it("parses -h short flags", () => {
		const result = parseArgs(["node", "sheetmerge", "-h"]);
		expect(result.command).toEqual([]);
		expect(result.flags).toEqual({ h: "true" });
	});

	it("handles empty arguments", () => {
		const result = parseArgs(["node", "sheetmerge"]);
		expect(result.command).toEqual([]);
		expect(result.flags).toEqual({});
		expect(result.positional).toEqual([]);
	});
});

describe("flag helpers", () => {
	const flags = { force: "true", config: "custom.json", sheet: "true" };

	it("reads boolean flags", () => {
		expect(hasFlag(flags, "force")).toBe(true);
		expect(hasFlag(flags, "untracked")).toBe(false);
	});

	it("treats a bare value flag as missing", () => {
		expect(flagValue(flags, "config")).toBe("custom.json");
		expect(flagValue(flags, "sheet")).toBeUndefined();
		expect(flagValue(flags, "token")).toBeUndefined();
	});
});

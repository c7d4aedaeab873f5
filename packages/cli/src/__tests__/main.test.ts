import { MemoryTabularApi } from "@sheetmerge/core";
import { describe, expect, it } from "vitest";
import { HELP, main, type MainOptions, VERSION } from "../main";

const options: MainOptions = {
	cwd: "/nonexistent",
	env: {},
	createApi: () => new MemoryTabularApi(),
	now: () => new Date("2026-03-01T09:00:00.000Z"),
};

describe("main", () => {
	it("prints help when no command is given", async () => {
		expect(await main(["node", "sheetmerge"], options)).toEqual({ ok: true, message: HELP });
	});

	it.each([["--help"], ["-h"], ["help"]])("prints help for %s", async (arg) => {
		expect(await main(["node", "sheetmerge", arg], options)).toEqual({ ok: true, message: HELP });
	});

	it.each([["--version"], ["-v"], ["version"]])("prints the version for %s", async (arg) => {
		expect(await main(["node", "sheetmerge", arg], options)).toEqual({ ok: true, message: VERSION });
	});

	it("rejects unknown commands", async () => {
		expect(await main(["node", "sheetmerge", "combine"], options)).toEqual({
			ok: false,
			message: "Unknown command: combine\nRun 'sheetmerge --help' for usage.",
		});
	});

	it("dispatches two-word commands", async () => {
		const result = await main(["node", "sheetmerge", "sources", "list"], options);

		expect(result).toEqual({ ok: true, message: "No spreadsheets configured" });
	});
});

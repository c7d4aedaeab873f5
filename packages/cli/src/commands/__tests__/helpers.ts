import { mkdirSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MemoryTabularApi } from "@sheetmerge/core";
import type { CommandContext } from "../context";

export const NOW = new Date("2026-03-01T09:00:00.000Z");

let counter = 0;

/** Fresh directory under the OS temp dir. */
export function makeTestDir(prefix: string): string {
	counter++;
	const dir = join(tmpdir(), `sheetmerge-${prefix}-${Date.now()}-${counter}`);
	mkdirSync(dir, { recursive: true });
	return dir;
}

/** Write `config` as `sheetmerge.config.json` in `dir`. */
export function writeConfig(dir: string, config: unknown): void {
	writeFileSync(join(dir, "sheetmerge.config.json"), JSON.stringify(config, null, "\t"));
}

/** Two spreadsheets with one pending row each (same data as the core tests). */
export function createApi(): MemoryTabularApi {
	return new MemoryTabularApi()
		.setTable("sheet-a", "Intake", [
			["Status", "Name"],
			["New Request", "Alice"],
			["Done", "Bob"],
			["New Request", ""],
		])
		.setTable("sheet-b", "Orders", [
			["Status", "Name", "Qty"],
			["New Request", "Carol", "2"],
		]);
}

/** Command context rooted at `cwd`, collecting log lines in `logs`. */
export function createContext(
	cwd: string,
	flags: Record<string, string> = {},
	overrides: Partial<CommandContext> = {},
): CommandContext & { logs: string[] } {
	const logs: string[] = [];
	return {
		flags,
		cwd,
		env: {},
		createApi: () => createApi(),
		now: () => NOW,
		writeLog: (line) => logs.push(line),
		logs,
		...overrides,
	};
}

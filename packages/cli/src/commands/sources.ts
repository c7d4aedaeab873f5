import { type CommandResult, describeSource, type SourceRef } from "@sheetmerge/core";
import { flagValue } from "../args";
import { loadConfig, resolveConfigPath, saveConfig } from "../config";
import { formatTable } from "../output";
import type { CommandContext } from "./context";

function sameSource(a: SourceRef, b: SourceRef): boolean {
	return a.sourceId === b.sourceId && a.tableName === b.tableName;
}

/**
 * `sheetmerge sources list`: Show configured sources in processing order.
 */
export function sourcesList(ctx: CommandContext): CommandResult {
	const config = loadConfig(resolveConfigPath(flagValue(ctx.flags, "config"), ctx.cwd));
	if (!config.ok) return { ok: false, message: config.error.message };

	if (config.value.sources.length === 0) {
		return { ok: true, message: "No spreadsheets configured" };
	}

	return {
		ok: true,
		message: formatTable(
			config.value.sources.map((ref, i) => ({
				"#": i + 1,
				spreadsheet: ref.sourceId,
				sheet: ref.tableName,
			})),
		),
	};
}

/**
 * `sheetmerge sources add`: Append a source. Creates the config file if needed.
 */
export function sourcesAdd(ctx: CommandContext): CommandResult {
	const sourceId = flagValue(ctx.flags, "spreadsheet")?.trim();
	const tableName = flagValue(ctx.flags, "sheet")?.trim();
	if (!sourceId || !tableName) {
		return { ok: false, message: "Please provide both --spreadsheet <id> and --sheet <name>" };
	}

	const path = resolveConfigPath(flagValue(ctx.flags, "config"), ctx.cwd);
	const config = loadConfig(path);
	if (!config.ok) return { ok: false, message: config.error.message };

	const ref: SourceRef = { sourceId, tableName };
	if (config.value.sources.some((s) => sameSource(s, ref))) {
		return { ok: false, message: `${describeSource(ref)} is already configured` };
	}

	const sources = [...config.value.sources, ref];
	const saved = saveConfig(path, { ...config.value, sources });
	if (!saved.ok) return { ok: false, message: saved.error.message };

	return { ok: true, message: `Added ${describeSource(ref)} as source ${sources.length}` };
}

/**
 * `sheetmerge sources remove`: Remove a source by `--index` (1-based) or by
 * `--spreadsheet` and `--sheet`.
 */
export function sourcesRemove(ctx: CommandContext): CommandResult {
	const path = resolveConfigPath(flagValue(ctx.flags, "config"), ctx.cwd);
	const config = loadConfig(path);
	if (!config.ok) return { ok: false, message: config.error.message };

	const { sources } = config.value;
	let index: number;

	const indexFlag = flagValue(ctx.flags, "index");
	if (indexFlag !== undefined) {
		const n = Number(indexFlag);
		if (!Number.isInteger(n) || n < 1 || n > sources.length) {
			return {
				ok: false,
				message:
					sources.length === 0
						? "No spreadsheets configured"
						: `--index must be between 1 and ${sources.length}`,
			};
		}
		index = n - 1;
	} else {
		const sourceId = flagValue(ctx.flags, "spreadsheet");
		const tableName = flagValue(ctx.flags, "sheet");
		if (!sourceId || !tableName) {
			return {
				ok: false,
				message: "Please provide --index <n>, or both --spreadsheet <id> and --sheet <name>",
			};
		}
		const ref: SourceRef = { sourceId, tableName };
		index = sources.findIndex((s) => sameSource(s, ref));
		if (index === -1) {
			return { ok: false, message: `${describeSource(ref)} is not configured` };
		}
	}

	const removed = sources[index];
	if (!removed) return { ok: false, message: `No source at position ${index + 1}` };

	const saved = saveConfig(path, {
		...config.value,
		sources: sources.filter((_, i) => i !== index),
	});
	if (!saved.ok) return { ok: false, message: saved.error.message };

	return { ok: true, message: `Removed ${describeSource(removed)}` };
}

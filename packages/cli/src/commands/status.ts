import { type CommandResult, FileTrackingStore, getEntry, sourceKey } from "@sheetmerge/core";
import { flagValue } from "../args";
import { loadConfig, resolveConfigPath, resolveFromConfig } from "../config";
import { formatTable } from "../output";
import type { CommandContext } from "./context";

const FINGERPRINT_PREVIEW = 12;

/**
 * `sheetmerge status`: Show what the tracking store knows about each source.
 *
 * Configured sources come first, in processing order; entries for sources
 * no longer configured follow.
 */
export async function status(ctx: CommandContext): Promise<CommandResult> {
	const configPath = resolveConfigPath(flagValue(ctx.flags, "config"), ctx.cwd);
	const config = loadConfig(configPath);
	if (!config.ok) return { ok: false, message: config.error.message };

	const trackingPath = resolveFromConfig(configPath, config.value.trackingFile);
	const loaded = await new FileTrackingStore(trackingPath).load();
	if (!loaded.ok) return { ok: false, message: loaded.error.message };

	const { entries, lastRun } = loaded.value;
	const configuredKeys = config.value.sources.map(sourceKey);
	const keys = [
		...configuredKeys,
		...Object.keys(entries).filter((key) => !configuredKeys.includes(key)),
	];

	if (keys.length === 0) {
		return { ok: true, message: `Last run: ${lastRun ?? "never"}\nNo sources configured or tracked` };
	}

	const rows = keys.map((key) => {
		const entry = getEntry(entries, key);
		return {
			source: key,
			"last processed": entry?.lastProcessedAt ?? "never",
			"last checked": entry?.lastCheckedAt ?? "-",
			rows: entry?.metadata?.rowCount ?? "-",
			fingerprint: entry ? entry.fingerprint.slice(0, FINGERPRINT_PREVIEW) : "-",
		};
	});

	return { ok: true, message: `Last run: ${lastRun ?? "never"}\n${formatTable(rows)}` };
}

import {
	type CommandResult,
	CsvExportWriter,
	describeSource,
	FileTrackingStore,
	Reconciler,
	type ReconcileMode,
	type ReconcileReport,
	toMatrix,
} from "@sheetmerge/core";
import { flagValue, hasFlag } from "../args";
import { loadConfig, resolveConfigPath, resolveFromConfig, TOKEN_ENV } from "../config";
import { CliLogger, LOG_FORMATS, type LogFormat } from "../logger";
import { formatGrid } from "../output";
import type { CommandContext } from "./context";

function isLogFormat(value: string): value is LogFormat {
	return LOG_FORMATS.some((format) => format === value);
}

/**
 * `sheetmerge run`: One reconciliation pass over every configured source.
 *
 * `--force` and `--untracked` override the configured mode for this pass.
 * `--preview` appends the combined rows to the summary.
 */
export async function run(ctx: CommandContext): Promise<CommandResult> {
	const force = hasFlag(ctx.flags, "force");
	const untracked = hasFlag(ctx.flags, "untracked");
	if (force && untracked) {
		return { ok: false, message: "--force and --untracked cannot be used together" };
	}

	const format = flagValue(ctx.flags, "log-format") ?? "text";
	if (!isLogFormat(format)) {
		return { ok: false, message: `--log-format must be one of ${LOG_FORMATS.join(", ")}` };
	}

	const configPath = resolveConfigPath(flagValue(ctx.flags, "config"), ctx.cwd);
	const config = loadConfig(configPath);
	if (!config.ok) return { ok: false, message: config.error.message };

	const { sources } = config.value;
	if (sources.length === 0) {
		return {
			ok: false,
			message:
				"No spreadsheets configured. Add one with: sheetmerge sources add --spreadsheet <id> --sheet <name>",
		};
	}

	const token = flagValue(ctx.flags, "token") ?? ctx.env[TOKEN_ENV];
	if (!token) {
		return { ok: false, message: `An access token is required: pass --token or set ${TOKEN_ENV}` };
	}

	const mode: ReconcileMode = force ? "force" : untracked ? "untracked" : config.value.mode;
	const logger = new CliLogger({
		level: hasFlag(ctx.flags, "verbose") ? "debug" : "info",
		format,
		write: ctx.writeLog,
		now: ctx.now,
	}).child({ mode });

	const reconciler = new Reconciler({
		api: ctx.createApi(token, { modifiedTimeSource: config.value.modifiedTimeSource }),
		trackingStore: new FileTrackingStore(resolveFromConfig(configPath, config.value.trackingFile)),
		exporter: new CsvExportWriter({
			outputDir: resolveFromConfig(configPath, config.value.outputDir),
			baseName: config.value.exportBaseName,
		}),
		mode,
		pendingStatus: config.value.pendingStatus,
		consumedStatus: config.value.consumedStatus,
		logger: logger.asCallback(),
		now: ctx.now,
	});

	const report = await reconciler.run(sources);
	let message = formatReport(report);
	if (hasFlag(ctx.flags, "preview") && report.merged && report.merged.rows.length > 0) {
		message += `\n\n${formatGrid(report.merged.headers, toMatrix(report.merged))}`;
	}
	return { ok: report.ok, message };
}

/** Summary line followed by one line per source. */
export function formatReport(report: ReconcileReport): string {
	const lines = [report.message];
	for (const source of report.sources) {
		lines.push(`  ${describeSource(source.ref)}: ${source.status} - ${source.message}`);
	}
	return lines.join("\n");
}

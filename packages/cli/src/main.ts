import { SheetsClient } from "@sheetmerge/connector-sheets";
import type { CommandResult } from "@sheetmerge/core";
import { hasFlag, parseArgs } from "./args";
import { run } from "./commands/run";
import type { CommandContext } from "./commands/context";
import { sourcesAdd, sourcesList, sourcesRemove } from "./commands/sources";
import { status } from "./commands/status";

export const VERSION = "0.1.0";

export const HELP = `sheetmerge: merge pending rows from spreadsheet tabs into one CSV

Usage: sheetmerge <command> [options]

Commands:
  run                      Fetch, filter and merge new rows, then mark them in their sheets
  sources list             List configured spreadsheet tabs
  sources add              Add a spreadsheet tab
  sources remove           Remove a spreadsheet tab
  status                   Show tracking state per source

Run options:
  --force                  Process every source regardless of tracked content
  --untracked              Process every source, still recording state
  --token <token>          API access token (or SHEETMERGE_ACCESS_TOKEN env)
  --preview                Print the combined rows after the summary
  --verbose                Include debug log lines
  --log-format <text|json> Log line format on stderr (default: text)

Source options:
  --spreadsheet <id>       Spreadsheet ID
  --sheet <name>           Sheet (tab) name
  --index <n>              Position from 'sources list' (for remove)

General:
  --config <path>          Config file (default: ./sheetmerge.config.json)
  --help, -h               Show this help message
  --version, -v            Show version

Examples:
  sheetmerge sources add --spreadsheet 1AbC --sheet "Form Responses 1"
  sheetmerge run --token $TOKEN
  sheetmerge run --force --log-format json
  sheetmerge sources remove --index 2
`;

/** Surroundings a CLI invocation runs in; tests override them. */
export type MainOptions = Omit<CommandContext, "flags">;

/** Default surroundings: the real process and the Sheets API. */
export function processOptions(): MainOptions {
	return {
		cwd: process.cwd(),
		env: process.env,
		createApi: (accessToken, options) => new SheetsClient({ accessToken, ...options }),
		now: () => new Date(),
	};
}

/** Parse `argv` and run the selected command. Never throws for user errors. */
export async function main(argv: string[], options: MainOptions): Promise<CommandResult> {
	const { command, flags } = parseArgs(argv);

	if (hasFlag(flags, "version") || hasFlag(flags, "v")) {
		return { ok: true, message: VERSION };
	}

	if (hasFlag(flags, "help") || hasFlag(flags, "h") || command.length === 0) {
		return { ok: true, message: HELP };
	}

	const ctx: CommandContext = { ...options, flags };
	const cmd = command.join(" ");

	switch (cmd) {
		case "run":
			return run(ctx);

		case "sources list":
			return sourcesList(ctx);

		case "sources add":
			return sourcesAdd(ctx);

		case "sources remove":
			return sourcesRemove(ctx);

		case "status":
			return status(ctx);

		case "help":
			return { ok: true, message: HELP };

		case "version":
			return { ok: true, message: VERSION };

		default:
			return { ok: false, message: `Unknown command: ${cmd}\nRun 'sheetmerge --help' for usage.` };
	}
}

/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** The command path (e.g. ["sources", "add"]) */
	command: string[];
	/** Named flags (e.g. --sheet becomes { sheet: "value" }) */
	flags: Record<string, string>;
	/** Positional arguments after the command */
	positional: string[];
}

/** Known two-word commands. */
const TWO_WORD_COMMANDS = new Set(["sources list", "sources add", "sources remove"]);

/** Flags that never take a value, so the word after them is not swallowed. */
const BOOLEAN_FLAGS = new Set([
	"force",
	"untracked",
	"preview",
	"verbose",
	"help",
	"version",
	"h",
	"v",
]);

/**
 * Parse process.argv into structured command, flags, and positional args.
 *
 * Supports:
 * - `--flag value` style options
 * - `--flag=value` style options
 * - Commands and subcommands before flags
 * - Positional arguments mixed with flags
 */
export function parseArgs(argv: string[]): ParsedArgs {
	// Skip node binary and script path
	const args = argv.slice(2);

	const command: string[] = [];
	const flags: Record<string, string> = {};
	const positional: string[] = [];

	let i = 0;

	// Consume the first non-flag word as the command
	const first = args[0];
	if (first !== undefined && !first.startsWith("-")) {
		command.push(first);
		i++;

		// Check if this could be a two-word command
		const second = args[1];
		if (second !== undefined && TWO_WORD_COMMANDS.has(`${first} ${second}`)) {
			command.push(second);
			i++;
		}
	}

	// Parse remaining as flags and positional args
	while (i < args.length) {
		const arg = args[i] ?? "";

		if (arg.startsWith("--")) {
			const equalIdx = arg.indexOf("=");
			if (equalIdx !== -1) {
				// --flag=value
				flags[arg.slice(2, equalIdx)] = arg.slice(equalIdx + 1);
			} else {
				// --flag value
				const key = arg.slice(2);
				const nextArg = args[i + 1];
				if (!BOOLEAN_FLAGS.has(key) && nextArg !== undefined && !nextArg.startsWith("-")) {
					flags[key] = nextArg;
					i++;
				} else {
					flags[key] = "true";
				}
			}
		} else if (arg.startsWith("-") && arg.length === 2) {
			// Short flag: -c value
			const key = arg.slice(1);
			const nextArg = args[i + 1];
			if (!BOOLEAN_FLAGS.has(key) && nextArg !== undefined && !nextArg.startsWith("-")) {
				flags[key] = nextArg;
				i++;
			} else {
				flags[key] = "true";
			}
		} else {
			positional.push(arg);
		}
		i++;
	}

	return { command, flags, positional };
}

/** True when a boolean flag was given (`--force`, `--force=true`). */
export function hasFlag(flags: Record<string, string>, name: string): boolean {
	return flags[name] === "true";
}

/** Value of a flag that takes one, or `undefined` when absent or given bare. */
export function flagValue(flags: Record<string, string>, name: string): string | undefined {
	const value = flags[name];
	if (value === undefined || value === "true") return undefined;
	return value;
}

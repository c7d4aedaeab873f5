import type { ModifiedTimeSource } from "@sheetmerge/connector-sheets";
import type { TabularApi } from "@sheetmerge/core";

/** Settings from the config file that shape the remote client. */
export interface ApiOptions {
	modifiedTimeSource: ModifiedTimeSource;
}

/** Everything a command reads from its surroundings. */
export interface CommandContext {
	/** Flags parsed from the command line. */
	flags: Record<string, string>;
	/** Directory a relative `--config` is resolved against. */
	cwd: string;
	env: Record<string, string | undefined>;
	/** Builds the remote spreadsheet client from an access token. */
	createApi: (accessToken: string, options: ApiOptions) => TabularApi;
	now: () => Date;
	/** Where log lines go (default stderr). */
	writeLog?: (line: string) => void;
}

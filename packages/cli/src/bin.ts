#!/usr/bin/env tsx

import { main, processOptions } from "./main";
import { print, printError } from "./output";

main(process.argv, processOptions())
	.then((result) => {
		if (result.ok) {
			print(result.message);
		} else {
			printError(result.message);
			process.exitCode = 1;
		}
	})
	.catch((err: unknown) => {
		printError(err instanceof Error ? (err.stack ?? err.message) : String(err));
		process.exitCode = 1;
	});

import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const packages = fileURLToPath(new URL("./packages/", import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@sheetmerge/core": `${packages}core/src/index.ts`,
			"@sheetmerge/connector-sheets": `${packages}connector-sheets/src/index.ts`,
		},
	},
	test: {
		globals: true,
		include: ["packages/*/src/**/__tests__/**/*.test.ts"],
		testTimeout: 30_000,
	},
});

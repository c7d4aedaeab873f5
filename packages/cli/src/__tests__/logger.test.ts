import { describe, expect, it } from "vitest";
import { CliLogger, type CliLoggerOptions } from "../logger";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date("2026-03-01T09:00:00.000Z");

/** Collect log output into an array of lines. */
function createTestLogger(options: CliLoggerOptions = {}) {
	const lines: string[] = [];
	const logger = new CliLogger({ now: () => NOW, write: (line) => lines.push(line), ...options });
	return { logger, lines };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("CliLogger", () => {
	it("writes text lines with trailing key=value fields", () => {
		const { logger, lines } = createTestLogger();
		logger.info("Accepted rows", { sourceId: "sheet-a", rows: 3 });

		expect(lines).toEqual(["2026-03-01T09:00:00.000Z INFO  Accepted rows sourceId=sheet-a rows=3"]);
	});

	it("writes JSON lines", () => {
		const { logger, lines } = createTestLogger({ format: "json" });
		logger.warn("No data found", { tableName: "Intake" });

		expect(lines.map((line) => JSON.parse(line))).toEqual([
			{ level: "warn", msg: "No data found", ts: "2026-03-01T09:00:00.000Z", tableName: "Intake" },
		]);
	});

	it("filters messages below the minimum level", () => {
		const { logger, lines } = createTestLogger({ level: "warn" });
		logger.debug("no");
		logger.info("no");
		logger.warn("yes");
		logger.error("yes");

		expect(lines).toEqual([
			"2026-03-01T09:00:00.000Z WARN  yes",
			"2026-03-01T09:00:00.000Z ERROR yes",
		]);
	});

	describe("child()", () => {
		it("merges parent bindings with its own", () => {
			const { logger, lines } = createTestLogger({ format: "json", bindings: { mode: "force" } });
			logger.child({ sourceId: "sheet-a" }).info("hello");

			expect(JSON.parse(lines[0] ?? "")).toEqual({
				level: "info",
				msg: "hello",
				ts: "2026-03-01T09:00:00.000Z",
				mode: "force",
				sourceId: "sheet-a",
			});
		});

		it("inherits the parent's level", () => {
			const { logger, lines } = createTestLogger({ level: "error" });
			logger.child({ a: 1 }).warn("dropped");

			expect(lines).toEqual([]);
		});
	});

	describe("asCallback()", () => {
		it("routes core log calls through level filtering and bindings", () => {
			const { logger, lines } = createTestLogger({ level: "info" });
			const callback = logger.child({ mode: "tracked" }).asCallback();

			callback("debug", "dropped");
			callback("info", "Saved tracking data", { trackingFile: "t.json" });

			expect(lines).toEqual([
				"2026-03-01T09:00:00.000Z INFO  Saved tracking data mode=tracked trackingFile=t.json",
			]);
		});
	});
});

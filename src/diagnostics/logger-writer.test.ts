import { describe, expect, it } from "vitest";
import { createLogger } from "../lib/logger/index.js";
import { LoggerDiagnosticWriter } from "./logger-writer.js";
import { Severity } from "./types.js";

function capture() {
	const lines: string[] = [];
	const logger = createLogger({
		level: "debug",
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	});
	return { lines, writer: new LoggerDiagnosticWriter(logger) };
}

describe("LoggerDiagnosticWriter", () => {
	it("writes one structured line per event", () => {
		const { lines, writer } = capture();
		writer.write({
			severity: Severity.Warning,
			component: "ingest.dedup",
			message: "Gap detected: price moved 6.00%",
			tickSequence: 12,
			timestampMs: 5_000,
		});

		expect(lines).toHaveLength(1);
		const line = JSON.parse(lines[0] ?? "{}");
		expect(line).toMatchObject({
			level: 40,
			module: "diagnostics",
			component: "ingest.dedup",
			tickSequence: 12,
			eventTimeMs: 5_000,
			msg: "Gap detected: price moved 6.00%",
		});
	});

	it("maps severities onto logger levels", () => {
		const { lines, writer } = capture();
		for (const severity of [Severity.Debug, Severity.Info, Severity.Warning, Severity.Critical]) {
			writer.write({ severity, component: "x", message: severity, tickSequence: null, timestampMs: 0 });
		}
		expect(lines.map((l) => JSON.parse(l).level)).toEqual([20, 30, 40, 60]);
	});
});

import { describe, expect, it } from "vitest";
import { createLogger } from "./index.js";

function capture(): { lines: string[]; destination: { write(msg: string): void } } {
	const lines: string[] = [];
	return {
		lines,
		destination: {
			write(msg: string) {
				lines.push(msg);
			},
		},
	};
}

describe("Logger", () => {
	describe("createLogger", () => {
		it("returns a Logger with all standard methods", () => {
			const logger = createLogger({ level: "info" });

			expect(typeof logger.info).toBe("function");
			expect(typeof logger.warn).toBe("function");
			expect(typeof logger.error).toBe("function");
			expect(typeof logger.fatal).toBe("function");
			expect(typeof logger.debug).toBe("function");
			expect(typeof logger.child).toBe("function");
		});

		it("child bindings appear in every line", () => {
			const out = capture();
			const logger = createLogger({ level: "info", destination: out.destination });
			logger.child({ component: "feed" }).info({ tickSequence: 7 }, "tick accepted");

			const line = JSON.parse(out.lines[0] ?? "{}");
			expect(line.component).toBe("feed");
			expect(line.tickSequence).toBe(7);
			expect(line.msg).toBe("tick accepted");
		});

		it("applies construction-time bindings", () => {
			const out = capture();
			const logger = createLogger({
				level: "info",
				destination: out.destination,
				bindings: { symbol: "TEST" },
			});
			logger.warn("gap");

			expect(JSON.parse(out.lines[0] ?? "{}").symbol).toBe("TEST");
		});

		it("fatal() writes at pino level 60", () => {
			const out = capture();
			const logger = createLogger({ level: "info", destination: out.destination });
			logger.fatal({ code: "CRITICAL_LOG_TIMEOUT" }, "halting entries");

			const line = JSON.parse(out.lines[0] ?? "{}");
			expect(line.level).toBe(60);
			expect(line.code).toBe("CRITICAL_LOG_TIMEOUT");
		});
	});

	describe("credential redaction", () => {
		it("redacts objects with __opaque property", () => {
			const out = capture();
			const logger = createLogger({ level: "info", destination: out.destination });

			const token = {
				__opaque: true as const,
				toString: () => "[REDACTED]",
				toJSON: () => "[REDACTED]",
			};
			logger.info({ feedToken: token }, "connecting");

			const line = JSON.parse(out.lines[0] ?? "{}");
			expect(line.feedToken).toBe("[REDACTED]");
		});

		it("censors configured paths", () => {
			const out = capture();
			const logger = createLogger({
				level: "info",
				redactPaths: ["token"],
				destination: out.destination,
			});

			logger.info({ token: "test-secret", url: "ws://localhost" }, "connecting");

			const line = JSON.parse(out.lines[0] ?? "{}");
			expect(line.token).toBe("[REDACTED]");
			expect(line.url).toBe("ws://localhost");
		});
	});

	describe("log levels", () => {
		it("drops lines below the configured level", () => {
			const out = capture();
			const logger = createLogger({ level: "warn", destination: out.destination });

			logger.debug("hidden");
			logger.info("hidden too");
			logger.warn("shown");

			expect(out.lines).toHaveLength(1);
			expect(out.lines[0]).toContain("shown");
		});

		it("does not throw when logging null", () => {
			const logger = createLogger({ level: "info", destination: capture().destination });
			expect(() => logger.info(null as unknown as string)).not.toThrow();
		});
	});
});

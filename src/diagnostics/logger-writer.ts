import type { Logger } from "../lib/logger/index.js";
import type { DiagnosticEvent, DiagnosticWriter, Severity } from "./types.js";

const LEVEL_FOR: Readonly<Record<Severity, "debug" | "info" | "warn" | "fatal">> = {
	debug: "debug",
	info: "info",
	warning: "warn",
	critical: "fatal",
};

/**
 * Writes diagnostics through the structured logger. Pino writes synchronously
 * to its destination, so critical events are on disk (or stdout) when
 * `write` returns.
 */
export class LoggerDiagnosticWriter implements DiagnosticWriter {
	private readonly logger: Logger;

	constructor(logger: Logger) {
		this.logger = logger.child({ module: "diagnostics" });
	}

	write(event: DiagnosticEvent): void {
		const level = LEVEL_FOR[event.severity];
		this.logger[level](
			{
				component: event.component,
				tickSequence: event.tickSequence,
				eventTimeMs: event.timestampMs,
			},
			event.message,
		);
	}
}

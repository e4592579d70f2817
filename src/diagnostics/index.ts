export {
	Severity,
	compareSeverity,
	type DiagnosticEvent,
	type DiagnosticWriter,
	type DiagnosticLogger,
} from "./types.js";
export {
	AsyncDiagnosticSink,
	type AsyncDiagnosticSinkConfig,
	type DiagnosticSinkStats,
} from "./diagnostic-sink.js";
export { LoggerDiagnosticWriter } from "./logger-writer.js";
export { MemoryDiagnosticWriter } from "./memory-writer.js";

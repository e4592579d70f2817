export type { ResultEvent, ResultsSink } from "./types.js";
export { MemoryResultsSink, type MemoryResultsSinkConfig } from "./memory-results-sink.js";
export {
	type CorruptLine,
	FileResultsSink,
	type FileResultsSinkConfig,
	type RestoreResult,
} from "./file-results-sink.js";

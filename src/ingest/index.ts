export { TransferBuffer } from "./transfer-buffer.js";
export { DedupGuard, type DedupGuardConfig, type GapCheck } from "./dedup-guard.js";
export {
	OverloadMonitor,
	type OverloadMonitorConfig,
	type OverloadStats,
} from "./overload-monitor.js";

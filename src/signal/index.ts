export type {
	ExitContext,
	ExitPolicy,
	ExitReason,
	ExitReasonType,
	PositionLike,
	TakeProfitTarget,
} from "./types.js";
export { ExitPipeline } from "./exit-pipeline.js";
export { EmergencyExit } from "./exits/emergency.js";
export { StopLossExit } from "./exits/stop-loss.js";
export { TakeProfitExit } from "./exits/take-profit.js";
export { TrailingStopExit } from "./exits/trailing-stop.js";
export { TimeExit } from "./exits/time-exit.js";

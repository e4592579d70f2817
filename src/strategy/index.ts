export {
	HoldReason,
	type StrategyDecision,
	type StrategyView,
	type WarmupState,
} from "./types.js";
export { WarmupTracker } from "./warmup.js";
export { SessionWindow } from "./session-window.js";
export {
	Ema,
	Macd,
	SessionVwap,
	GreenTickCounter,
	IndicatorSet,
	type IndicatorSnapshot,
	type MacdValue,
} from "./indicators.js";
export { evaluateEntry, type EntryCheck } from "./entry-rules.js";
export { StrategyEngine, type StrategyEngineConfig } from "./strategy-engine.js";

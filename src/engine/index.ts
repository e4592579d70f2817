export { TradingEngine, type TradingEngineDeps } from "./trading-engine.js";
export type { EngineCounters, EngineEvents, SequencedTick } from "./types.js";

export type { OpenIntent, PositionSnapshot, Trade } from "./types.js";
export { Position } from "./position.js";
export { createTrade } from "./trade.js";
export { maxAffordableLots, type SizedEntry, type SizingInput, sizeEntry } from "./sizing.js";
export {
	type OpenError,
	PositionLifecycleManager,
	type PositionLifecycleManagerConfig,
} from "./lifecycle-manager.js";

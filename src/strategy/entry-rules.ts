import type { StrategyConfig } from "../shared/config.js";
import type { IndicatorSnapshot } from "./indicators.js";

export interface EntryCheck {
	readonly pass: boolean;
	/** Names of the conditions that failed, in evaluation order. */
	readonly failed: readonly string[];
}

/**
 * Long entry: every enabled indicator must agree, and price must have risen
 * for at least `consecutiveGreenTicks` ticks in a row.
 */
export function evaluateEntry(config: StrategyConfig, snap: IndicatorSnapshot): EntryCheck {
	const failed: string[] = [];

	if (config.useEmaCrossover && !(snap.fastEma > snap.slowEma)) {
		failed.push("ema_crossover");
	}
	if (config.useMacd && !(snap.macd.line > snap.macd.signal && snap.macd.histogram > 0)) {
		failed.push("macd");
	}
	if (config.useVwap && !(snap.vwap !== null && snap.price > snap.vwap)) {
		failed.push("vwap");
	}
	if (snap.greenTicks < config.consecutiveGreenTicks) {
		failed.push("green_ticks");
	}

	return { pass: failed.length === 0, failed };
}

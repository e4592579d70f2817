/**
 * Position domain types.
 */

import type { Tick } from "../feed/types.js";
import type { PositionState } from "../lifecycle/types.js";
import type { ExitReason } from "../signal/types.js";
import type { LotsPerTrade } from "../shared/config.js";
import type { Decimal } from "../shared/decimal.js";
import type { InstrumentSymbol, PositionId } from "../shared/identifiers.js";

/** Request to go long at the tick's price. */
export interface OpenIntent {
	readonly tick: Tick;
	readonly lots: LotsPerTrade;
}

/**
 * Immutable record of a closed (or partially closed) slice of a position.
 * `grossPnl`, `commission` and `netPnl` are always populated together.
 */
export interface Trade {
	readonly positionId: PositionId;
	readonly symbol: InstrumentSymbol;
	readonly entryPrice: Decimal;
	/** Always the price of a delivered tick, never a computed level. */
	readonly exitPrice: Decimal;
	readonly lots: number;
	readonly quantity: number;
	readonly grossPnl: Decimal;
	readonly commission: Decimal;
	readonly netPnl: Decimal;
	readonly exitReason: ExitReason;
	readonly entryTimeMs: number;
	readonly exitTimeMs: number;
	/** True for a take-profit tier that left lots open. */
	readonly partial: boolean;
}

/** Serializable snapshot of the open position. */
export interface PositionSnapshot {
	readonly id: PositionId;
	readonly symbol: InstrumentSymbol;
	readonly status: PositionState;
	readonly entryPrice: Decimal;
	readonly entryTimeMs: number;
	readonly lots: number;
	readonly quantity: number;
	readonly stopLossLevel: Decimal;
	readonly takeProfitLevels: readonly Decimal[];
	readonly trailingStopLevel: Decimal | null;
	readonly highWaterMark: Decimal;
}

import type { Tick } from "../feed/types.js";
import type { Position } from "../position/position.js";
import type { Trade } from "../position/types.js";
import type { TradingError } from "../shared/errors.js";

/** A tick plus the producer-side delivery number it was accepted under. */
export interface SequencedTick {
	readonly tick: Tick;
	readonly sequence: number;
}

export interface EngineCounters {
	/** Ticks the source emitted (after normalization). */
	readonly received: number;
	/** Records the source rejected as malformed. */
	readonly malformed: number;
	readonly duplicates: number;
	readonly gapWarnings: number;
	readonly pushed: number;
	readonly overflows: number;
	readonly processed: number;
	readonly emergencyActivations: number;
	readonly sizingRejections: number;
	readonly trades: number;
	readonly diagnosticsDropped: number;
}

export type EngineEvents = {
	position_opened: (position: Position) => void;
	trade: (trade: Trade) => void;
	emergency_mode: (active: boolean) => void;
	fatal: (error: TradingError) => void;
};

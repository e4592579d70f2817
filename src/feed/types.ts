/**
 * Feed types — the Tick value and the source contract both feed variants share.
 *
 * Downstream code only ever sees a {@link TickEmitter} call; nothing after the
 * source can tell a live feed from a replay.
 */

import type { Decimal } from "../shared/decimal.js";
import type { InstrumentSymbol } from "../shared/identifiers.js";

export const TickOrigin = {
	Live: "live",
	Replay: "replay",
} as const;

export type TickOrigin = (typeof TickOrigin)[keyof typeof TickOrigin];

/** One price/volume observation. Frozen once normalized. */
export interface Tick {
	readonly symbol: InstrumentSymbol;
	readonly timestampMs: number;
	readonly price: Decimal;
	readonly volume: number;
	readonly origin: TickOrigin;
}

/** The fields that make two deliveries the same tick. */
export interface TickIdentity {
	readonly timestampMs: number;
	readonly price: Decimal;
	readonly volume: number;
}

export type TickEmitter = (tick: Tick) => void;

export interface TickSourceStats {
	readonly emitted: number;
	readonly malformed: number;
}

/** Push-feed or replay: one start/stop contract, one emit callback. */
export interface TickSource {
	readonly kind: TickOrigin;
	/** Resolves once the source has stopped delivering (stop, disconnect, or end of data). */
	start(emit: TickEmitter): Promise<void>;
	stop(): void;
	isActive(): boolean;
	/** True when the last run ended because there was nothing left to deliver. */
	exhausted(): boolean;
	stats(): TickSourceStats;
}

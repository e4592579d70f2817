/**
 * Strategy decision types.
 *
 * The strategy engine never touches positions; it answers one question per
 * tick and the engine routes the answer.
 */

import type { Tick } from "../feed/types.js";
import type { LotsPerTrade } from "../shared/config.js";

export const HoldReason = {
	OutsideEntryWindow: "outside_entry_window",
	DailyLimit: "daily_limit",
	NoSignal: "no_signal",
	EntriesHalted: "entries_halted",
} as const;

export type HoldReason = (typeof HoldReason)[keyof typeof HoldReason];

export type StrategyDecision =
	| { readonly kind: "warming_up"; readonly ticksSeen: number; readonly required: number }
	| { readonly kind: "hold"; readonly reason: HoldReason }
	/** A position is open: the position manager evaluates exits on this tick. */
	| { readonly kind: "manage" }
	| { readonly kind: "open"; readonly tick: Tick; readonly lots: LotsPerTrade };

/** What the strategy may know about the rest of the engine. */
export interface StrategyView {
	readonly hasOpenPosition: boolean;
	/** Emergency mode or a fatal halt. */
	readonly entriesBlocked: boolean;
}

export interface WarmupState {
	readonly ticksSeen: number;
	readonly required: number;
	readonly complete: boolean;
}

/**
 * Exit policy types.
 *
 * Slim interfaces (PositionLike, ExitContext) decouple signal/ from
 * position/ so that policies can be tested with plain stubs.
 */

import type { Tick } from "../feed/types.js";
import type { Decimal } from "../shared/decimal.js";

// ── Slim interfaces ─────────────────────────────────────────────────

/** One profit target: price level and the share of the original lots it releases. */
export interface TakeProfitTarget {
	readonly price: Decimal;
	readonly fraction: number;
	readonly hit: boolean;
}

/** Minimal long-position data needed by exit policies. */
export interface PositionLike {
	readonly entryPrice: Decimal;
	readonly entryTimeMs: number;
	readonly stopLossLevel: Decimal;
	readonly takeProfitLevels: readonly TakeProfitTarget[];
	readonly highWaterMark: Decimal;
	/** Null until the trail has activated. */
	readonly trailingStopLevel: Decimal | null;
}

/** The tick being evaluated plus session timing derived from it. */
export interface ExitContext {
	readonly tick: Tick;
	/** Fewer than the end-buffer minutes remain in the session, or it has ended. */
	readonly inClosingBuffer: boolean;
}

// ── Exit reason (discriminated union) ───────────────────────────────

export type ExitReason =
	| { readonly type: "emergency"; readonly adverseMovePct: number }
	| { readonly type: "stop_loss"; readonly level: Decimal }
	| {
			readonly type: "take_profit";
			readonly level: Decimal;
			readonly targetIndex: number;
			/** The last target: closes whatever is left. */
			readonly final: boolean;
	  }
	| { readonly type: "trailing_stop"; readonly level: Decimal }
	| { readonly type: "time_exit"; readonly cause: "max_duration" | "session_end"; readonly heldMs: number }
	| { readonly type: "forced"; readonly note: string };

export type ExitReasonType = ExitReason["type"];

// ── Exit policy interface ───────────────────────────────────────────

/** Decides from the observed tick alone whether an open long should exit. */
export interface ExitPolicy {
	readonly name: string;
	shouldExit(position: PositionLike, ctx: ExitContext): ExitReason | null;
}

/**
 * Position lifecycle types — one state machine per position instance.
 *
 * Flat → Open → Closing → Closed. Closed is terminal; the next entry gets a
 * fresh machine. Transitions are explicitly validated.
 */

// ── Position States ──────────────────────────────────────────────────

export const PositionState = {
	/** No position yet */
	Flat: "flat",
	/** Filled; exits evaluated on every tick */
	Open: "open",
	/** An exit has triggered; the trade is being booked */
	Closing: "closing",
	/** Terminal — trade emitted */
	Closed: "closed",
} as const;

export type PositionState = (typeof PositionState)[keyof typeof PositionState];

// ── State Transitions ────────────────────────────────────────────────

export type PositionTransition =
	| { readonly type: "fill"; readonly atMs: number }
	| { readonly type: "partial_exit"; readonly atMs: number; readonly lotsClosed: number }
	| { readonly type: "begin_close"; readonly atMs: number; readonly reason: string }
	| { readonly type: "complete_close"; readonly atMs: number };

export interface TransitionRecord {
	readonly from: PositionState;
	readonly to: PositionState;
	readonly transition: PositionTransition["type"];
	readonly atMs: number;
}

// ── State Errors ─────────────────────────────────────────────────────

export const StateErrorKind = {
	InvalidTransition: "invalid_transition",
	AlreadyTerminal: "already_terminal",
} as const;

export type StateErrorKind = (typeof StateErrorKind)[keyof typeof StateErrorKind];

export interface StateError {
	readonly kind: StateErrorKind;
	readonly message: string;
	readonly from: PositionState;
	readonly transition: PositionTransition["type"];
}

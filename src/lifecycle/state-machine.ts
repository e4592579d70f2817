/**
 * PositionStateMachine — validated lifecycle FSM for one position instance.
 *
 * All transitions go through transition() which validates the move.
 * History is bounded (last N transitions) for debugging.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import {
	type PositionTransition,
	PositionState,
	type StateError,
	StateErrorKind,
	type TransitionRecord,
} from "./types.js";

const MAX_HISTORY = 100;

export class PositionStateMachine {
	private current: PositionState = PositionState.Flat;
	private enteredAtMs: number | null = null;
	private readonly transitions: TransitionRecord[] = [];

	// ── Queries ────────────────────────────────────────────────────

	state(): PositionState {
		return this.current;
	}

	/** Tick time of the last transition, or null while Flat. */
	enteredAt(): number | null {
		return this.enteredAtMs;
	}

	/** Open or Closing: the instance still occupies the position slot. */
	isActive(): boolean {
		return this.current === PositionState.Open || this.current === PositionState.Closing;
	}

	/** Bounded transition history (most recent last) */
	history(): readonly TransitionRecord[] {
		return this.transitions;
	}

	// ── Transitions ────────────────────────────────────────────────

	transition(t: PositionTransition): Result<PositionState, StateError> {
		const from = this.current;

		if (from === PositionState.Closed) {
			return err({
				kind: StateErrorKind.AlreadyTerminal,
				message: "Position already closed",
				from,
				transition: t.type,
			});
		}

		const to = this.target(from, t);
		if (to === null) {
			return err({
				kind: StateErrorKind.InvalidTransition,
				message: `Cannot transition from ${from} via ${t.type}`,
				from,
				transition: t.type,
			});
		}

		this.record({ from, to, transition: t.type, atMs: t.atMs });
		this.current = to;
		this.enteredAtMs = t.atMs;
		return ok(to);
	}

	private target(from: PositionState, t: PositionTransition): PositionState | null {
		switch (t.type) {
			case "fill":
				return from === PositionState.Flat ? PositionState.Open : null;
			case "partial_exit":
				// A partial exit keeps the position open with fewer lots
				return from === PositionState.Open ? PositionState.Open : null;
			case "begin_close":
				return from === PositionState.Open ? PositionState.Closing : null;
			case "complete_close":
				return from === PositionState.Closing ? PositionState.Closed : null;
		}
	}

	private record(entry: TransitionRecord): void {
		if (this.transitions.length >= MAX_HISTORY) {
			this.transitions.shift();
		}
		this.transitions.push(entry);
	}
}

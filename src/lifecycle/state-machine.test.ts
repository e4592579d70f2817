import { describe, expect, it } from "vitest";
import { PositionStateMachine } from "./state-machine.js";
import { PositionState, StateErrorKind } from "./types.js";

describe("PositionStateMachine", () => {
	describe("initial state", () => {
		it("starts Flat and inactive", () => {
			const sm = new PositionStateMachine();
			expect(sm.state()).toBe(PositionState.Flat);
			expect(sm.isActive()).toBe(false);
			expect(sm.enteredAt()).toBeNull();
		});
	});

	describe("happy path lifecycle", () => {
		it("Flat → Open → Closing → Closed", () => {
			const sm = new PositionStateMachine();

			expect(sm.transition({ type: "fill", atMs: 1_000 }).ok).toBe(true);
			expect(sm.state()).toBe(PositionState.Open);
			expect(sm.isActive()).toBe(true);

			expect(sm.transition({ type: "begin_close", atMs: 2_000, reason: "stop_loss" }).ok).toBe(true);
			expect(sm.state()).toBe(PositionState.Closing);
			expect(sm.isActive()).toBe(true);

			expect(sm.transition({ type: "complete_close", atMs: 2_000 }).ok).toBe(true);
			expect(sm.state()).toBe(PositionState.Closed);
			expect(sm.isActive()).toBe(false);
			expect(sm.enteredAt()).toBe(2_000);
		});

		it("partial exits keep the position Open", () => {
			const sm = new PositionStateMachine();
			sm.transition({ type: "fill", atMs: 1_000 });

			const r = sm.transition({ type: "partial_exit", atMs: 1_500, lotsClosed: 2 });
			expect(r.ok).toBe(true);
			expect(sm.state()).toBe(PositionState.Open);
		});
	});

	describe("invalid transitions", () => {
		it("rejects closing a Flat position", () => {
			const sm = new PositionStateMachine();
			const r = sm.transition({ type: "begin_close", atMs: 1_000, reason: "forced" });

			expect(r.ok).toBe(false);
			if (!r.ok) {
				expect(r.error.kind).toBe(StateErrorKind.InvalidTransition);
				expect(r.error.from).toBe(PositionState.Flat);
				expect(r.error.transition).toBe("begin_close");
			}
			expect(sm.state()).toBe(PositionState.Flat);
		});

		it("rejects a second fill", () => {
			const sm = new PositionStateMachine();
			sm.transition({ type: "fill", atMs: 1_000 });
			expect(sm.transition({ type: "fill", atMs: 1_100 }).ok).toBe(false);
		});

		it("rejects partial exits while Closing", () => {
			const sm = new PositionStateMachine();
			sm.transition({ type: "fill", atMs: 1_000 });
			sm.transition({ type: "begin_close", atMs: 1_100, reason: "take_profit" });
			expect(sm.transition({ type: "partial_exit", atMs: 1_100, lotsClosed: 1 }).ok).toBe(false);
		});

		it("Closed is terminal", () => {
			const sm = new PositionStateMachine();
			sm.transition({ type: "fill", atMs: 1_000 });
			sm.transition({ type: "begin_close", atMs: 1_100, reason: "time_exit" });
			sm.transition({ type: "complete_close", atMs: 1_100 });

			const r = sm.transition({ type: "fill", atMs: 1_200 });
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error.kind).toBe(StateErrorKind.AlreadyTerminal);
		});
	});

	describe("history", () => {
		it("records each accepted transition in order", () => {
			const sm = new PositionStateMachine();
			sm.transition({ type: "fill", atMs: 1_000 });
			sm.transition({ type: "complete_close", atMs: 1_050 });
			sm.transition({ type: "begin_close", atMs: 1_100, reason: "stop_loss" });

			expect(sm.history()).toEqual([
				{ from: "flat", to: "open", transition: "fill", atMs: 1_000 },
				{ from: "open", to: "closing", transition: "begin_close", atMs: 1_100 },
			]);
		});

		it("keeps at most 100 entries", () => {
			const sm = new PositionStateMachine();
			sm.transition({ type: "fill", atMs: 0 });
			for (let i = 1; i <= 150; i++) {
				sm.transition({ type: "partial_exit", atMs: i, lotsClosed: 1 });
			}
			const history = sm.history();
			expect(history).toHaveLength(100);
			expect(history[history.length - 1]?.atMs).toBe(150);
			expect(history[0]?.atMs).toBe(51);
		});
	});
});

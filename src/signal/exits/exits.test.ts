import { describe, expect, it } from "vitest";
import { makeTick } from "../../testing/fixtures.js";
import { Decimal } from "../../shared/decimal.js";
import type { ExitContext, PositionLike, TakeProfitTarget } from "../types.js";
import { EmergencyExit } from "./emergency.js";
import { StopLossExit } from "./stop-loss.js";
import { TakeProfitExit } from "./take-profit.js";
import { TimeExit } from "./time-exit.js";
import { TrailingStopExit } from "./trailing-stop.js";

// ── Helpers ─────────────────────────────────────────────────────────

function target(price: string, fraction = 1, hit = false): TakeProfitTarget {
	return { price: Decimal.from(price), fraction, hit };
}

function makePosition(
	overrides: Partial<{
		entryPrice: string;
		stop: string;
		targets: TakeProfitTarget[];
		hwm: string;
		trail: string | null;
		entryOffsetMs: number;
	}> = {},
): PositionLike {
	const entryPrice = overrides.entryPrice ?? "100";
	const trail = overrides.trail ?? null;
	return {
		entryPrice: Decimal.from(entryPrice),
		entryTimeMs: makeTick(1, overrides.entryOffsetMs ?? 0).timestampMs,
		stopLossLevel: Decimal.from(overrides.stop ?? "90"),
		takeProfitLevels: overrides.targets ?? [target("120")],
		highWaterMark: Decimal.from(overrides.hwm ?? entryPrice),
		trailingStopLevel: trail === null ? null : Decimal.from(trail),
	};
}

function ctx(price: string, offsetMs = 1_000, inClosingBuffer = false): ExitContext {
	return { tick: makeTick(price, offsetMs), inClosingBuffer };
}

// ── EmergencyExit ───────────────────────────────────────────────────

describe("EmergencyExit", () => {
	const exit = EmergencyExit.fromPct(5);

	it("fires when the adverse move exceeds the limit", () => {
		const reason = exit.shouldExit(makePosition(), ctx("94"));
		expect(reason).toEqual({ type: "emergency", adverseMovePct: 6 });
	});

	it("does not fire at exactly the limit", () => {
		expect(exit.shouldExit(makePosition(), ctx("95"))).toBeNull();
	});

	it("ignores favourable moves", () => {
		expect(exit.shouldExit(makePosition(), ctx("130"))).toBeNull();
	});
});

// ── StopLossExit ────────────────────────────────────────────────────

describe("StopLossExit", () => {
	const exit = StopLossExit.create();

	it("fires at the stop level", () => {
		const reason = exit.shouldExit(makePosition(), ctx("90"));
		expect(reason?.type).toBe("stop_loss");
	});

	it("fires below the stop and reports the level, not the price", () => {
		const reason = exit.shouldExit(makePosition(), ctx("50"));
		expect(reason).toEqual({ type: "stop_loss", level: Decimal.from("90") });
	});

	it("holds above the stop", () => {
		expect(exit.shouldExit(makePosition(), ctx("90.05"))).toBeNull();
	});
});

// ── TakeProfitExit ──────────────────────────────────────────────────

describe("TakeProfitExit", () => {
	const exit = TakeProfitExit.create();

	it("fires the single target as final", () => {
		const reason = exit.shouldExit(makePosition(), ctx("120"));
		expect(reason).toEqual({
			type: "take_profit",
			level: Decimal.from("120"),
			targetIndex: 0,
			final: true,
		});
	});

	it("holds below the target", () => {
		expect(exit.shouldExit(makePosition(), ctx("119.95"))).toBeNull();
	});

	it("looks at the lowest target not yet hit", () => {
		const pos = makePosition({ targets: [target("110", 0.5, true), target("120", 0.5)] });
		expect(exit.shouldExit(pos, ctx("115"))).toBeNull();

		const reason = exit.shouldExit(pos, ctx("125"));
		expect(reason).toEqual({
			type: "take_profit",
			level: Decimal.from("120"),
			targetIndex: 1,
			final: true,
		});
	});

	it("marks a non-last target as not final", () => {
		const pos = makePosition({ targets: [target("110", 0.5), target("120", 0.5)] });
		const reason = exit.shouldExit(pos, ctx("125"));
		expect(reason).toMatchObject({ type: "take_profit", targetIndex: 0, final: false });
	});

	it("does nothing once every target is hit", () => {
		const pos = makePosition({ targets: [target("110", 1, true)] });
		expect(exit.shouldExit(pos, ctx("150"))).toBeNull();
	});
});

// ── TrailingStopExit ────────────────────────────────────────────────

describe("TrailingStopExit", () => {
	const exit = TrailingStopExit.fromPoints(5, 3);

	it("stays inactive until profit reaches the activation distance", () => {
		expect(exit.nextLevel(makePosition({ hwm: "104.95" }))).toBeNull();
	});

	it("activates at the activation distance", () => {
		expect(exit.nextLevel(makePosition({ hwm: "105" }))?.toString()).toBe("102");
	});

	it("follows the high-water mark up", () => {
		const level = exit.nextLevel(makePosition({ hwm: "110", trail: "102" }));
		expect(level?.toString()).toBe("107");
	});

	it("never moves down", () => {
		const level = exit.nextLevel(makePosition({ hwm: "108", trail: "107" }));
		expect(level?.toString()).toBe("107");
	});

	it("fires at or below the stored level", () => {
		const pos = makePosition({ hwm: "110", trail: "107" });
		expect(exit.shouldExit(pos, ctx("107"))).toEqual({ type: "trailing_stop", level: Decimal.from("107") });
		expect(exit.shouldExit(pos, ctx("107.05"))).toBeNull();
	});

	it("never fires without a level", () => {
		expect(exit.shouldExit(makePosition(), ctx("1"))).toBeNull();
	});
});

// ── TimeExit ────────────────────────────────────────────────────────

describe("TimeExit", () => {
	const exit = TimeExit.fromMins(30);

	it("holds up to the maximum duration", () => {
		expect(exit.shouldExit(makePosition(), ctx("100", 30 * 60_000))).toBeNull();
	});

	it("fires after the maximum duration", () => {
		const reason = exit.shouldExit(makePosition(), ctx("100", 30 * 60_000 + 1));
		expect(reason).toEqual({ type: "time_exit", cause: "max_duration", heldMs: 30 * 60_000 + 1 });
	});

	it("fires inside the session closing buffer", () => {
		const reason = exit.shouldExit(makePosition(), ctx("100", 60_000, true));
		expect(reason).toEqual({ type: "time_exit", cause: "session_end", heldMs: 60_000 });
	});
});

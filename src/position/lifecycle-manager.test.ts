import { describe, expect, it } from "vitest";
import { Severity } from "../diagnostics/types.js";
import { PositionState } from "../lifecycle/types.js";
import { MemoryResultsSink } from "../results/memory-results-sink.js";
import { PositionAlreadyOpenError, PositionSizeExceededError } from "../shared/errors.js";
import type { RawEngineConfigInput } from "../shared/config.js";
import { SessionWindow } from "../strategy/session-window.js";
import { makeTick, RecordingDiagnostics, testConfig } from "../testing/fixtures.js";
import { PositionLifecycleManager } from "./lifecycle-manager.js";

function setup(patch?: (raw: RawEngineConfigInput) => void) {
	const config = testConfig(patch);
	const results = new MemoryResultsSink();
	const diagnostics = new RecordingDiagnostics();
	const plm = new PositionLifecycleManager({
		instrument: config.instrument,
		risk: config.risk,
		session: new SessionWindow(config.session),
		initialCapital: config.initialCapital,
		maxPositionValuePercent: config.maxPositionValuePercent,
		maxPositionDurationMs: config.maxPositionDurationMs,
		results,
		diagnostics,
	});
	return { plm, results, diagnostics };
}

describe("PositionLifecycleManager", () => {
	describe("open", () => {
		it("opens four lots and records the opening", () => {
			const { plm, results } = setup();
			const opened = plm.open({ tick: makeTick(100), lots: 4 });

			expect(opened.ok).toBe(true);
			expect(plm.hasOpenPosition()).toBe(true);
			expect(plm.state()).toBe(PositionState.Open);
			expect(plm.snapshot()).toMatchObject({ lots: 4, quantity: 300, status: "open" });
			expect(results.events()).toHaveLength(1);
			expect(results.events()[0]).toMatchObject({ type: "position_opened", lots: 4, quantity: 300 });
		});

		it("rejects five lots with a warning and stays flat", () => {
			const { plm, results, diagnostics } = setup();
			const opened = plm.open({ tick: makeTick(100), lots: 5 }, 7);

			expect(opened.ok).toBe(false);
			if (!opened.ok) expect(opened.error).toBeInstanceOf(PositionSizeExceededError);
			expect(plm.hasOpenPosition()).toBe(false);
			expect(plm.stats().sizingRejections).toBe(1);
			expect(results.size).toBe(0);

			const warnings = diagnostics.bySeverity(Severity.Warning);
			expect(warnings).toHaveLength(1);
			expect(warnings[0]?.message).toBe(
				"Entry rejected: Requested 5 lot(s) worth 37500.00 exceeds allocatable 30000.00",
			);
			expect(warnings[0]?.tickSequence).toBe(7);
		});

		it("never holds two positions", () => {
			const { plm } = setup();
			plm.open({ tick: makeTick(100), lots: 1 });
			const second = plm.open({ tick: makeTick(101, 1_000), lots: 1 });

			expect(second.ok).toBe(false);
			if (!second.ok) expect(second.error).toBeInstanceOf(PositionAlreadyOpenError);
			expect(plm.stats().opened).toBe(1);
		});

		it("numbers positions per instrument", () => {
			const { plm } = setup();
			plm.open({ tick: makeTick(100), lots: 1 });
			plm.forceClose(makeTick(100, 1_000), "test");
			const second = plm.open({ tick: makeTick(100, 2_000), lots: 1 });
			expect(second.ok && second.value.id).toBe("TEST-2");
		});
	});

	describe("exits", () => {
		it("a gap through the stop exits at the gapped price", () => {
			const { plm, results } = setup();
			plm.open({ tick: makeTick(100), lots: 1 });

			expect(plm.evaluate(makeTick(95, 1_000))).toEqual([]);
			const [trade] = plm.evaluate(makeTick(50, 2_000));

			expect(trade?.exitReason.type).toBe("stop_loss");
			expect(trade?.exitPrice.toString()).toBe("50");
			expect(trade?.grossPnl.toString()).toBe("-3750");
			expect(trade?.netPnl.toString()).toBe("-3750");
			expect(plm.hasOpenPosition()).toBe(false);
			expect(plm.state()).toBe(PositionState.Closed);
			expect(plm.capital().toString()).toBe("96250");
			expect(results.trades()).toHaveLength(1);
		});

		it("returns nothing while flat", () => {
			const { plm } = setup();
			expect(plm.evaluate(makeTick(100))).toEqual([]);
		});

		it("books tiered take-profits as a partial then a final trade", () => {
			const { plm } = setup((raw) => {
				raw.risk.take_profit_points = [10, 20];
				raw.risk.take_profit_fractions = [0.5, 0.5];
			});
			plm.open({ tick: makeTick(100), lots: 4 });

			const [first] = plm.evaluate(makeTick(110, 1_000));
			expect(first).toMatchObject({ lots: 2, quantity: 150, partial: true });
			expect(first?.grossPnl.toString()).toBe("1500");
			expect(plm.position()?.lots).toBe(2);
			expect(plm.state()).toBe(PositionState.Open);

			const [second] = plm.evaluate(makeTick(120, 2_000));
			expect(second).toMatchObject({ lots: 2, quantity: 150, partial: false });
			expect(second?.grossPnl.toString()).toBe("3000");
			expect(plm.hasOpenPosition()).toBe(false);
			expect(plm.capital().toString()).toBe("104500");
		});

		it("sizes a tier from its exact fraction of the original lots", () => {
			const { plm } = setup((raw) => {
				raw.instrument.lot_size = 1;
				raw.risk.take_profit_points = [10, 20];
				raw.risk.take_profit_fractions = [0.29, 1];
			});
			plm.open({ tick: makeTick(100), lots: 100 });

			const [first] = plm.evaluate(makeTick(110, 1_000));
			expect(first).toMatchObject({ lots: 29, quantity: 29, partial: true });
			expect(first?.grossPnl.toString()).toBe("290");
			expect(plm.position()?.lots).toBe(71);
		});

		it("closes everything when a tier would release every lot", () => {
			const { plm } = setup((raw) => {
				raw.risk.take_profit_points = [10, 20];
				raw.risk.take_profit_fractions = [0.5, 0.5];
			});
			plm.open({ tick: makeTick(100), lots: 1 });

			const [trade] = plm.evaluate(makeTick(110, 1_000));
			expect(trade).toMatchObject({ lots: 1, partial: false });
			expect(plm.hasOpenPosition()).toBe(false);
		});

		it("trails the high-water mark and exits at the observed price", () => {
			const { plm } = setup((raw) => {
				raw.risk.use_trail_stop = true;
			});
			plm.open({ tick: makeTick(100), lots: 1 });

			expect(plm.evaluate(makeTick(106, 1_000))).toEqual([]);
			expect(plm.position()?.trailingStopLevel?.toString()).toBe("103");
			expect(plm.evaluate(makeTick(110, 2_000))).toEqual([]);
			expect(plm.position()?.trailingStopLevel?.toString()).toBe("107");
			expect(plm.evaluate(makeTick(108, 3_000))).toEqual([]);
			expect(plm.position()?.trailingStopLevel?.toString()).toBe("107");

			const [trade] = plm.evaluate(makeTick(106.5, 4_000));
			expect(trade?.exitReason).toMatchObject({ type: "trailing_stop" });
			expect(trade?.exitPrice.toString()).toBe("106.5");
			expect(trade?.grossPnl.toString()).toBe("487.5");
		});

		it("exits on holding time", () => {
			const { plm } = setup((raw) => {
				raw.max_position_duration = "1m";
			});
			plm.open({ tick: makeTick(100), lots: 1 });

			expect(plm.evaluate(makeTick(101, 60_000))).toEqual([]);
			const [trade] = plm.evaluate(makeTick(101, 60_001));
			expect(trade?.exitReason).toEqual({ type: "time_exit", cause: "max_duration", heldMs: 60_001 });
		});

		it("exits once the session is over", () => {
			const { plm } = setup((raw) => {
				raw.session.end = "09:20";
				raw.max_position_duration = "2h";
			});
			plm.open({ tick: makeTick(100), lots: 1 });

			expect(plm.evaluate(makeTick(100, 4 * 60_000))).toEqual([]);
			const [trade] = plm.evaluate(makeTick(100, 5 * 60_000));
			expect(trade?.exitReason).toMatchObject({ type: "time_exit", cause: "session_end" });
		});
	});

	describe("commission", () => {
		it("charges percent of turnover plus the per-trade amount", () => {
			const { plm } = setup((raw) => {
				raw.risk.commission_percent = 0.1;
				raw.risk.commission_per_trade = 20;
			});
			plm.open({ tick: makeTick(100), lots: 1 });
			const [trade] = plm.evaluate(makeTick(120, 1_000));

			// (7500 + 9000) × 0.1% + 20
			expect(trade?.commission.toString()).toBe("36.5");
			expect(trade?.grossPnl.toString()).toBe("1500");
			expect(trade?.netPnl.toString()).toBe("1463.5");
			expect(plm.capital().toString()).toBe("101463.5");
		});
	});

	describe("forceClose", () => {
		it("closes at the given tick with a forced reason", () => {
			const { plm } = setup();
			plm.open({ tick: makeTick(100), lots: 1 });
			const trade = plm.forceClose(makeTick(99, 5_000), "session stopped");

			expect(trade?.exitReason).toEqual({ type: "forced", note: "session stopped" });
			expect(trade?.exitPrice.toString()).toBe("99");
			expect(trade?.exitTimeMs).toBe(makeTick(99, 5_000).timestampMs);
			expect(plm.hasOpenPosition()).toBe(false);
		});

		it("returns null while flat", () => {
			const { plm } = setup();
			expect(plm.forceClose(makeTick(100), "nothing open")).toBeNull();
		});
	});
});

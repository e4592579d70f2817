import { describe, expect, it } from "vitest";
import { makeTick, testConfig } from "../testing/fixtures.js";
import { Ema, GreenTickCounter, IndicatorSet, Macd, SessionVwap } from "./indicators.js";
import { SessionWindow } from "./session-window.js";

describe("Ema", () => {
	it("seeds with the first value, then smooths with 2/(n+1)", () => {
		const ema = new Ema(3);
		expect(ema.current).toBeNull();
		expect(ema.update(10)).toBe(10);
		expect(ema.update(20)).toBe(15);
		expect(ema.update(20)).toBe(17.5);
	});
});

describe("Macd", () => {
	it("line is fast minus slow, histogram is line minus signal", () => {
		const macd = new Macd(1, 3, 3);
		expect(macd.update(10)).toEqual({ line: 0, signal: 0, histogram: 0 });
		expect(macd.update(20)).toEqual({ line: 5, signal: 2.5, histogram: 2.5 });
	});
});

describe("SessionVwap", () => {
	it("is null until volume trades", () => {
		const vwap = new SessionVwap();
		expect(vwap.update(100, 0)).toBeNull();
		expect(vwap.update(100, 10)).toBe(100);
		expect(vwap.update(110, 30)).toBe(107.5);
	});

	it("starts over after reset", () => {
		const vwap = new SessionVwap();
		vwap.update(100, 10);
		vwap.reset();
		expect(vwap.update(90, 5)).toBe(90);
	});
});

describe("GreenTickCounter", () => {
	it("counts strictly rising ticks and resets on a flat or falling one", () => {
		const green = new GreenTickCounter();
		expect([1, 2, 3, 3, 4, 2].map((p) => green.update(p))).toEqual([0, 1, 2, 0, 1, 0]);
	});
});

describe("IndicatorSet", () => {
	const config = testConfig();

	it("restarts VWAP on a new session day", () => {
		const set = new IndicatorSet(config.strategy, new SessionWindow(config.session));
		set.update(makeTick(100, 0, 10));
		expect(set.update(makeTick(110, 1_000, 10)).vwap).toBe(105);

		const nextDay = set.update(makeTick(120, 24 * 3_600_000, 10));
		expect(nextDay.vwap).toBe(120);
	});

	it("keeps the last snapshot", () => {
		const set = new IndicatorSet(config.strategy, new SessionWindow(config.session));
		expect(set.snapshot()).toBeNull();
		const snap = set.update(makeTick(100));
		expect(set.snapshot()).toBe(snap);
		expect(snap.price).toBe(100);
	});
});

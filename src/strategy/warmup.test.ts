import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { WarmupTracker } from "./warmup.js";

describe("WarmupTracker", () => {
	it("completes on the required tick and reports it once", () => {
		const w = new WarmupTracker(3);
		expect(w.record()).toBe(false);
		expect(w.record()).toBe(false);
		expect(w.record()).toBe(true);
		expect(w.record()).toBe(false);
		expect(w.state()).toEqual({ ticksSeen: 4, required: 3, complete: true });
	});

	it("rejects a non-positive requirement", () => {
		expect(() => new WarmupTracker(0)).toThrow(RangeError);
		expect(() => new WarmupTracker(2.5)).toThrow(RangeError);
	});

	it("complete never flips back and flips exactly at the requirement", () => {
		fc.assert(
			fc.property(fc.integer({ min: 1, max: 200 }), fc.integer({ min: 0, max: 400 }), (required, ticks) => {
				const w = new WarmupTracker(required);
				let completions = 0;
				let wasComplete = false;
				for (let i = 1; i <= ticks; i++) {
					if (w.record()) completions++;
					if (wasComplete && !w.complete) return false;
					wasComplete = w.complete;
					if (w.complete !== i >= required) return false;
				}
				return completions === (ticks >= required ? 1 : 0) && w.state().ticksSeen === ticks;
			}),
		);
	});
});

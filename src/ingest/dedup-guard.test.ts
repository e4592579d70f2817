import { describe, expect, it } from "vitest";
import { Severity } from "../diagnostics/types.js";
import { DuplicateTickError } from "../shared/errors.js";
import { RecordingDiagnostics, makeTick } from "../testing/fixtures.js";
import { DedupGuard } from "./dedup-guard.js";

function guard() {
	const diagnostics = new RecordingDiagnostics();
	return { diagnostics, dedup: new DedupGuard({ gapPricePercent: 5, gapTimeMs: 60_000, diagnostics }) };
}

describe("DedupGuard", () => {
	it("accepts the first tick with no movement", () => {
		const { dedup } = guard();
		const result = dedup.accept(makeTick(100));
		expect(result).toEqual({
			ok: true,
			value: { priceChangePercent: 0, elapsedMs: 0, priceGap: false, timeGap: false },
		});
	});

	it("drops an exact repeat of the previous delivery", () => {
		const { dedup, diagnostics } = guard();
		dedup.accept(makeTick(100, 0, 10));
		const repeat = dedup.accept(makeTick(100, 0, 10), 2);

		expect(repeat.ok).toBe(false);
		if (!repeat.ok) expect(repeat.error).toBeInstanceOf(DuplicateTickError);
		expect(dedup.duplicates).toBe(1);
		expect(diagnostics.bySeverity(Severity.Debug)[0]?.tickSequence).toBe(2);
	});

	it("compares prices by value", () => {
		const { dedup } = guard();
		dedup.accept(makeTick("100.50"));
		expect(dedup.accept(makeTick("100.5")).ok).toBe(false);
	});

	it("accepts a tick differing in any identity field", () => {
		const { dedup } = guard();
		dedup.accept(makeTick(100, 0, 10));
		expect(dedup.accept(makeTick(100, 0, 11)).ok).toBe(true);
		expect(dedup.accept(makeTick(100, 1, 11)).ok).toBe(true);
		expect(dedup.accept(makeTick(101, 1, 11)).ok).toBe(true);
		expect(dedup.duplicates).toBe(0);
	});

	it("only remembers the last delivery", () => {
		const { dedup } = guard();
		dedup.accept(makeTick(100, 0));
		dedup.accept(makeTick(101, 1_000));
		expect(dedup.accept(makeTick(100, 0)).ok).toBe(true);
	});

	it("warns on a price jump beyond the threshold but keeps the tick", () => {
		const { dedup, diagnostics } = guard();
		dedup.accept(makeTick(100, 0));
		const result = dedup.accept(makeTick(94, 1_000));

		expect(result.ok && result.value.priceGap).toBe(true);
		expect(dedup.gapWarnings).toBe(1);
		expect(diagnostics.messages(Severity.Warning)).toEqual(["Gap detected: price moved 6.00%"]);
	});

	it("does not warn on a move exactly at the threshold", () => {
		const { dedup, diagnostics } = guard();
		dedup.accept(makeTick(100, 0));
		dedup.accept(makeTick(105, 1_000));
		expect(diagnostics.events).toEqual([]);
	});

	it("reports price and time gaps in one warning", () => {
		const { dedup, diagnostics } = guard();
		dedup.accept(makeTick(100, 0));
		dedup.accept(makeTick(110, 90_000));
		expect(diagnostics.messages(Severity.Warning)).toEqual([
			"Gap detected: price moved 10.00%, 90000ms since previous tick",
		]);
		expect(dedup.gapWarnings).toBe(1);
	});
});

import { describe, expect, it } from "vitest";
import { idToString, instrumentSymbol, positionId } from "./identifiers.js";

describe("branded identifiers", () => {
	it("trims and keeps the raw string", () => {
		expect(idToString(instrumentSymbol(" NIFTY24DECFUT "))).toBe("NIFTY24DECFUT");
		expect(idToString(positionId("NIFTY24DECFUT-1"))).toBe("NIFTY24DECFUT-1");
	});

	it("rejects empty values", () => {
		expect(() => instrumentSymbol("  ")).toThrow("InstrumentSymbol cannot be empty");
		expect(() => positionId("")).toThrow("PositionId cannot be empty");
	});

	it("branded values compare as strings", () => {
		expect(instrumentSymbol("TEST") === instrumentSymbol("TEST")).toBe(true);
	});
});

import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { Decimal } from "./decimal.js";

/** Prices quoted to two places, as an exchange would send them. */
const price = fc.integer({ min: 1, max: 10_000_000 }).map((paise) => Decimal.from((paise / 100).toFixed(2)));
const signed = fc.integer({ min: -10_000_000, max: 10_000_000 }).map((paise) => Decimal.from((paise / 100).toFixed(2)));
const lots = fc.integer({ min: 1, max: 500 });

describe("Decimal (property-based)", () => {
	it("addition is commutative and associative", () => {
		fc.assert(
			fc.property(signed, signed, signed, (a, b, c) => {
				expect(a.add(b).eq(b.add(a))).toBe(true);
				expect(a.add(b).add(c).eq(a.add(b.add(c)))).toBe(true);
			}),
		);
	});

	it("multiplication by a whole quantity distributes over addition", () => {
		fc.assert(
			fc.property(signed, signed, lots, (a, b, n) => {
				const q = Decimal.from(n);
				expect(a.add(b).mul(q).eq(a.mul(q).add(b.mul(q)))).toBe(true);
			}),
		);
	});

	it("identities hold", () => {
		fc.assert(
			fc.property(signed, (a) => {
				expect(a.add(Decimal.zero()).eq(a)).toBe(true);
				expect(a.mul(Decimal.one()).eq(a)).toBe(true);
				expect(a.sub(a).isZero()).toBe(true);
				expect(a.neg().neg().eq(a)).toBe(true);
			}),
		);
	});

	it("gross P&L is antisymmetric in entry and exit", () => {
		fc.assert(
			fc.property(price, price, lots, (entry, exit, n) => {
				const q = Decimal.from(n * 75);
				const long = exit.sub(entry).mul(q);
				const reversed = entry.sub(exit).mul(q);
				expect(long.add(reversed).isZero()).toBe(true);
			}),
		);
	});

	it("string form parses back to the same value", () => {
		fc.assert(
			fc.property(signed, (a) => {
				expect(Decimal.from(a.toString()).eq(a)).toBe(true);
			}),
		);
	});

	it("floor never exceeds the value and is within one of it", () => {
		fc.assert(
			fc.property(signed, (a) => {
				const f = a.floor();
				expect(f.lte(a)).toBe(true);
				expect(a.sub(f).lt(Decimal.one())).toBe(true);
			}),
		);
	});
});

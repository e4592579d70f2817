/**
 * Entry sizing against allocatable capital.
 *
 * allocatable = capital × maxPositionValuePercent / 100
 * lot cost    = price × lot size
 */

import type { LotsPerTrade } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { PositionSizeExceededError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

export interface SizingInput {
	readonly capital: Decimal;
	readonly maxPositionValuePercent: number;
	readonly price: Decimal;
	readonly lotSize: number;
	readonly requested: LotsPerTrade;
}

export interface SizedEntry {
	readonly lots: number;
	readonly notional: Decimal;
	readonly allocatable: Decimal;
}

/** Largest whole number of lots whose notional fits in the allocatable capital. */
export function maxAffordableLots(allocatable: Decimal, lotCost: Decimal): number {
	if (!lotCost.isPositive()) return 0;
	return allocatable.div(lotCost).floor().toNumber();
}

export function sizeEntry(input: SizingInput): Result<SizedEntry, PositionSizeExceededError> {
	const allocatable = input.capital.mul(Decimal.from(input.maxPositionValuePercent)).div(Decimal.from(100));
	const lotCost = input.price.mul(Decimal.from(input.lotSize));
	const affordable = maxAffordableLots(allocatable, lotCost);
	const lots = input.requested === "max" ? affordable : input.requested;

	if (lots < 1 || lots > affordable) {
		const shown = Math.max(lots, 1);
		const requestedNotional = lotCost.mul(Decimal.from(shown));
		return err(
			new PositionSizeExceededError(
				`Requested ${shown} lot(s) worth ${requestedNotional.toFixed(2)} exceeds allocatable ${allocatable.toFixed(2)}`,
				{
					requestedLots: input.requested,
					affordableLots: affordable,
					requestedNotional: requestedNotional.toString(),
					allocatable: allocatable.toString(),
				},
			),
		);
	}

	return ok({ lots, notional: lotCost.mul(Decimal.from(lots)), allocatable });
}

/**
 * CommissionModel — discriminated union for round-trip commission.
 *
 * Two variants: None, Turnover (percent of entry plus exit notional, plus a
 * fixed amount per trade). All computations are pure functions returning Decimal.
 */

import { Decimal } from "../shared/decimal.js";
import type { RiskConfig } from "../shared/config.js";

export type CommissionModel =
	| { readonly type: "none" }
	| { readonly type: "turnover"; readonly percent: number; readonly perTrade: number };

const HUNDRED = Decimal.from(100);

/** Creates a commission model that charges nothing. */
export function noCommission(): CommissionModel {
	return { type: "none" };
}

/**
 * Creates a commission model charging a percentage of turnover.
 * @param percent - Percent of entry notional plus exit notional (0.03 for 0.03%)
 * @param perTrade - Fixed amount charged once per trade record
 */
export function turnoverCommission(percent: number, perTrade = 0): CommissionModel {
	return { type: "turnover", percent, perTrade };
}

export function commissionFromRisk(risk: RiskConfig): CommissionModel {
	if (risk.commissionPercent === 0 && risk.commissionPerTrade === 0) return noCommission();
	return turnoverCommission(risk.commissionPercent, risk.commissionPerTrade);
}

/**
 * Computes the commission for one trade record.
 * @param entryNotional - entry price × quantity closed
 * @param exitNotional - exit price × quantity closed
 * @returns Commission as a Decimal (always non-negative)
 */
export function computeCommission(
	model: CommissionModel,
	entryNotional: Decimal,
	exitNotional: Decimal,
): Decimal {
	switch (model.type) {
		case "none":
			return Decimal.zero();
		case "turnover": {
			const turnover = entryNotional.abs().add(exitNotional.abs());
			return turnover.mul(Decimal.from(model.percent)).div(HUNDRED).add(Decimal.from(model.perTrade));
		}
	}
}

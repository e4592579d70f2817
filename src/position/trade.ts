import { type CommissionModel, computeCommission } from "../accounting/commission-model.js";
import type { Tick } from "../feed/types.js";
import type { ExitReason } from "../signal/types.js";
import { Decimal } from "../shared/decimal.js";
import type { Position } from "./position.js";
import type { Trade } from "./types.js";

/**
 * Books `lots` of `position` at the exit tick's price. Gross, commission and
 * net are computed here together; a Trade never exists with one of them unset.
 */
export function createTrade(params: {
	position: Position;
	exitTick: Tick;
	lots: number;
	reason: ExitReason;
	partial: boolean;
	commission: CommissionModel;
}): Trade {
	const { position, exitTick, lots } = params;
	const quantity = lots * position.lotSize;
	const qty = Decimal.from(quantity);
	const exitPrice = exitTick.price;

	const grossPnl = exitPrice.sub(position.entryPrice).mul(qty);
	const commission = computeCommission(params.commission, position.entryPrice.mul(qty), exitPrice.mul(qty));

	return Object.freeze({
		positionId: position.id,
		symbol: position.symbol,
		entryPrice: position.entryPrice,
		exitPrice,
		lots,
		quantity,
		grossPnl,
		commission,
		netPnl: grossPnl.sub(commission),
		exitReason: params.reason,
		entryTimeMs: position.entryTimeMs,
		exitTimeMs: exitTick.timestampMs,
		partial: params.partial,
	});
}

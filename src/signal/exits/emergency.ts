import { Decimal } from "../../shared/decimal.js";
import type { ExitContext, ExitPolicy, ExitReason, PositionLike } from "../types.js";

const HUNDRED = Decimal.from(100);

/**
 * Catastrophic-move exit: fires when price has fallen below entry by more
 * than `maxAdversePct` percent. Evaluated before every other exit.
 *
 * @example
 * ```ts
 * const exit = EmergencyExit.fromPct(5);
 * const reason = exit.shouldExit(position, ctx);
 * ```
 */
export class EmergencyExit implements ExitPolicy {
	readonly name = "Emergency";
	private readonly maxAdversePct: Decimal;

	private constructor(maxAdversePct: Decimal) {
		this.maxAdversePct = maxAdversePct;
	}

	static fromPct(pct: number): EmergencyExit {
		return new EmergencyExit(Decimal.from(pct));
	}

	shouldExit(position: PositionLike, ctx: ExitContext): ExitReason | null {
		if (position.entryPrice.isZero()) return null;
		const adverse = position.entryPrice.sub(ctx.tick.price).mul(HUNDRED).div(position.entryPrice);
		if (adverse.gt(this.maxAdversePct)) {
			return { type: "emergency", adverseMovePct: adverse.toNumber() };
		}
		return null;
	}
}

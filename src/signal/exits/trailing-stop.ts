import { Decimal } from "../../shared/decimal.js";
import type { ExitContext, ExitPolicy, ExitReason, PositionLike } from "../types.js";

/**
 * Trailing stop in price points. The trail activates once the high-water
 * mark is `activationPoints` above entry; from then on its level is the
 * high-water mark minus `distancePoints` and only ever moves up.
 *
 * The position manager calls {@link nextLevel} on every tick before the exit
 * pipeline runs; {@link shouldExit} then compares the observed price against
 * the stored level.
 */
export class TrailingStopExit implements ExitPolicy {
	readonly name = "TrailingStop";
	private readonly activation: Decimal;
	private readonly distance: Decimal;

	private constructor(activation: Decimal, distance: Decimal) {
		this.activation = activation;
		this.distance = distance;
	}

	static fromPoints(activationPoints: number, distancePoints: number): TrailingStopExit {
		return new TrailingStopExit(Decimal.from(activationPoints), Decimal.from(distancePoints));
	}

	/** Trail level after the high-water mark has been updated; never lower than before. */
	nextLevel(position: PositionLike): Decimal | null {
		const profit = position.highWaterMark.sub(position.entryPrice);
		if (profit.lt(this.activation)) return position.trailingStopLevel;

		const candidate = position.highWaterMark.sub(this.distance);
		return position.trailingStopLevel === null
			? candidate
			: Decimal.max(position.trailingStopLevel, candidate);
	}

	shouldExit(position: PositionLike, ctx: ExitContext): ExitReason | null {
		const level = position.trailingStopLevel;
		if (level !== null && ctx.tick.price.lte(level)) {
			return { type: "trailing_stop", level };
		}
		return null;
	}
}

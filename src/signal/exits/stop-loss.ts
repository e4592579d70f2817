import type { ExitContext, ExitPolicy, ExitReason, PositionLike } from "../types.js";

/**
 * Exit policy that closes a long once the observed price is at or below its
 * stop level. The fill is the observed price; a gap through the level exits
 * at the gapped price, not at the level.
 */
export class StopLossExit implements ExitPolicy {
	readonly name = "StopLoss";

	static create(): StopLossExit {
		return new StopLossExit();
	}

	shouldExit(position: PositionLike, ctx: ExitContext): ExitReason | null {
		if (ctx.tick.price.lte(position.stopLossLevel)) {
			return { type: "stop_loss", level: position.stopLossLevel };
		}
		return null;
	}
}

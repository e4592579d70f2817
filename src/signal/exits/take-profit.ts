import type { ExitContext, ExitPolicy, ExitReason, PositionLike } from "../types.js";

/**
 * Exit policy for tiered profit targets. Looks only at the lowest target not
 * yet hit; a tick that jumps several targets releases one tier per tick.
 *
 * @example
 * ```ts
 * const exit = TakeProfitExit.create();
 * const reason = exit.shouldExit(position, ctx); // { type: "take_profit", final: false, ... }
 * ```
 */
export class TakeProfitExit implements ExitPolicy {
	readonly name = "TakeProfit";

	static create(): TakeProfitExit {
		return new TakeProfitExit();
	}

	shouldExit(position: PositionLike, ctx: ExitContext): ExitReason | null {
		const levels = position.takeProfitLevels;
		const targetIndex = levels.findIndex((t) => !t.hit);
		const target = levels[targetIndex];
		if (target === undefined) return null;

		if (ctx.tick.price.gte(target.price)) {
			return {
				type: "take_profit",
				level: target.price,
				targetIndex,
				final: targetIndex === levels.length - 1,
			};
		}
		return null;
	}
}

import type { ExitContext, ExitPolicy, ExitReason, PositionLike } from "../types.js";

/**
 * Exit policy for holding time: closes a position older than `maxHoldMs`, or
 * one still open inside the session's closing buffer. Age is measured in tick
 * time.
 *
 * @example
 * ```ts
 * const exit = TimeExit.fromMins(30);
 * ```
 */
export class TimeExit implements ExitPolicy {
	readonly name = "TimeExit";
	private readonly maxHoldMs: number;

	private constructor(maxHoldMs: number) {
		this.maxHoldMs = maxHoldMs;
	}

	static create(maxHoldMs: number): TimeExit {
		return new TimeExit(maxHoldMs);
	}

	static fromMins(mins: number): TimeExit {
		return new TimeExit(mins * 60_000);
	}

	shouldExit(position: PositionLike, ctx: ExitContext): ExitReason | null {
		const heldMs = ctx.tick.timestampMs - position.entryTimeMs;
		if (heldMs > this.maxHoldMs) {
			return { type: "time_exit", cause: "max_duration", heldMs };
		}
		if (ctx.inClosingBuffer) {
			return { type: "time_exit", cause: "session_end", heldMs };
		}
		return null;
	}
}

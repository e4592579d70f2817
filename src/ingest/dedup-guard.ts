/**
 * DedupGuard — drops immediate repeats and flags suspicious jumps.
 *
 * A delivery identical to the one just before it (same timestamp, price and
 * volume) is a reconnect replay and is rejected. Only the last identity is
 * kept. Price or time jumps against the previous accepted tick raise a
 * Warning; they never cause a drop.
 */

import type { DiagnosticLogger } from "../diagnostics/types.js";
import { Severity } from "../diagnostics/types.js";
import type { Tick, TickIdentity } from "../feed/types.js";
import { Decimal } from "../shared/decimal.js";
import { DuplicateTickError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

const COMPONENT = "ingest.dedup";
const HUNDRED = Decimal.from(100);

export interface DedupGuardConfig {
	readonly gapPricePercent: number;
	readonly gapTimeMs: number;
	readonly diagnostics: DiagnosticLogger;
}

/** Movement since the previous accepted tick. Zero for the first tick. */
export interface GapCheck {
	readonly priceChangePercent: number;
	readonly elapsedMs: number;
	readonly priceGap: boolean;
	readonly timeGap: boolean;
}

function sameIdentity(a: TickIdentity, b: TickIdentity): boolean {
	return a.timestampMs === b.timestampMs && a.volume === b.volume && a.price.eq(b.price);
}

export class DedupGuard {
	private readonly gapPricePercent: number;
	private readonly gapTimeMs: number;
	private readonly diagnostics: DiagnosticLogger;
	private last: TickIdentity | null = null;
	private duplicateCount = 0;
	private gapWarningCount = 0;

	constructor(config: DedupGuardConfig) {
		this.gapPricePercent = config.gapPricePercent;
		this.gapTimeMs = config.gapTimeMs;
		this.diagnostics = config.diagnostics;
	}

	/**
	 * Accept or reject one delivery.
	 * @param sequence - producer-side delivery number, carried into diagnostics
	 */
	accept(tick: Tick, sequence: number | null = null): Result<GapCheck, DuplicateTickError> {
		const previous = this.last;
		if (previous !== null && sameIdentity(previous, tick)) {
			this.duplicateCount++;
			this.diagnostics.log(Severity.Debug, COMPONENT, `Duplicate tick at ${tick.timestampMs} dropped`, sequence);
			return err(
				new DuplicateTickError("Tick repeats the previous delivery", {
					timestampMs: tick.timestampMs,
					price: tick.price.toString(),
					volume: tick.volume,
				}),
			);
		}
		this.last = { timestampMs: tick.timestampMs, price: tick.price, volume: tick.volume };

		if (previous === null) {
			return ok({ priceChangePercent: 0, elapsedMs: 0, priceGap: false, timeGap: false });
		}

		const priceChangePercent = tick.price.sub(previous.price).abs().mul(HUNDRED).div(previous.price).toNumber();
		const elapsedMs = tick.timestampMs - previous.timestampMs;
		const priceGap = priceChangePercent > this.gapPricePercent;
		const timeGap = elapsedMs > this.gapTimeMs;

		if (priceGap || timeGap) {
			this.gapWarningCount++;
			const parts: string[] = [];
			if (priceGap) parts.push(`price moved ${priceChangePercent.toFixed(2)}%`);
			if (timeGap) parts.push(`${elapsedMs}ms since previous tick`);
			this.diagnostics.log(Severity.Warning, COMPONENT, `Gap detected: ${parts.join(", ")}`, sequence);
		}

		return ok({ priceChangePercent, elapsedMs, priceGap, timeGap });
	}

	get duplicates(): number {
		return this.duplicateCount;
	}

	get gapWarnings(): number {
		return this.gapWarningCount;
	}
}

/**
 * ReplayTickSource — replay variant of the tick source.
 *
 * Reads an ordered sequence of recorded records and emits them through the
 * same normalizer and emit contract as the live feed. Pacing:
 * - `max`: as fast as the consumer allows, yielding to the event loop after
 *   every `batchSize` ticks so the consumer can drain. Keep `batchSize` at or
 *   below the transfer buffer capacity for a lossless replay.
 * - `recorded`: waits the recorded gap between consecutive ticks, divided by
 *   `speed`.
 */

import { setImmediate as yieldToLoop, setTimeout as delay } from "node:timers/promises";
import type { DiagnosticLogger } from "../diagnostics/types.js";
import { Severity } from "../diagnostics/types.js";
import type { InstrumentSymbol } from "../shared/identifiers.js";
import { TickNormalizer } from "./tick-normalizer.js";
import { type Tick, type TickEmitter, TickOrigin, type TickSource, type TickSourceStats } from "./types.js";

const COMPONENT = "feed.replay";

export type ReplayPacing =
	| { readonly mode: "max"; readonly batchSize: number }
	| { readonly mode: "recorded"; readonly speed: number };

export interface ReplayTickSourceConfig {
	readonly records: Iterable<unknown> | AsyncIterable<unknown>;
	readonly symbol: InstrumentSymbol;
	readonly pacing: ReplayPacing;
	readonly diagnostics: DiagnosticLogger;
	readonly priceDivisor?: number;
	/** Replaces the real timer in recorded pacing. */
	readonly sleep?: (ms: number) => Promise<void>;
}

function isAsyncIterable(value: Iterable<unknown> | AsyncIterable<unknown>): value is AsyncIterable<unknown> {
	return Symbol.asyncIterator in value;
}

export class ReplayTickSource implements TickSource {
	readonly kind = TickOrigin.Replay;
	private readonly records: Iterable<unknown> | AsyncIterable<unknown>;
	private readonly pacing: ReplayPacing;
	private readonly normalizer: TickNormalizer;
	private readonly diagnostics: DiagnosticLogger;
	private readonly sleep: (ms: number) => Promise<void>;
	private active = false;
	private drained = false;
	private emitted = 0;
	private sinceYield = 0;
	private previousMs: number | null = null;

	constructor(config: ReplayTickSourceConfig) {
		if (config.pacing.mode === "max" && !(Number.isInteger(config.pacing.batchSize) && config.pacing.batchSize > 0)) {
			throw new RangeError(`batchSize must be a positive integer, got ${config.pacing.batchSize}`);
		}
		if (config.pacing.mode === "recorded" && !(config.pacing.speed > 0)) {
			throw new RangeError(`speed must be positive, got ${config.pacing.speed}`);
		}
		this.records = config.records;
		this.pacing = config.pacing;
		this.diagnostics = config.diagnostics;
		this.sleep = config.sleep ?? ((ms) => delay(ms));
		this.normalizer = new TickNormalizer({
			symbol: config.symbol,
			origin: TickOrigin.Replay,
			...(config.priceDivisor !== undefined && { priceDivisor: config.priceDivisor }),
		});
	}

	/** Emit every record in order; resolves at end of data or after `stop()`. */
	async start(emit: TickEmitter): Promise<void> {
		if (this.active) {
			throw new Error("Replay source already started");
		}
		this.active = true;
		this.drained = false;
		this.sinceYield = 0;
		this.previousMs = null;
		this.normalizer.reset();

		try {
			if (isAsyncIterable(this.records)) {
				for await (const raw of this.records) {
					if (!this.active) break;
					await this.deliver(raw, emit);
				}
			} else {
				for (const raw of this.records) {
					if (!this.active) break;
					const pending = this.deliver(raw, emit);
					if (pending !== null) await pending;
				}
			}
			this.drained = this.active;
		} finally {
			this.active = false;
		}
	}

	stop(): void {
		this.active = false;
	}

	isActive(): boolean {
		return this.active;
	}

	exhausted(): boolean {
		return this.drained;
	}

	stats(): TickSourceStats {
		return { emitted: this.emitted, malformed: this.normalizer.malformed };
	}

	/**
	 * Normalize and emit one record. Returns a promise only when pacing has to
	 * wait, so a synchronous batch is emitted without touching the event loop.
	 */
	private deliver(raw: unknown, emit: TickEmitter): Promise<void> | null {
		const result = this.normalizer.normalize(raw);
		if (!result.ok) {
			this.diagnostics.log(Severity.Debug, COMPONENT, result.error.message);
			return null;
		}
		const tick = result.value;

		if (this.pacing.mode === "recorded") {
			const gap = this.previousMs === null ? 0 : tick.timestampMs - this.previousMs;
			this.previousMs = tick.timestampMs;
			if (gap > 0) {
				return this.sleep(gap / this.pacing.speed).then(() => this.emitTick(tick, emit));
			}
			this.emitTick(tick, emit);
			return null;
		}

		this.emitTick(tick, emit);
		this.sinceYield++;
		if (this.sinceYield >= this.pacing.batchSize) {
			this.sinceYield = 0;
			return yieldToLoop();
		}
		return null;
	}

	private emitTick(tick: Tick, emit: TickEmitter): void {
		if (!this.active) return;
		this.emitted++;
		emit(tick);
	}
}

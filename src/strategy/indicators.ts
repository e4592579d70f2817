/**
 * Incremental reference indicators.
 *
 * Each `update` is O(1) and folds one observation into running state; none
 * keeps a history window. Indicator math uses floating point: the values only
 * gate entries, they never reach money arithmetic.
 */

import type { Tick } from "../feed/types.js";
import type { StrategyConfig } from "../shared/config.js";
import type { SessionWindow } from "./session-window.js";

/** Exponential moving average with alpha = 2 / (period + 1), seeded by the first value. */
export class Ema {
	private readonly alpha: number;
	private value: number | null = null;

	constructor(period: number) {
		this.alpha = 2 / (period + 1);
	}

	update(x: number): number {
		this.value = this.value === null ? x : this.value + this.alpha * (x - this.value);
		return this.value;
	}

	get current(): number | null {
		return this.value;
	}
}

export interface MacdValue {
	readonly line: number;
	readonly signal: number;
	readonly histogram: number;
}

export class Macd {
	private readonly fast: Ema;
	private readonly slow: Ema;
	private readonly signal: Ema;

	constructor(fast: number, slow: number, signal: number) {
		this.fast = new Ema(fast);
		this.slow = new Ema(slow);
		this.signal = new Ema(signal);
	}

	update(x: number): MacdValue {
		const line = this.fast.update(x) - this.slow.update(x);
		const signal = this.signal.update(line);
		return { line, signal, histogram: line - signal };
	}
}

/** Volume-weighted average price since the last reset. Null until some volume trades. */
export class SessionVwap {
	private priceVolume = 0;
	private volume = 0;

	update(price: number, volume: number): number | null {
		this.priceVolume += price * volume;
		this.volume += volume;
		return this.volume > 0 ? this.priceVolume / this.volume : null;
	}

	reset(): void {
		this.priceVolume = 0;
		this.volume = 0;
	}
}

/** Consecutive strictly rising ticks; any flat or falling tick resets to zero. */
export class GreenTickCounter {
	private previous: number | null = null;
	private count = 0;

	update(price: number): number {
		if (this.previous !== null) {
			this.count = price > this.previous ? this.count + 1 : 0;
		}
		this.previous = price;
		return this.count;
	}
}

export interface IndicatorSnapshot {
	readonly price: number;
	readonly fastEma: number;
	readonly slowEma: number;
	readonly macd: MacdValue;
	readonly vwap: number | null;
	readonly greenTicks: number;
}

/**
 * The indicator bundle the entry rules read. VWAP restarts at each local
 * session day.
 */
export class IndicatorSet {
	private readonly fastEma: Ema;
	private readonly slowEma: Ema;
	private readonly macd: Macd;
	private readonly vwap = new SessionVwap();
	private readonly green = new GreenTickCounter();
	private readonly session: SessionWindow;
	private vwapDay: number | null = null;
	private last: IndicatorSnapshot | null = null;

	constructor(config: StrategyConfig, session: SessionWindow) {
		this.fastEma = new Ema(config.fastEma);
		this.slowEma = new Ema(config.slowEma);
		this.macd = new Macd(config.macdFast, config.macdSlow, config.macdSignal);
		this.session = session;
	}

	update(tick: Tick): IndicatorSnapshot {
		const price = tick.price.toNumber();
		const day = this.session.dayKey(tick.timestampMs);
		if (this.vwapDay !== day) {
			this.vwap.reset();
			this.vwapDay = day;
		}

		this.last = {
			price,
			fastEma: this.fastEma.update(price),
			slowEma: this.slowEma.update(price),
			macd: this.macd.update(price),
			vwap: this.vwap.update(price, tick.volume),
			greenTicks: this.green.update(price),
		};
		return this.last;
	}

	snapshot(): IndicatorSnapshot | null {
		return this.last;
	}
}

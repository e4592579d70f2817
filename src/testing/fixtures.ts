/**
 * Shared test fixtures: a complete valid configuration, tick builders and a
 * recording diagnostics logger.
 */

import type { DiagnosticEvent, DiagnosticLogger, Severity } from "../diagnostics/types.js";
import { type Tick, TickOrigin } from "../feed/types.js";
import { type EngineConfig, type RawEngineConfigInput, requireEngineConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import { instrumentSymbol } from "../shared/identifiers.js";

export const TEST_SYMBOL = instrumentSymbol("TEST");

/** 2024-01-02 09:15:00 UTC */
export const T0 = Date.UTC(2024, 0, 2, 9, 15, 0);

/** Fresh, valid raw configuration. Every call returns a new object. */
export function rawConfig(): RawEngineConfigInput {
	return {
		instrument: { symbol: "TEST", lot_size: 75, tick_size: 0.05 },
		initial_capital: 100_000,
		min_warmup_ticks: 3,
		max_position_value_percent: 30,
		max_position_duration: "30m",
		buffer_capacity: 1024,
		emergency_overflow_threshold: 3,
		emergency_recovery_pushes: 5,
		critical_log_timeout_ms: 50,
		diagnostic_queue_capacity: 256,
		gap_price_percent: 5,
		gap_time_ms: 60_000,
		lots_per_trade: 1,
		risk: {
			stop_loss_points: 10,
			take_profit_points: [20],
			take_profit_fractions: [1],
			use_trail_stop: false,
			trail_activation_points: 5,
			trail_distance_points: 3,
			emergency_exit_percent: 60,
			commission_percent: 0,
			commission_per_trade: 0,
		},
		session: {
			start: "00:00",
			end: "23:59",
			utc_offset_minutes: 0,
			start_buffer_minutes: 0,
			end_buffer_minutes: 0,
			max_trades_per_day: 100,
		},
		strategy: {
			use_ema_crossover: false,
			fast_ema: 3,
			slow_ema: 5,
			use_macd: false,
			macd_fast: 3,
			macd_slow: 6,
			macd_signal: 3,
			use_vwap: false,
			consecutive_green_ticks: 0,
		},
		logging: { level: "debug" },
	};
}

/** Validated configuration, optionally adjusted before parsing. */
export function testConfig(patch?: (raw: RawEngineConfigInput) => void): EngineConfig {
	const raw = rawConfig();
	patch?.(raw);
	return requireEngineConfig(raw);
}

/** A normalized tick at `T0 + offsetMs`. */
export function makeTick(
	price: number | string,
	offsetMs = 0,
	volume = 10,
	origin: TickOrigin = TickOrigin.Replay,
): Tick {
	return Object.freeze({
		symbol: TEST_SYMBOL,
		timestampMs: T0 + offsetMs,
		price: Decimal.from(price),
		volume,
		origin,
	});
}

/** A raw feed record, as a source receives it. */
export function rawTick(price: number | string, offsetMs = 0, volume = 10): Record<string, unknown> {
	return { symbol: "TEST", timestamp: T0 + offsetMs, price, volume };
}

/** One raw record per price, one second apart. */
export function rawSeries(prices: readonly (number | string)[], startOffsetMs = 0): Record<string, unknown>[] {
	return prices.map((price, i) => rawTick(price, startOffsetMs + i * 1_000, 10 + i));
}

/** Synchronous DiagnosticLogger that keeps every call. */
export class RecordingDiagnostics implements DiagnosticLogger {
	readonly events: DiagnosticEvent[] = [];

	log(severity: Severity, component: string, message: string, tickSequence: number | null = null): void {
		this.events.push({ severity, component, message, tickSequence, timestampMs: 0 });
	}

	bySeverity(severity: Severity): DiagnosticEvent[] {
		return this.events.filter((e) => e.severity === severity);
	}

	messages(severity?: Severity): string[] {
		return this.events.filter((e) => severity === undefined || e.severity === severity).map((e) => e.message);
	}
}

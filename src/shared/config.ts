/**
 * Engine configuration — the recognized options, validated once at startup.
 *
 * Input is the snake_case key/value object handed over by whatever loads the
 * configuration file. Output is a frozen camelCase {@link EngineConfig}.
 * Every key is required: an absent key is a {@link ConfigMissingError}, a
 * present-but-invalid value is a {@link ConfigError}. Nothing is defaulted.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { formatPath, validate, z } from "../lib/validation/index.js";
import { ConfigError, ConfigMissingError } from "./errors.js";
import { type InstrumentSymbol, instrumentSymbol } from "./identifiers.js";
import { err, ok } from "./result.js";
import type { Result } from "./result.js";
import { parseDurationMs } from "./time.js";

// ── Output types ─────────────────────────────────────────────────────

/** Lots requested per entry: a fixed count, or the largest affordable. */
export type LotsPerTrade = number | "max";

export interface InstrumentConfig {
	readonly symbol: InstrumentSymbol;
	readonly lotSize: number;
	readonly tickSize: number;
}

export interface RiskConfig {
	readonly stopLossPoints: number;
	/** Ascending profit targets in price points above entry. */
	readonly takeProfitPoints: readonly number[];
	/** Share of the original lots released at each target; the last target closes. */
	readonly takeProfitFractions: readonly number[];
	readonly useTrailStop: boolean;
	readonly trailActivationPoints: number;
	readonly trailDistancePoints: number;
	readonly emergencyExitPercent: number;
	readonly commissionPercent: number;
	readonly commissionPerTrade: number;
}

export interface SessionConfig {
	/** Minutes after local midnight. */
	readonly startMinute: number;
	readonly endMinute: number;
	readonly utcOffsetMinutes: number;
	readonly startBufferMinutes: number;
	readonly endBufferMinutes: number;
	readonly maxTradesPerDay: number;
}

export interface StrategyConfig {
	readonly useEmaCrossover: boolean;
	readonly fastEma: number;
	readonly slowEma: number;
	readonly useMacd: boolean;
	readonly macdFast: number;
	readonly macdSlow: number;
	readonly macdSignal: number;
	readonly useVwap: boolean;
	readonly consecutiveGreenTicks: number;
}

export interface EngineConfig {
	readonly instrument: InstrumentConfig;
	readonly initialCapital: number;
	readonly minWarmupTicks: number;
	readonly maxPositionValuePercent: number;
	readonly maxPositionDurationMs: number;
	readonly bufferCapacity: number;
	readonly emergencyOverflowThreshold: number;
	readonly emergencyRecoveryPushes: number;
	readonly criticalLogTimeoutMs: number;
	readonly diagnosticQueueCapacity: number;
	readonly gapPricePercent: number;
	readonly gapTimeMs: number;
	readonly lotsPerTrade: LotsPerTrade;
	readonly risk: RiskConfig;
	readonly session: SessionConfig;
	readonly strategy: StrategyConfig;
	readonly logging: { readonly level: LogLevel };
}

/** Either failure a configuration can produce at startup. */
export type EngineConfigError = ConfigMissingError | ConfigError;

// ── Schema ───────────────────────────────────────────────────────────

const CLOCK_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

const positive = z.number().positive();
const positiveInt = z.number().int().positive();
const nonNegative = z.number().nonnegative();
const nonNegativeInt = z.number().int().nonnegative();

const duration = z.union([z.number(), z.string()]).transform((value, ctx) => {
	const ms = parseDurationMs(value);
	if (ms === null) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `Invalid duration "${value}" (expected milliseconds or <n>ms|s|m|h)`,
		});
		return z.NEVER;
	}
	return ms;
});

const clockTime = z
	.string()
	.regex(CLOCK_PATTERN, "Expected HH:MM")
	.transform((value) => {
		const [hours, minutes] = value.split(":").map(Number);
		return (hours ?? 0) * 60 + (minutes ?? 0);
	});

const riskSchema = z
	.object({
		stop_loss_points: positive,
		take_profit_points: z.array(positive).nonempty(),
		take_profit_fractions: z.array(z.number().gt(0).lte(1)).nonempty(),
		use_trail_stop: z.boolean(),
		trail_activation_points: nonNegative,
		trail_distance_points: positive,
		emergency_exit_percent: z.number().gt(0).lte(100),
		commission_percent: nonNegative,
		commission_per_trade: nonNegative,
	})
	.strict()
	.superRefine((risk, ctx) => {
		if (risk.take_profit_fractions.length !== risk.take_profit_points.length) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["take_profit_fractions"],
				message: "Must have one fraction per take-profit level",
			});
		}
		for (let i = 1; i < risk.take_profit_points.length; i++) {
			const prev = risk.take_profit_points[i - 1] ?? 0;
			const curr = risk.take_profit_points[i] ?? 0;
			if (curr <= prev) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["take_profit_points", i],
					message: "Take-profit levels must be strictly ascending",
				});
			}
		}
	});

const sessionSchema = z
	.object({
		start: clockTime,
		end: clockTime,
		utc_offset_minutes: z.number().int().min(-720).max(840),
		start_buffer_minutes: nonNegativeInt,
		end_buffer_minutes: nonNegativeInt,
		max_trades_per_day: positiveInt,
	})
	.strict()
	.superRefine((session, ctx) => {
		if (session.start + session.start_buffer_minutes >= session.end - session.end_buffer_minutes) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["end"],
				message: "Session leaves no entry window once buffers are applied",
			});
		}
	});

const strategySchema = z
	.object({
		use_ema_crossover: z.boolean(),
		fast_ema: positiveInt,
		slow_ema: positiveInt,
		use_macd: z.boolean(),
		macd_fast: positiveInt,
		macd_slow: positiveInt,
		macd_signal: positiveInt,
		use_vwap: z.boolean(),
		consecutive_green_ticks: nonNegativeInt,
	})
	.strict()
	.superRefine((strategy, ctx) => {
		if (strategy.fast_ema >= strategy.slow_ema) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["fast_ema"],
				message: "fast_ema must be shorter than slow_ema",
			});
		}
		if (strategy.macd_fast >= strategy.macd_slow) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["macd_fast"],
				message: "macd_fast must be shorter than macd_slow",
			});
		}
	});

const engineSchema = z
	.object({
		instrument: z
			.object({
				symbol: z.string().trim().min(1),
				lot_size: positiveInt,
				tick_size: positive,
			})
			.strict(),
		initial_capital: positive,
		min_warmup_ticks: positiveInt,
		max_position_value_percent: z.number().gt(0).lte(100),
		max_position_duration: duration,
		buffer_capacity: z.number().int().gt(1),
		emergency_overflow_threshold: positiveInt,
		emergency_recovery_pushes: positiveInt,
		critical_log_timeout_ms: positiveInt,
		diagnostic_queue_capacity: positiveInt,
		gap_price_percent: positive,
		gap_time_ms: positive,
		lots_per_trade: z.union([positiveInt, z.literal("max")]),
		risk: riskSchema,
		session: sessionSchema,
		strategy: strategySchema,
		logging: z
			.object({
				level: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]),
			})
			.strict(),
	})
	.strict();

/** The snake_case shape accepted by {@link parseEngineConfig}, after value parsing. */
export type RawEngineConfig = z.output<typeof engineSchema>;

/** The snake_case shape as written in a configuration file. */
export type RawEngineConfigInput = z.input<typeof engineSchema>;

// ── Mapping ──────────────────────────────────────────────────────────

function toEngineConfig(raw: RawEngineConfig): EngineConfig {
	const { risk, session, strategy } = raw;
	return Object.freeze({
		instrument: Object.freeze({
			symbol: instrumentSymbol(raw.instrument.symbol),
			lotSize: raw.instrument.lot_size,
			tickSize: raw.instrument.tick_size,
		}),
		initialCapital: raw.initial_capital,
		minWarmupTicks: raw.min_warmup_ticks,
		maxPositionValuePercent: raw.max_position_value_percent,
		maxPositionDurationMs: raw.max_position_duration,
		bufferCapacity: raw.buffer_capacity,
		emergencyOverflowThreshold: raw.emergency_overflow_threshold,
		emergencyRecoveryPushes: raw.emergency_recovery_pushes,
		criticalLogTimeoutMs: raw.critical_log_timeout_ms,
		diagnosticQueueCapacity: raw.diagnostic_queue_capacity,
		gapPricePercent: raw.gap_price_percent,
		gapTimeMs: raw.gap_time_ms,
		lotsPerTrade: raw.lots_per_trade,
		risk: Object.freeze({
			stopLossPoints: risk.stop_loss_points,
			takeProfitPoints: Object.freeze([...risk.take_profit_points]),
			takeProfitFractions: Object.freeze([...risk.take_profit_fractions]),
			useTrailStop: risk.use_trail_stop,
			trailActivationPoints: risk.trail_activation_points,
			trailDistancePoints: risk.trail_distance_points,
			emergencyExitPercent: risk.emergency_exit_percent,
			commissionPercent: risk.commission_percent,
			commissionPerTrade: risk.commission_per_trade,
		}),
		session: Object.freeze({
			startMinute: session.start,
			endMinute: session.end,
			utcOffsetMinutes: session.utc_offset_minutes,
			startBufferMinutes: session.start_buffer_minutes,
			endBufferMinutes: session.end_buffer_minutes,
			maxTradesPerDay: session.max_trades_per_day,
		}),
		strategy: Object.freeze({
			useEmaCrossover: strategy.use_ema_crossover,
			fastEma: strategy.fast_ema,
			slowEma: strategy.slow_ema,
			useMacd: strategy.use_macd,
			macdFast: strategy.macd_fast,
			macdSlow: strategy.macd_slow,
			macdSignal: strategy.macd_signal,
			useVwap: strategy.use_vwap,
			consecutiveGreenTicks: strategy.consecutive_green_ticks,
		}),
		logging: Object.freeze({ level: raw.logging.level }),
	});
}

// ── Entry points ─────────────────────────────────────────────────────

/**
 * Validate a raw configuration object.
 *
 * Missing keys take precedence: if any recognized key is absent the result is
 * a ConfigMissingError naming all of them, even when other values are also bad.
 */
export function parseEngineConfig(raw: unknown): Result<EngineConfig, EngineConfigError> {
	const parsed = validate(engineSchema, raw);
	if (parsed.ok) {
		return ok(toEngineConfig(parsed.value));
	}

	const missing = parsed.error.missingPaths();
	if (missing.length > 0) {
		return err(new ConfigMissingError(missing, { cause: parsed.error }));
	}

	const details = parsed.error.issues.map((i) => `${formatPath(i.path)}: ${i.message}`);
	return err(
		new ConfigError(`Invalid configuration: ${details.join("; ")}`, {
			issues: details,
			cause: parsed.error,
		}),
	);
}

/** Startup boundary: returns the config or throws the configuration error. */
export function requireEngineConfig(raw: unknown): EngineConfig {
	const result = parseEngineConfig(raw);
	if (!result.ok) throw result.error;
	return result.value;
}

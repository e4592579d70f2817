/**
 * TickNormalizer — turns one inbound record into a frozen Tick, or explains why not.
 *
 * Both feed variants run every record through the same normalizer, so a
 * record that is malformed live is malformed in replay too. Required fields
 * are never defaulted.
 */

import { formatPath, validate, z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import { MalformedTickError } from "../shared/errors.js";
import type { InstrumentSymbol } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Tick, TickOrigin } from "./types.js";

const rawTickSchema = z
	.object({
		symbol: z.string().min(1),
		timestamp: z.union([z.number().int().nonnegative(), z.string().min(1)]),
		price: z.union([z.number(), z.string().min(1)]),
		volume: z.number().int().nonnegative(),
	})
	.passthrough();

export interface TickNormalizerConfig {
	readonly symbol: InstrumentSymbol;
	readonly origin: TickOrigin;
	/** Feeds quoting in minor units (paise, cents) divide by this. */
	readonly priceDivisor?: number;
}

export class TickNormalizer {
	private readonly symbol: InstrumentSymbol;
	private readonly origin: TickOrigin;
	private readonly divisor: Decimal | null;
	private lastTimestampMs: number | null = null;
	private malformedCount = 0;

	constructor(config: TickNormalizerConfig) {
		this.symbol = config.symbol;
		this.origin = config.origin;
		if (config.priceDivisor !== undefined && !(config.priceDivisor > 0)) {
			throw new RangeError(`priceDivisor must be positive, got ${config.priceDivisor}`);
		}
		this.divisor =
			config.priceDivisor === undefined || config.priceDivisor === 1
				? null
				: Decimal.from(config.priceDivisor);
	}

	get malformed(): number {
		return this.malformedCount;
	}

	/** Parse and check one record. Every rejection increments the malformed counter. */
	normalize(raw: unknown): Result<Tick, MalformedTickError> {
		const result = this.parse(raw);
		if (!result.ok) {
			this.malformedCount++;
			return result;
		}
		this.lastTimestampMs = result.value.timestampMs;
		return result;
	}

	/** Forget the last timestamp, e.g. before replaying a new session. */
	reset(): void {
		this.lastTimestampMs = null;
	}

	private parse(raw: unknown): Result<Tick, MalformedTickError> {
		const parsed = validate(rawTickSchema, raw);
		if (!parsed.ok) {
			const detail = parsed.error.issues
				.map((i) => `${formatPath(i.path)}: ${i.missing ? "missing" : i.message}`)
				.join("; ");
			return err(new MalformedTickError(`Malformed tick record (${detail})`, { cause: parsed.error }));
		}
		const record = parsed.value;

		if (record.symbol !== this.symbol) {
			return err(
				new MalformedTickError(`Unexpected symbol "${record.symbol}"`, {
					expected: this.symbol,
					received: record.symbol,
				}),
			);
		}

		const timestampMs =
			typeof record.timestamp === "number" ? record.timestamp : Date.parse(record.timestamp);
		if (!Number.isFinite(timestampMs)) {
			return err(new MalformedTickError(`Unparseable timestamp "${record.timestamp}"`));
		}
		if (this.lastTimestampMs !== null && timestampMs < this.lastTimestampMs) {
			return err(
				new MalformedTickError("Tick timestamp went backwards", {
					timestampMs,
					previousMs: this.lastTimestampMs,
				}),
			);
		}

		const quoted = Decimal.tryFrom(record.price);
		if (quoted === null) {
			return err(new MalformedTickError(`Unparseable price "${String(record.price)}"`));
		}
		const price = this.divisor === null ? quoted : quoted.div(this.divisor);
		if (!price.isPositive()) {
			return err(new MalformedTickError(`Non-positive price ${price.toString()}`));
		}

		return ok(
			Object.freeze({
				symbol: this.symbol,
				timestampMs,
				price,
				volume: record.volume,
				origin: this.origin,
			}),
		);
	}
}

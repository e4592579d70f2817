/**
 * Position — immutable long-position aggregate.
 *
 * All mutations (updateMark, withTrailingStop, reduce) return new instances.
 * Satisfies the PositionLike interface from signal/types.ts.
 */

import type { TakeProfitTarget, PositionLike } from "../signal/types.js";
import type { RiskConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import type { InstrumentSymbol, PositionId } from "../shared/identifiers.js";

interface PositionFields {
	readonly id: PositionId;
	readonly symbol: InstrumentSymbol;
	readonly entryPrice: Decimal;
	readonly entryTimeMs: number;
	readonly lotSize: number;
	readonly originalLots: number;
	readonly lots: number;
	readonly stopLossLevel: Decimal;
	readonly takeProfitLevels: readonly TakeProfitTarget[];
	readonly highWaterMark: Decimal;
	readonly trailingStopLevel: Decimal | null;
}

export class Position implements PositionLike {
	readonly id: PositionId;
	readonly symbol: InstrumentSymbol;
	readonly entryPrice: Decimal;
	readonly entryTimeMs: number;
	readonly lotSize: number;
	readonly originalLots: number;
	readonly lots: number;
	readonly stopLossLevel: Decimal;
	readonly takeProfitLevels: readonly TakeProfitTarget[];
	readonly highWaterMark: Decimal;
	readonly trailingStopLevel: Decimal | null;

	private constructor(fields: PositionFields) {
		this.id = fields.id;
		this.symbol = fields.symbol;
		this.entryPrice = fields.entryPrice;
		this.entryTimeMs = fields.entryTimeMs;
		this.lotSize = fields.lotSize;
		this.originalLots = fields.originalLots;
		this.lots = fields.lots;
		this.stopLossLevel = fields.stopLossLevel;
		this.takeProfitLevels = fields.takeProfitLevels;
		this.highWaterMark = fields.highWaterMark;
		this.trailingStopLevel = fields.trailingStopLevel;
	}

	/**
	 * Opens a long at `entryPrice`, deriving stop and targets from the risk
	 * settings in price points.
	 *
	 * @example
	 * ```ts
	 * const pos = Position.open({ id, symbol, entryPrice: Decimal.from(100), entryTimeMs, lots: 2, lotSize: 75, risk });
	 * pos.stopLossLevel.toString(); // "90" with stop_loss_points = 10
	 * ```
	 */
	static open(params: {
		id: PositionId;
		symbol: InstrumentSymbol;
		entryPrice: Decimal;
		entryTimeMs: number;
		lots: number;
		lotSize: number;
		risk: RiskConfig;
	}): Position {
		const { risk, entryPrice } = params;
		const takeProfitLevels = risk.takeProfitPoints.map(
			(points, i): TakeProfitTarget => ({
				price: entryPrice.add(Decimal.from(points)),
				fraction: risk.takeProfitFractions[i] ?? 1,
				hit: false,
			}),
		);
		return new Position({
			id: params.id,
			symbol: params.symbol,
			entryPrice,
			entryTimeMs: params.entryTimeMs,
			lotSize: params.lotSize,
			originalLots: params.lots,
			lots: params.lots,
			stopLossLevel: entryPrice.sub(Decimal.from(risk.stopLossPoints)),
			takeProfitLevels,
			highWaterMark: entryPrice,
			trailingStopLevel: null,
		});
	}

	// ── Queries ──────────────────────────────────────────────────

	get quantity(): number {
		return this.lots * this.lotSize;
	}

	/** entry price × quantity */
	notional(): Decimal {
		return this.entryPrice.mul(Decimal.from(this.quantity));
	}

	unrealizedPnl(price: Decimal): Decimal {
		return price.sub(this.entryPrice).mul(Decimal.from(this.quantity));
	}

	/** Lots a target releases: its fraction of the original lots, rounded down, at least one. */
	lotsForTarget(targetIndex: number): number {
		const fraction = this.takeProfitLevels[targetIndex]?.fraction ?? 1;
		const lots = Decimal.from(this.originalLots).mul(Decimal.from(fraction)).floor().toNumber();
		return Math.max(1, lots);
	}

	// ── Mutations (return new instances) ────────────────────────

	/** Raises the high-water mark when `price` is above it. Returns same instance if not. */
	updateMark(price: Decimal): Position {
		if (price.lte(this.highWaterMark)) return this;
		return this.copyWith({ highWaterMark: price });
	}

	withTrailingStop(level: Decimal | null): Position {
		if (level === this.trailingStopLevel) return this;
		if (level !== null && this.trailingStopLevel !== null && level.eq(this.trailingStopLevel)) return this;
		return this.copyWith({ trailingStopLevel: level });
	}

	/** Marks a target hit and removes `lots` from the position. */
	reduce(lots: number, targetIndex: number): Position {
		if (lots >= this.lots) {
			throw new RangeError(`Cannot reduce by ${lots}: only ${this.lots} lots held`);
		}
		return this.copyWith({
			lots: this.lots - lots,
			takeProfitLevels: this.takeProfitLevels.map((t, i) => (i === targetIndex ? { ...t, hit: true } : t)),
		});
	}

	private copyWith(overrides: Partial<PositionFields>): Position {
		return new Position({
			id: this.id,
			symbol: this.symbol,
			entryPrice: this.entryPrice,
			entryTimeMs: this.entryTimeMs,
			lotSize: this.lotSize,
			originalLots: this.originalLots,
			lots: this.lots,
			stopLossLevel: this.stopLossLevel,
			takeProfitLevels: this.takeProfitLevels,
			highWaterMark: this.highWaterMark,
			trailingStopLevel: this.trailingStopLevel,
			...overrides,
		});
	}
}

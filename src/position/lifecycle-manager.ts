/**
 * PositionLifecycleManager — owns the single position slot for one instrument.
 *
 * Runs on the consumer only; capital and the slot are never touched from
 * anywhere else. Each tick with a position open first raises the high-water
 * mark and the trailing level, then asks the exit pipeline. A non-final
 * take-profit tier books a partial trade and keeps the position open; any
 * other exit books the remainder and frees the slot.
 */

import { type CommissionModel, commissionFromRisk } from "../accounting/commission-model.js";
import type { DiagnosticLogger } from "../diagnostics/types.js";
import { Severity } from "../diagnostics/types.js";
import type { Tick } from "../feed/types.js";
import { PositionStateMachine } from "../lifecycle/state-machine.js";
import type { PositionState, PositionTransition } from "../lifecycle/types.js";
import type { ResultsSink } from "../results/types.js";
import { ExitPipeline } from "../signal/exit-pipeline.js";
import { TrailingStopExit } from "../signal/exits/trailing-stop.js";
import type { ExitReason } from "../signal/types.js";
import type { InstrumentConfig, RiskConfig } from "../shared/config.js";
import { Decimal } from "../shared/decimal.js";
import {
	LifecycleViolationError,
	PositionAlreadyOpenError,
	type PositionSizeExceededError,
} from "../shared/errors.js";
import { positionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { SessionWindow } from "../strategy/session-window.js";
import { Position } from "./position.js";
import { sizeEntry } from "./sizing.js";
import { createTrade } from "./trade.js";
import type { OpenIntent, PositionSnapshot, Trade } from "./types.js";

const COMPONENT = "position";

export interface PositionLifecycleManagerConfig {
	readonly instrument: InstrumentConfig;
	readonly risk: RiskConfig;
	readonly session: SessionWindow;
	readonly initialCapital: number;
	readonly maxPositionValuePercent: number;
	readonly maxPositionDurationMs: number;
	readonly results: ResultsSink;
	readonly diagnostics: DiagnosticLogger;
	/** Defaults to the rates in `risk`. */
	readonly commission?: CommissionModel;
}

export type OpenError = PositionSizeExceededError | PositionAlreadyOpenError;

export class PositionLifecycleManager {
	private readonly instrument: InstrumentConfig;
	private readonly risk: RiskConfig;
	private readonly session: SessionWindow;
	private readonly maxPositionValuePercent: number;
	private readonly pipeline: ExitPipeline;
	private readonly trailing: TrailingStopExit | null;
	private readonly commission: CommissionModel;
	private readonly results: ResultsSink;
	private readonly diagnostics: DiagnosticLogger;

	private current: Position | null = null;
	private machine = new PositionStateMachine();
	private capitalValue: Decimal;
	private positionsOpened = 0;
	private tradeCount = 0;
	private sizingRejectionCount = 0;
	private realized = Decimal.zero();

	constructor(config: PositionLifecycleManagerConfig) {
		this.instrument = config.instrument;
		this.risk = config.risk;
		this.session = config.session;
		this.maxPositionValuePercent = config.maxPositionValuePercent;
		this.trailing = config.risk.useTrailStop
			? TrailingStopExit.fromPoints(config.risk.trailActivationPoints, config.risk.trailDistancePoints)
			: null;
		this.pipeline = ExitPipeline.fromRisk(config.risk, config.maxPositionDurationMs, this.trailing);
		this.commission = config.commission ?? commissionFromRisk(config.risk);
		this.results = config.results;
		this.diagnostics = config.diagnostics;
		this.capitalValue = Decimal.from(config.initialCapital);
	}

	// ── Queries ──────────────────────────────────────────────────

	hasOpenPosition(): boolean {
		return this.current !== null;
	}

	position(): Position | null {
		return this.current;
	}

	state(): PositionState {
		return this.machine.state();
	}

	snapshot(): PositionSnapshot | null {
		const pos = this.current;
		if (pos === null) return null;
		return {
			id: pos.id,
			symbol: pos.symbol,
			status: this.machine.state(),
			entryPrice: pos.entryPrice,
			entryTimeMs: pos.entryTimeMs,
			lots: pos.lots,
			quantity: pos.quantity,
			stopLossLevel: pos.stopLossLevel,
			takeProfitLevels: pos.takeProfitLevels.filter((t) => !t.hit).map((t) => t.price),
			trailingStopLevel: pos.trailingStopLevel,
			highWaterMark: pos.highWaterMark,
		};
	}

	capital(): Decimal {
		return this.capitalValue;
	}

	realizedPnl(): Decimal {
		return this.realized;
	}

	stats(): { opened: number; trades: number; sizingRejections: number } {
		return {
			opened: this.positionsOpened,
			trades: this.tradeCount,
			sizingRejections: this.sizingRejectionCount,
		};
	}

	// ── Entry ────────────────────────────────────────────────────

	/** Opens a long at the intent tick's price after sizing against current capital. */
	open(intent: OpenIntent, sequence: number | null = null): Result<Position, OpenError> {
		if (this.current !== null) {
			return err(
				new PositionAlreadyOpenError(`Position ${this.current.id} is still open`, {
					positionId: this.current.id,
				}),
			);
		}

		const { tick } = intent;
		const sized = sizeEntry({
			capital: this.capitalValue,
			maxPositionValuePercent: this.maxPositionValuePercent,
			price: tick.price,
			lotSize: this.instrument.lotSize,
			requested: intent.lots,
		});
		if (!sized.ok) {
			this.sizingRejectionCount++;
			this.diagnostics.log(Severity.Warning, COMPONENT, `Entry rejected: ${sized.error.message}`, sequence);
			return sized;
		}

		this.positionsOpened++;
		const pos = Position.open({
			id: positionId(`${this.instrument.symbol}-${this.positionsOpened}`),
			symbol: this.instrument.symbol,
			entryPrice: tick.price,
			entryTimeMs: tick.timestampMs,
			lots: sized.value.lots,
			lotSize: this.instrument.lotSize,
			risk: this.risk,
		});
		this.machine = new PositionStateMachine();
		this.transition({ type: "fill", atMs: tick.timestampMs });
		this.current = pos;

		this.results.record({
			type: "position_opened",
			positionId: pos.id,
			symbol: pos.symbol,
			entryPrice: pos.entryPrice,
			lots: pos.lots,
			quantity: pos.quantity,
			entryTimeMs: pos.entryTimeMs,
		});
		this.diagnostics.log(
			Severity.Info,
			COMPONENT,
			`Opened ${pos.id}: ${pos.lots} lot(s) at ${pos.entryPrice.toString()}, stop ${pos.stopLossLevel.toString()}`,
			sequence,
		);
		return ok(pos);
	}

	// ── Exit evaluation ──────────────────────────────────────────

	/**
	 * Evaluate exits for the open position against this tick. Returns the
	 * trades booked on this tick (empty when nothing triggered).
	 */
	evaluate(tick: Tick, sequence: number | null = null): readonly Trade[] {
		const start = this.current;
		if (start === null) return [];

		let pos = start.updateMark(tick.price);
		if (this.trailing !== null) {
			pos = pos.withTrailingStop(this.trailing.nextLevel(pos));
		}
		this.current = pos;

		const reason = this.pipeline.evaluate(pos, {
			tick,
			inClosingBuffer: this.session.inClosingBuffer(tick.timestampMs),
		});
		if (reason === null) return [];

		if (reason.type === "take_profit" && !reason.final) {
			const lots = pos.lotsForTarget(reason.targetIndex);
			if (lots < pos.lots) {
				return [this.bookPartial(pos, tick, lots, reason, sequence)];
			}
		}
		return [this.bookClose(pos, tick, reason, sequence)];
	}

	/** Close whatever is open at the tick's price, e.g. on shutdown with the last good tick. */
	forceClose(tick: Tick, note: string, sequence: number | null = null): Trade | null {
		const pos = this.current;
		if (pos === null) return null;
		return this.bookClose(pos, tick, { type: "forced", note }, sequence);
	}

	// ── Booking ──────────────────────────────────────────────────

	private bookPartial(
		pos: Position,
		tick: Tick,
		lots: number,
		reason: Extract<ExitReason, { type: "take_profit" }>,
		sequence: number | null,
	): Trade {
		const trade = createTrade({
			position: pos,
			exitTick: tick,
			lots,
			reason,
			partial: true,
			commission: this.commission,
		});
		this.transition({ type: "partial_exit", atMs: tick.timestampMs, lotsClosed: lots });
		this.current = pos.reduce(lots, reason.targetIndex);
		this.emit(trade, sequence);
		return trade;
	}

	private bookClose(pos: Position, tick: Tick, reason: ExitReason, sequence: number | null): Trade {
		this.transition({ type: "begin_close", atMs: tick.timestampMs, reason: reason.type });
		const trade = createTrade({
			position: pos,
			exitTick: tick,
			lots: pos.lots,
			reason,
			partial: false,
			commission: this.commission,
		});
		this.transition({ type: "complete_close", atMs: tick.timestampMs });
		this.current = null;
		this.emit(trade, sequence);
		return trade;
	}

	private emit(trade: Trade, sequence: number | null): void {
		this.capitalValue = this.capitalValue.add(trade.netPnl);
		this.realized = this.realized.add(trade.netPnl);
		this.tradeCount++;
		this.results.record({ type: "trade", trade });
		this.diagnostics.log(
			Severity.Info,
			COMPONENT,
			`${trade.partial ? "Partial exit" : "Closed"} ${trade.positionId} (${trade.exitReason.type}) ${trade.lots} lot(s) at ${trade.exitPrice.toString()}, net ${trade.netPnl.toFixed(2)}`,
			sequence,
		);
	}

	private transition(t: PositionTransition): void {
		const result = this.machine.transition(t);
		if (!result.ok) {
			throw new LifecycleViolationError(`Position lifecycle violated: ${result.error.message}`, {
				kind: result.error.kind,
				from: result.error.from,
				transition: result.error.transition,
			});
		}
	}
}

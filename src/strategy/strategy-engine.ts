/**
 * StrategyEngine — warm-up gating and entry dispatch.
 *
 * Every tick is counted and folded into the indicators. Until warm-up
 * completes the answer is always `warming_up`; the completing tick itself is
 * still a warm-up tick. After that the warm-up branch is never taken again.
 * With a position open the answer is `manage`; otherwise the session window,
 * the daily trade limit, the entry block and the entry rules decide between
 * `hold` and `open`.
 */

import type { DiagnosticLogger } from "../diagnostics/types.js";
import { Severity } from "../diagnostics/types.js";
import type { Tick } from "../feed/types.js";
import type { LotsPerTrade, SessionConfig, StrategyConfig } from "../shared/config.js";
import { evaluateEntry } from "./entry-rules.js";
import { type IndicatorSnapshot, IndicatorSet } from "./indicators.js";
import { SessionWindow } from "./session-window.js";
import { HoldReason, type StrategyDecision, type StrategyView, type WarmupState } from "./types.js";
import { WarmupTracker } from "./warmup.js";

const COMPONENT = "strategy";

export interface StrategyEngineConfig {
	readonly strategy: StrategyConfig;
	readonly session: SessionConfig;
	readonly minWarmupTicks: number;
	readonly lotsPerTrade: LotsPerTrade;
	readonly diagnostics: DiagnosticLogger;
}

export class StrategyEngine {
	private readonly config: StrategyConfig;
	private readonly warmup: WarmupTracker;
	private readonly indicators: IndicatorSet;
	private readonly session: SessionWindow;
	private readonly lotsPerTrade: LotsPerTrade;
	private readonly maxTradesPerDay: number;
	private readonly diagnostics: DiagnosticLogger;
	private tradeDay: number | null = null;
	private tradesToday = 0;

	constructor(config: StrategyEngineConfig) {
		this.config = config.strategy;
		this.session = new SessionWindow(config.session);
		this.warmup = new WarmupTracker(config.minWarmupTicks);
		this.indicators = new IndicatorSet(config.strategy, this.session);
		this.lotsPerTrade = config.lotsPerTrade;
		this.maxTradesPerDay = config.session.maxTradesPerDay;
		this.diagnostics = config.diagnostics;
	}

	onTick(tick: Tick, view: StrategyView, sequence: number | null = null): StrategyDecision {
		const wasComplete = this.warmup.complete;
		const completedNow = this.warmup.record();
		const snapshot = this.indicators.update(tick);

		if (!wasComplete) {
			const { ticksSeen, required } = this.warmup.state();
			if (completedNow) {
				this.diagnostics.log(
					Severity.Info,
					COMPONENT,
					`Warm-up complete after ${ticksSeen} ticks; trading enabled`,
					sequence,
				);
			}
			return { kind: "warming_up", ticksSeen, required };
		}

		if (view.hasOpenPosition) return { kind: "manage" };
		return this.entryDecision(tick, snapshot, view);
	}

	/** Count a filled entry against the daily limit. */
	recordEntry(tick: Tick): void {
		this.rollDay(tick.timestampMs);
		this.tradesToday++;
	}

	warmupState(): WarmupState {
		return this.warmup.state();
	}

	indicatorSnapshot(): IndicatorSnapshot | null {
		return this.indicators.snapshot();
	}

	sessionWindow(): SessionWindow {
		return this.session;
	}

	private entryDecision(tick: Tick, snapshot: IndicatorSnapshot, view: StrategyView): StrategyDecision {
		if (view.entriesBlocked) {
			return { kind: "hold", reason: HoldReason.EntriesHalted };
		}
		if (!this.session.inEntryWindow(tick.timestampMs)) {
			return { kind: "hold", reason: HoldReason.OutsideEntryWindow };
		}
		this.rollDay(tick.timestampMs);
		if (this.tradesToday >= this.maxTradesPerDay) {
			return { kind: "hold", reason: HoldReason.DailyLimit };
		}
		if (!evaluateEntry(this.config, snapshot).pass) {
			return { kind: "hold", reason: HoldReason.NoSignal };
		}
		return { kind: "open", tick, lots: this.lotsPerTrade };
	}

	private rollDay(timestampMs: number): void {
		const day = this.session.dayKey(timestampMs);
		if (day !== this.tradeDay) {
			this.tradeDay = day;
			this.tradesToday = 0;
		}
	}
}

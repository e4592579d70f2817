/**
 * TradingEngine — wires the tick path end to end.
 *
 * Producer: source → dedup guard → transfer buffer, with every push outcome
 * reported to the overload monitor. Consumer: buffer → strategy engine →
 * position lifecycle manager → results sink. Diagnostics from every stage go
 * to the async sink.
 *
 * A fatal condition (a critical diagnostic that could not be recorded) halts
 * new entries for the rest of the run; an open position keeps being managed.
 */

import { AsyncDiagnosticSink } from "../diagnostics/diagnostic-sink.js";
import type { DiagnosticLogger, DiagnosticWriter } from "../diagnostics/types.js";
import { Severity } from "../diagnostics/types.js";
import type { Tick, TickSource } from "../feed/types.js";
import { DedupGuard } from "../ingest/dedup-guard.js";
import { OverloadMonitor } from "../ingest/overload-monitor.js";
import { TransferBuffer } from "../ingest/transfer-buffer.js";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger, LogLevel } from "../lib/logger/index.js";
import { type LatencySnapshot, LatencyHistogram } from "../observability/latency-histogram.js";
import { PositionLifecycleManager } from "../position/lifecycle-manager.js";
import type { ResultsSink } from "../results/types.js";
import type { EngineConfig } from "../shared/config.js";
import { BufferOverflowError, type TradingError } from "../shared/errors.js";
import { StrategyEngine } from "../strategy/strategy-engine.js";
import type { EngineCounters, EngineEvents, SequencedTick } from "./types.js";

const COMPONENT = "engine";

const SEVERITY_FOR_LEVEL: Readonly<Record<LogLevel, Severity>> = {
	trace: Severity.Debug,
	debug: Severity.Debug,
	info: Severity.Info,
	warn: Severity.Warning,
	error: Severity.Warning,
	fatal: Severity.Critical,
};

export interface TradingEngineDeps {
	readonly config: EngineConfig;
	/** Builds the tick source once the engine's diagnostics exist. */
	readonly source: (diagnostics: DiagnosticLogger) => TickSource;
	readonly diagnosticWriter: DiagnosticWriter;
	readonly results: ResultsSink;
	/** Receives fatal errors even when the diagnostic path itself has failed. */
	readonly logger?: Logger;
	/**
	 * Close a position still open at the last good tick when the run ends by
	 * {@link TradingEngine.stop} or at the end of a replay. A feed disconnect
	 * never closes it. Default true.
	 */
	readonly flattenOnStop?: boolean;
}

export class TradingEngine {
	readonly events = new TypedEmitter<EngineEvents>();

	private readonly config: EngineConfig;
	private readonly diagnostics: AsyncDiagnosticSink;
	private readonly source: TickSource;
	private readonly dedup: DedupGuard;
	private readonly buffer: TransferBuffer<SequencedTick>;
	private readonly overload: OverloadMonitor;
	private readonly strategy: StrategyEngine;
	private readonly positions: PositionLifecycleManager;
	private readonly results: ResultsSink;
	private readonly latencyHistogram = LatencyHistogram.create();
	private readonly logger: Logger | null;
	private readonly flattenOnStop: boolean;

	private received = 0;
	private pushed = 0;
	private processed = 0;
	private lastTick: SequencedTick | null = null;
	private producerDone = false;
	private running = false;
	private stopRequested = false;
	private fatalError: TradingError | null = null;

	constructor(deps: TradingEngineDeps) {
		const { config } = deps;
		this.config = config;
		this.results = deps.results;
		this.logger = deps.logger?.child({ module: COMPONENT }) ?? null;
		this.flattenOnStop = deps.flattenOnStop ?? true;

		this.diagnostics = new AsyncDiagnosticSink({
			writer: deps.diagnosticWriter,
			queueCapacity: config.diagnosticQueueCapacity,
			criticalTimeoutMs: config.criticalLogTimeoutMs,
			minSeverity: SEVERITY_FOR_LEVEL[config.logging.level],
			onFatal: (error) => this.halt(error),
		});

		this.strategy = new StrategyEngine({
			strategy: config.strategy,
			session: config.session,
			minWarmupTicks: config.minWarmupTicks,
			lotsPerTrade: config.lotsPerTrade,
			diagnostics: this.diagnostics,
		});
		this.positions = new PositionLifecycleManager({
			instrument: config.instrument,
			risk: config.risk,
			session: this.strategy.sessionWindow(),
			initialCapital: config.initialCapital,
			maxPositionValuePercent: config.maxPositionValuePercent,
			maxPositionDurationMs: config.maxPositionDurationMs,
			results: deps.results,
			diagnostics: this.diagnostics,
		});

		this.dedup = new DedupGuard({
			gapPricePercent: config.gapPricePercent,
			gapTimeMs: config.gapTimeMs,
			diagnostics: this.diagnostics,
		});
		this.buffer = new TransferBuffer(config.bufferCapacity);
		this.overload = new OverloadMonitor({
			overflowThreshold: config.emergencyOverflowThreshold,
			recoveryPushes: config.emergencyRecoveryPushes,
			isPositionOpen: () => this.positions.hasOpenPosition(),
			diagnostics: this.diagnostics,
			onModeChange: (active) => this.events.emit("emergency_mode", active),
		});

		this.source = deps.source(this.diagnostics);
	}

	// ── Lifecycle ──────────────────────────────────────────────────

	/**
	 * Run until the source stops (end of replay, disconnect or {@link stop}),
	 * then process every tick still buffered and flush diagnostics and results.
	 */
	async run(): Promise<EngineCounters> {
		if (this.running) {
			throw new Error("TradingEngine is already running");
		}
		this.running = true;
		this.producerDone = false;
		this.stopRequested = false;
		this.diagnostics.log(
			Severity.Info,
			COMPONENT,
			`Starting ${this.source.kind} session for ${this.config.instrument.symbol}`,
		);

		const consumerFailure: { failed: boolean; cause: unknown } = { failed: false, cause: undefined };
		const consumer = this.consume().catch((cause: unknown) => {
			consumerFailure.failed = true;
			consumerFailure.cause = cause;
			this.source.stop();
		});
		try {
			await this.source.start((tick) => this.produce(tick));
		} finally {
			this.producerDone = true;
			this.buffer.notify();
			await consumer;
			this.running = false;
		}
		if (consumerFailure.failed) {
			throw consumerFailure.cause;
		}

		this.settleOpenPosition();

		const counters = this.counters();
		this.diagnostics.log(
			Severity.Info,
			COMPONENT,
			`Session ended: ${counters.processed} ticks processed, ${counters.trades} trades`,
		);
		await this.diagnostics.flush();
		await this.results.flush();
		return counters;
	}

	/** Stop the source. The consumer drains what is buffered before `run` resolves. */
	stop(): void {
		this.stopRequested = true;
		this.source.stop();
		this.buffer.notify();
	}

	// ── Queries ────────────────────────────────────────────────────

	counters(): EngineCounters {
		const overload = this.overload.stats();
		const position = this.positions.stats();
		return {
			received: this.received,
			malformed: this.source.stats().malformed,
			duplicates: this.dedup.duplicates,
			gapWarnings: this.dedup.gapWarnings,
			pushed: this.pushed,
			overflows: overload.overflows,
			processed: this.processed,
			emergencyActivations: overload.activations,
			sizingRejections: position.sizingRejections,
			trades: position.trades,
			diagnosticsDropped: this.diagnostics.stats().dropped,
		};
	}

	latency(): LatencySnapshot {
		return this.latencyHistogram.snapshot();
	}

	isHalted(): boolean {
		return this.fatalError !== null;
	}

	inEmergencyMode(): boolean {
		return this.overload.emergency;
	}

	positionManager(): PositionLifecycleManager {
		return this.positions;
	}

	strategyEngine(): StrategyEngine {
		return this.strategy;
	}

	diagnosticSink(): AsyncDiagnosticSink {
		return this.diagnostics;
	}

	private settleOpenPosition(): void {
		const open = this.positions.position();
		if (open === null || this.lastTick === null) return;

		if (!this.stopRequested && !this.source.exhausted()) {
			this.diagnostics.log(
				Severity.Warning,
				COMPONENT,
				`Feed ended with ${open.id} still open; exits resume on the next run`,
				this.lastTick.sequence,
			);
			return;
		}
		if (!this.flattenOnStop) return;

		const { tick, sequence } = this.lastTick;
		const trade = this.positions.forceClose(tick, "session stopped", sequence);
		if (trade !== null) this.events.emit("trade", trade);
	}

	// ── Producer ───────────────────────────────────────────────────

	private produce(tick: Tick): void {
		this.received++;
		const sequence = this.received;
		if (!this.dedup.accept(tick, sequence).ok) return;

		const accepted = this.buffer.push({ tick, sequence });
		if (accepted) {
			this.pushed++;
		} else {
			const overflow = new BufferOverflowError("Transfer buffer full; tick dropped", {
				capacity: this.buffer.capacity,
				sequence,
			});
			this.diagnostics.log(Severity.Warning, "ingest", overflow.message, sequence);
		}
		this.overload.recordPush(accepted, sequence);
	}

	// ── Consumer ───────────────────────────────────────────────────

	private async consume(): Promise<void> {
		for (;;) {
			let item = this.buffer.pop();
			while (item !== null) {
				this.process(item);
				item = this.buffer.pop();
			}
			if (this.producerDone) return;
			await this.buffer.waitForData();
		}
	}

	private process(item: SequencedTick): void {
		const started = process.hrtime.bigint();
		const { tick, sequence } = item;
		this.lastTick = item;
		this.processed++;

		const decision = this.strategy.onTick(
			tick,
			{
				hasOpenPosition: this.positions.hasOpenPosition(),
				entriesBlocked: this.overload.emergency || this.fatalError !== null,
			},
			sequence,
		);

		switch (decision.kind) {
			case "open": {
				const opened = this.positions.open({ tick: decision.tick, lots: decision.lots }, sequence);
				if (opened.ok) {
					this.strategy.recordEntry(tick);
					this.events.emit("position_opened", opened.value);
				}
				break;
			}
			case "manage":
				for (const trade of this.positions.evaluate(tick, sequence)) {
					this.events.emit("trade", trade);
				}
				break;
			case "warming_up":
			case "hold":
				break;
		}

		this.latencyHistogram.recordSince(started);
	}

	private halt(error: TradingError): void {
		if (this.fatalError !== null) return;
		this.fatalError = error;
		this.logger?.fatal({ err: error, code: error.code }, `Entries halted: ${error.message}`);
		this.events.emit("fatal", error);
	}
}

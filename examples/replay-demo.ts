/**
 * Replay Demo
 *
 * Replays a synthetic trending session through the full tick path:
 * - EMA crossover entries after a 30-tick warm-up
 * - 15-point stop, two take-profit tiers, trailing stop after +10
 * - Prints every trade, the engine counters and consumer latency
 */

import {
	FileResultsSink,
	LoggerDiagnosticWriter,
	ReplayTickSource,
	TradingEngine,
	createLogger,
	requireEngineConfig,
} from "../src/index.js";

// ── Configuration ───────────────────────────────────────────────────

const config = requireEngineConfig({
	instrument: { symbol: "NIFTY-FUT", lot_size: 75, tick_size: 0.05 },
	initial_capital: 1_000_000,
	min_warmup_ticks: 30,
	max_position_value_percent: 25,
	max_position_duration: "45m",
	buffer_capacity: 4096,
	emergency_overflow_threshold: 3,
	emergency_recovery_pushes: 50,
	critical_log_timeout_ms: 10,
	diagnostic_queue_capacity: 1024,
	gap_price_percent: 1,
	gap_time_ms: 30_000,
	lots_per_trade: 2,
	risk: {
		stop_loss_points: 15,
		take_profit_points: [20, 40],
		take_profit_fractions: [0.5, 0.5],
		use_trail_stop: true,
		trail_activation_points: 10,
		trail_distance_points: 8,
		emergency_exit_percent: 2,
		commission_percent: 0.03,
		commission_per_trade: 20,
	},
	session: {
		start: "09:15",
		end: "15:30",
		utc_offset_minutes: 330,
		start_buffer_minutes: 5,
		end_buffer_minutes: 15,
		max_trades_per_day: 5,
	},
	strategy: {
		use_ema_crossover: true,
		fast_ema: 9,
		slow_ema: 21,
		use_macd: false,
		macd_fast: 12,
		macd_slow: 26,
		macd_signal: 9,
		use_vwap: true,
		consecutive_green_ticks: 2,
	},
	logging: { level: "info" },
});

// ── Synthetic session: a slow drift up with noise, one tick per second ──

function* syntheticSession(ticks: number): Generator<Record<string, unknown>> {
	// 09:20 IST on 2024-01-02
	const start = Date.UTC(2024, 0, 2, 3, 50, 0);
	let seed = 42;
	const random = () => {
		seed = (seed * 1_103_515_245 + 12_345) % 2_147_483_648;
		return seed / 2_147_483_648;
	};

	let price = 22_000;
	for (let i = 0; i < ticks; i++) {
		price += 0.4 + (random() - 0.5) * 6;
		yield {
			symbol: "NIFTY-FUT",
			timestamp: start + i * 1_000,
			price: price.toFixed(2),
			volume: 1 + Math.floor(random() * 50),
		};
	}
}

// ── Run ─────────────────────────────────────────────────────────────

const logger = createLogger({ level: config.logging.level });
const results = FileResultsSink.create({ filePath: "replay-demo.results.jsonl" });

const engine = new TradingEngine({
	config,
	source: (diagnostics) =>
		new ReplayTickSource({
			records: syntheticSession(3_600),
			symbol: config.instrument.symbol,
			pacing: { mode: "max", batchSize: 1_024 },
			diagnostics,
		}),
	diagnosticWriter: new LoggerDiagnosticWriter(logger),
	results,
	logger,
});

engine.events.on("trade", (trade) => {
	console.log(
		`  ${trade.positionId} ${trade.exitReason.type.padEnd(13)} ${trade.lots} lot(s) ` +
			`${trade.entryPrice.toFixed(2)} -> ${trade.exitPrice.toFixed(2)}  net ${trade.netPnl.toFixed(2)}`,
	);
});

console.log("Trades:");
const counters = await engine.run();
await results.close();
const latency = engine.latency();

console.log("\nCounters:");
for (const [name, value] of Object.entries(counters)) {
	console.log(`  ${name.padEnd(22)} ${value}`);
}
console.log("\nConsumer latency:");
console.log(`  p50 ${latency.p50Ms.toFixed(3)}ms  p99 ${latency.p99Ms.toFixed(3)}ms  max ${latency.maxMs.toFixed(3)}ms`);
console.log(`\nRealized P&L: ${engine.positionManager().realizedPnl().toFixed(2)}`);

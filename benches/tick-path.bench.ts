import { bench, describe } from "vitest";
import { MemoryDiagnosticWriter } from "../src/diagnostics/memory-writer.js";
import { ReplayTickSource } from "../src/feed/replay-source.js";
import { TradingEngine } from "../src/engine/trading-engine.js";
import { MemoryResultsSink } from "../src/results/memory-results-sink.js";
import { TEST_SYMBOL, rawSeries, testConfig } from "../src/testing/fixtures.js";

function generatePrices(n: number): number[] {
	const prices: number[] = [];
	let price = 100;
	for (let i = 0; i < n; i++) {
		price += (Math.random() - 0.48) * 0.5;
		prices.push(Number(Math.max(50, price).toFixed(2)));
	}
	return prices;
}

const records = rawSeries(generatePrices(10_000));
const config = testConfig((raw) => {
	raw.logging.level = "warn";
	raw.strategy.use_ema_crossover = true;
});

describe("tick path", () => {
	bench("replay 10k ticks through the engine", async () => {
		const engine = new TradingEngine({
			config,
			source: (diagnostics) =>
				new ReplayTickSource({
					records,
					symbol: TEST_SYMBOL,
					pacing: { mode: "max", batchSize: 1_024 },
					diagnostics,
				}),
			diagnosticWriter: new MemoryDiagnosticWriter(),
			results: new MemoryResultsSink(),
		});
		await engine.run();
	});
});

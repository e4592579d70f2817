/**
 * MemoryResultsSink — in-memory, append-only results store.
 *
 * For tests, replays and lightweight runtime use. Not persisted.
 */

import type { Trade } from "../position/types.js";
import { Decimal } from "../shared/decimal.js";
import type { ResultEvent, ResultsSink } from "./types.js";

export interface MemoryResultsSinkConfig {
	readonly maxEvents?: number;
}

export class MemoryResultsSink implements ResultsSink {
	private readonly store: ResultEvent[] = [];
	private readonly maxEvents: number;

	constructor(config?: MemoryResultsSinkConfig) {
		this.maxEvents = config?.maxEvents ?? Number.POSITIVE_INFINITY;
	}

	record(event: ResultEvent): void {
		this.store.push(event);
		const excess = this.store.length - this.maxEvents;
		if (excess > 0) {
			this.store.splice(0, excess);
		}
	}

	/** Shallow copy of every recorded event. */
	events(): ResultEvent[] {
		return [...this.store];
	}

	trades(): Trade[] {
		return this.store.flatMap((e) => (e.type === "trade" ? [e.trade] : []));
	}

	/** Sum of net P&L over every recorded trade. */
	netPnl(): Decimal {
		return this.trades().reduce((sum, t) => sum.add(t.netPnl), Decimal.zero());
	}

	clear(): void {
		this.store.length = 0;
	}

	async flush(): Promise<void> {}

	get size(): number {
		return this.store.length;
	}
}

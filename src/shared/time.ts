/**
 * Time utilities — injectable clock plus the duration grammar used by config.
 *
 * Trading decisions use tick timestamps, never the wall clock, so a replay
 * reproduces a live session. The Clock is for diagnostics and latency only.
 */

/** Injectable time source -- infrastructure code depends on this instead of `Date.now()`. */
export interface Clock {
	now(): number;
}

/** Production clock backed by `Date.now()`. */
export const SystemClock: Clock = {
	now: () => Date.now(),
};

/** Controllable clock for deterministic testing -- advance time manually with `advance()`. */
export class FakeClock implements Clock {
	private time: number;

	constructor(startMs = 0) {
		this.time = startMs;
	}

	now(): number {
		return this.time;
	}

	advance(ms: number): void {
		if (ms < 0) {
			throw new Error(`FakeClock.advance requires non-negative ms, got ${ms}`);
		}
		this.time += ms;
	}

	set(ms: number): void {
		this.time = ms;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to milliseconds. */
export const Duration = {
	ms: (n: number) => n,
	seconds: (n: number) => n * 1_000,
	minutes: (n: number) => n * 60_000,
	hours: (n: number) => n * 3_600_000,
} as const;

const DURATION_PATTERN = /^(\d+)\s*(ms|s|m|h)$/;

const UNIT_MS: Record<string, number> = {
	ms: 1,
	s: 1_000,
	m: 60_000,
	h: 3_600_000,
};

/**
 * Parse `"250ms"`, `"30s"`, `"45m"`, `"2h"` or a bare millisecond count.
 * Returns null for anything else, including zero and negative values.
 */
export function parseDurationMs(value: string | number): number | null {
	if (typeof value === "number") {
		return Number.isInteger(value) && value > 0 ? value : null;
	}
	const match = DURATION_PATTERN.exec(value.trim());
	if (match === null) return null;
	const amount = Number(match[1]);
	const unit = UNIT_MS[match[2] ?? ""];
	if (unit === undefined || amount <= 0) return null;
	return amount * unit;
}

/**
 * SessionWindow — trading-day arithmetic on tick timestamps.
 *
 * Times of day are local to the exchange, given as a fixed UTC offset.
 * Everything is derived from the tick's own timestamp, never the wall
 * clock, so a replay sees the same windows as the live run did.
 */

import type { SessionConfig } from "../shared/config.js";

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export class SessionWindow {
	private readonly offsetMs: number;
	private readonly startMs: number;
	private readonly endMs: number;
	private readonly entryStartMs: number;
	private readonly entryEndMs: number;
	private readonly endBufferMs: number;

	constructor(config: SessionConfig) {
		this.offsetMs = config.utcOffsetMinutes * MINUTE_MS;
		this.startMs = config.startMinute * MINUTE_MS;
		this.endMs = config.endMinute * MINUTE_MS;
		this.entryStartMs = (config.startMinute + config.startBufferMinutes) * MINUTE_MS;
		this.entryEndMs = (config.endMinute - config.endBufferMinutes) * MINUTE_MS;
		this.endBufferMs = config.endBufferMinutes * MINUTE_MS;
	}

	/** Milliseconds since local midnight. */
	timeOfDayMs(timestampMs: number): number {
		const local = timestampMs + this.offsetMs;
		return ((local % DAY_MS) + DAY_MS) % DAY_MS;
	}

	/** Local calendar day number; changes at local midnight. */
	dayKey(timestampMs: number): number {
		return Math.floor((timestampMs + this.offsetMs) / DAY_MS);
	}

	inSession(timestampMs: number): boolean {
		const t = this.timeOfDayMs(timestampMs);
		return t >= this.startMs && t < this.endMs;
	}

	/** Inside the session with both entry buffers applied. */
	inEntryWindow(timestampMs: number): boolean {
		const t = this.timeOfDayMs(timestampMs);
		return t >= this.entryStartMs && t < this.entryEndMs;
	}

	/** Time left until the session closes; negative once it has. */
	msToSessionEnd(timestampMs: number): number {
		return this.endMs - this.timeOfDayMs(timestampMs);
	}

	/** True once fewer than the end-buffer minutes remain, or the session is over. */
	inClosingBuffer(timestampMs: number): boolean {
		return this.msToSessionEnd(timestampMs) < this.endBufferMs || !this.inSession(timestampMs);
	}
}

import type { WarmupState } from "./types.js";

/**
 * Counts ticks until the indicators have enough history. Completion is
 * one-way: once set it stays set for the session.
 */
export class WarmupTracker {
	private readonly required: number;
	private ticksSeen = 0;
	private done = false;

	constructor(required: number) {
		if (!Number.isInteger(required) || required < 1) {
			throw new RangeError(`Warm-up tick count must be a positive integer, got ${required}`);
		}
		this.required = required;
	}

	/** Count one tick. True only for the tick that completes warm-up. */
	record(): boolean {
		this.ticksSeen++;
		if (this.done || this.ticksSeen < this.required) return false;
		this.done = true;
		return true;
	}

	get complete(): boolean {
		return this.done;
	}

	state(): WarmupState {
		return { ticksSeen: this.ticksSeen, required: this.required, complete: this.done };
	}
}

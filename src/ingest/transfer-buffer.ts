/**
 * TransferBuffer — fixed-capacity single-producer/single-consumer ring.
 *
 * The producer owns `writeIndex`, the consumer owns `readIndex`; neither side
 * writes the other's index. The ring is full when advancing the write index
 * would land on the read index, so one slot always stays empty. The slot array
 * is allocated one larger than the requested capacity, which makes
 * `capacity` the number of items the buffer actually holds.
 *
 * Each push and pop runs to completion on the event loop, so no lock is
 * needed between the two sides.
 */

export class TransferBuffer<T extends NonNullable<unknown>> {
	private readonly slots: (T | null)[];
	private writeIndex = 0;
	private readIndex = 0;
	private waiter: { promise: Promise<void>; resolve: () => void } | null = null;

	constructor(capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`TransferBuffer capacity must be a positive integer, got ${capacity}`);
		}
		this.slots = new Array<T | null>(capacity + 1).fill(null);
	}

	/** Number of items the buffer holds when full. */
	get capacity(): number {
		return this.slots.length - 1;
	}

	// ── Producer side ──────────────────────────────────────────────

	/** Append without blocking. Returns false, leaving the buffer untouched, when full. */
	push(item: T): boolean {
		const next = (this.writeIndex + 1) % this.slots.length;
		if (next === this.readIndex) return false;

		this.slots[this.writeIndex] = item;
		this.writeIndex = next;
		this.notify();
		return true;
	}

	// ── Consumer side ──────────────────────────────────────────────

	/** Take the oldest item without blocking, or null when empty. */
	pop(): T | null {
		if (this.readIndex === this.writeIndex) return null;

		const item = this.slots[this.readIndex] ?? null;
		this.slots[this.readIndex] = null;
		this.readIndex = (this.readIndex + 1) % this.slots.length;
		return item;
	}

	/**
	 * Resolves as soon as the buffer is non-empty, or when {@link notify} is
	 * called. Concurrent callers share one wake-up.
	 */
	waitForData(): Promise<void> {
		if (!this.isEmpty()) return Promise.resolve();
		if (this.waiter === null) {
			let resolve: () => void = () => {};
			const promise = new Promise<void>((r) => {
				resolve = r;
			});
			this.waiter = { promise, resolve };
		}
		return this.waiter.promise;
	}

	/** Wake a waiting consumer, e.g. on shutdown with nothing left to push. */
	notify(): void {
		const waiter = this.waiter;
		if (waiter === null) return;
		this.waiter = null;
		waiter.resolve();
	}

	// ── Queries ────────────────────────────────────────────────────

	size(): number {
		return (this.writeIndex - this.readIndex + this.slots.length) % this.slots.length;
	}

	isEmpty(): boolean {
		return this.readIndex === this.writeIndex;
	}

	isFull(): boolean {
		return (this.writeIndex + 1) % this.slots.length === this.readIndex;
	}
}

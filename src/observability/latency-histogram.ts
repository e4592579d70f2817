/**
 * Log-scale histogram of per-tick processing latency.
 *
 * 16 buckets on log2 scale: [0-1μs, 1-2μs, 2-4μs, ..., 16384-32768μs, 32768+μs]
 * Percentiles are reported as the upper bound of the bucket they fall in.
 */

const NUM_BUCKETS = 16;
const BUCKET_BOUNDARIES_US: readonly number[] = Array.from({ length: NUM_BUCKETS }, (_, i) => 2 ** i);

export interface LatencySnapshot {
	readonly count: number;
	readonly p50Ms: number;
	readonly p95Ms: number;
	readonly p99Ms: number;
	readonly maxMs: number;
}

export class LatencyHistogram {
	private readonly buckets: number[];
	private samples = 0;
	private maxUs = 0;

	private constructor() {
		this.buckets = new Array<number>(NUM_BUCKETS + 1).fill(0);
	}

	static create(): LatencyHistogram {
		return new LatencyHistogram();
	}

	/** Record a latency sample in microseconds. */
	recordUs(latencyUs: number): void {
		const idx = this.bucketIndex(latencyUs);
		this.buckets[idx] = (this.buckets[idx] ?? 0) + 1;
		this.samples++;
		if (latencyUs > this.maxUs) this.maxUs = latencyUs;
	}

	/** Record the time elapsed since `startNs`, a `process.hrtime.bigint()` reading. */
	recordSince(startNs: bigint, endNs: bigint = process.hrtime.bigint()): void {
		this.recordUs(Number(endNs - startNs) / 1_000);
	}

	get count(): number {
		return this.samples;
	}

	/** Estimate the p-th percentile in milliseconds. Returns 0 if no data. */
	percentileMs(p: number): number {
		if (this.samples === 0) return 0;
		const target = Math.ceil(this.samples * (p / 100));
		let cumulative = 0;

		for (let i = 0; i <= NUM_BUCKETS; i++) {
			cumulative += this.buckets[i] ?? 0;
			if (cumulative >= target) {
				if (i >= NUM_BUCKETS) {
					return ((BUCKET_BOUNDARIES_US[NUM_BUCKETS - 1] ?? 32768) * 2) / 1000;
				}
				return (BUCKET_BOUNDARIES_US[i] ?? 1) / 1000;
			}
		}
		return 0;
	}

	p50(): number {
		return this.percentileMs(50);
	}

	p95(): number {
		return this.percentileMs(95);
	}

	p99(): number {
		return this.percentileMs(99);
	}

	snapshot(): LatencySnapshot {
		return {
			count: this.samples,
			p50Ms: this.p50(),
			p95Ms: this.p95(),
			p99Ms: this.p99(),
			maxMs: this.maxUs / 1000,
		};
	}

	reset(): void {
		this.buckets.fill(0);
		this.samples = 0;
		this.maxUs = 0;
	}

	private bucketIndex(latencyUs: number): number {
		if (latencyUs <= 0) return 0;
		for (let i = 0; i < NUM_BUCKETS; i++) {
			const boundary = BUCKET_BOUNDARIES_US[i];
			if (boundary !== undefined && latencyUs < boundary) return i;
		}
		return NUM_BUCKETS;
	}
}

/**
 * AsyncDiagnosticSink — keeps diagnostic I/O off the tick path.
 *
 * Non-critical events go into a bounded queue drained by one background task
 * scheduled with `setImmediate`; a full queue drops the event and counts it.
 * Critical events skip the queue and are written immediately. A critical
 * write that fails, or that has not completed within `criticalTimeoutMs`,
 * becomes a {@link CriticalLogTimeoutError} handed to `onFatal`.
 */

import { TransferBuffer } from "../ingest/transfer-buffer.js";
import { CriticalLogTimeoutError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import {
	type DiagnosticEvent,
	type DiagnosticLogger,
	type DiagnosticWriter,
	Severity,
	compareSeverity,
} from "./types.js";

export interface AsyncDiagnosticSinkConfig {
	readonly writer: DiagnosticWriter;
	readonly queueCapacity: number;
	readonly criticalTimeoutMs: number;
	readonly onFatal: (error: CriticalLogTimeoutError) => void;
	/** Events below this severity are discarded before queueing. Critical always passes. */
	readonly minSeverity?: Severity;
	readonly clock?: Clock;
}

export interface DiagnosticSinkStats {
	readonly written: number;
	readonly dropped: number;
	readonly writeErrors: number;
	readonly queued: number;
}

type CriticalOutcome = Result<void, CriticalLogTimeoutError>;

export class AsyncDiagnosticSink implements DiagnosticLogger {
	private readonly writer: DiagnosticWriter;
	private readonly queue: TransferBuffer<DiagnosticEvent>;
	private readonly criticalTimeoutMs: number;
	private readonly onFatal: (error: CriticalLogTimeoutError) => void;
	private readonly minSeverity: Severity;
	private readonly clock: Clock;
	private readonly pendingCritical = new Set<Promise<CriticalOutcome>>();
	private drainScheduled = false;
	private draining: Promise<void> = Promise.resolve();
	private closed = false;
	private writtenCount = 0;
	private droppedCount = 0;
	private writeErrorCount = 0;

	constructor(config: AsyncDiagnosticSinkConfig) {
		this.writer = config.writer;
		this.queue = new TransferBuffer(config.queueCapacity);
		this.criticalTimeoutMs = config.criticalTimeoutMs;
		this.onFatal = config.onFatal;
		this.minSeverity = config.minSeverity ?? Severity.Debug;
		this.clock = config.clock ?? SystemClock;
	}

	log(severity: Severity, component: string, message: string, tickSequence: number | null = null): void {
		if (compareSeverity(severity, this.minSeverity) < 0) return;
		const event = this.event(severity, component, message, tickSequence);
		if (severity === Severity.Critical) {
			this.track(this.writeCritical(event));
			return;
		}
		if (this.closed || !this.queue.push(event)) {
			this.droppedCount++;
			return;
		}
		this.scheduleDrain();
	}

	/**
	 * Record a critical event and hand back the bounded write. The promise
	 * never rejects; a failed write resolves to an error result after
	 * `onFatal` has been told.
	 */
	critical(component: string, message: string, tickSequence: number | null = null): Promise<CriticalOutcome> {
		return this.track(this.writeCritical(this.event(Severity.Critical, component, message, tickSequence)));
	}

	/** Wait until the queue is empty and every critical write has settled. */
	async flush(): Promise<void> {
		while (this.drainScheduled || !this.queue.isEmpty() || this.pendingCritical.size > 0) {
			if (!this.drainScheduled && !this.queue.isEmpty()) this.scheduleDrain();
			await Promise.all([this.draining, ...this.pendingCritical]);
			await new Promise<void>((resolve) => setImmediate(resolve));
		}
	}

	/** Flush, then refuse further events. Later non-critical events count as dropped. */
	async close(): Promise<void> {
		await this.flush();
		this.closed = true;
	}

	stats(): DiagnosticSinkStats {
		return {
			written: this.writtenCount,
			dropped: this.droppedCount,
			writeErrors: this.writeErrorCount,
			queued: this.queue.size(),
		};
	}

	// ── Internals ──────────────────────────────────────────────────

	private event(
		severity: Severity,
		component: string,
		message: string,
		tickSequence: number | null,
	): DiagnosticEvent {
		return Object.freeze({ severity, component, message, tickSequence, timestampMs: this.clock.now() });
	}

	private scheduleDrain(): void {
		if (this.drainScheduled) return;
		this.drainScheduled = true;
		setImmediate(() => {
			this.draining = this.drain();
		});
	}

	private async drain(): Promise<void> {
		let event = this.queue.pop();
		while (event !== null) {
			try {
				await this.writer.write(event);
				this.writtenCount++;
			} catch {
				this.writeErrorCount++;
			}
			event = this.queue.pop();
		}
		this.drainScheduled = false;
	}

	private track(outcome: Promise<CriticalOutcome>): Promise<CriticalOutcome> {
		const tracked: Promise<CriticalOutcome> = outcome.finally(() => {
			this.pendingCritical.delete(tracked);
		});
		this.pendingCritical.add(tracked);
		return tracked;
	}

	private async writeCritical(event: DiagnosticEvent): Promise<CriticalOutcome> {
		if (this.closed) {
			return this.criticalFailed(event, "diagnostic sink is closed");
		}

		let pending: void | Promise<void>;
		try {
			pending = this.writer.write(event);
		} catch (cause) {
			return this.criticalFailed(event, "critical write failed", cause);
		}
		if (!(pending instanceof Promise)) {
			this.writtenCount++;
			return ok(undefined);
		}

		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<"timeout">((resolve) => {
			timer = setTimeout(() => resolve("timeout"), this.criticalTimeoutMs);
		});
		const written = pending.then(
			() => "written" as const,
			(cause: unknown) => ({ cause }),
		);

		const outcome = await Promise.race([written, timeout]);
		clearTimeout(timer);

		if (outcome === "written") {
			this.writtenCount++;
			return ok(undefined);
		}
		if (outcome === "timeout") {
			return this.criticalFailed(event, `critical write exceeded ${this.criticalTimeoutMs}ms`);
		}
		return this.criticalFailed(event, "critical write failed", outcome.cause);
	}

	private criticalFailed(event: DiagnosticEvent, reason: string, cause?: unknown): CriticalOutcome {
		this.writeErrorCount++;
		const error = new CriticalLogTimeoutError(`Critical diagnostic not recorded: ${reason}`, {
			component: event.component,
			message: event.message,
			tickSequence: event.tickSequence,
			timeoutMs: this.criticalTimeoutMs,
			...(cause !== undefined && { cause }),
		});
		this.onFatal(error);
		return err(error);
	}
}

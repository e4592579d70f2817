/**
 * PushTickSource — live variant of the tick source, driven by channel callbacks.
 *
 * Each inbound message is normalized and emitted synchronously inside the
 * channel callback, which makes the callback the producer context. A dropped
 * connection flips `isActive()` to false, reports a FeedDisconnectedError as a
 * Warning, and resolves `start()`; reconnecting is left to the caller.
 * Transport errors that leave the connection up are reported as Warnings.
 */

import type { DiagnosticLogger } from "../diagnostics/types.js";
import { Severity } from "../diagnostics/types.js";
import { FeedDisconnectedError } from "../shared/errors.js";
import type { InstrumentSymbol } from "../shared/identifiers.js";
import type { LiveChannel } from "./live-channel.js";
import { TickNormalizer } from "./tick-normalizer.js";
import { type TickEmitter, TickOrigin, type TickSource, type TickSourceStats } from "./types.js";

const COMPONENT = "feed.push";

export interface PushTickSourceConfig {
	readonly channel: LiveChannel;
	readonly symbol: InstrumentSymbol;
	readonly diagnostics: DiagnosticLogger;
	readonly priceDivisor?: number;
}

export class PushTickSource implements TickSource {
	readonly kind = TickOrigin.Live;
	private readonly channel: LiveChannel;
	private readonly normalizer: TickNormalizer;
	private readonly diagnostics: DiagnosticLogger;
	private active = false;
	private emitted = 0;
	private lastDisconnect: FeedDisconnectedError | null = null;
	private finish: (() => void) | null = null;
	private unsubscribe: Array<() => void> = [];

	constructor(config: PushTickSourceConfig) {
		this.channel = config.channel;
		this.diagnostics = config.diagnostics;
		this.normalizer = new TickNormalizer({
			symbol: config.symbol,
			origin: TickOrigin.Live,
			...(config.priceDivisor !== undefined && { priceDivisor: config.priceDivisor }),
		});
	}

	/**
	 * Subscribe and connect. Rejects with FeedDisconnectedError when the
	 * channel cannot connect; otherwise resolves when delivery ends.
	 */
	async start(emit: TickEmitter): Promise<void> {
		if (this.active) {
			throw new FeedDisconnectedError("Push source already started");
		}
		this.active = true;
		this.lastDisconnect = null;
		const done = new Promise<void>((resolve) => {
			this.finish = resolve;
		});

		this.unsubscribe = [
			this.channel.onMessage((raw) => this.handleMessage(raw, emit)),
			this.channel.onClose((reason) => this.handleClose(reason)),
			this.channel.onError((error) => {
				this.diagnostics.log(Severity.Warning, COMPONENT, `Feed error: ${error.message}`);
			}),
		];

		try {
			await this.channel.connect();
		} catch (cause) {
			this.end();
			const error = new FeedDisconnectedError("Feed connection failed", { cause });
			this.lastDisconnect = error;
			this.diagnostics.log(Severity.Warning, COMPONENT, error.message);
			throw error;
		}
		return done;
	}

	stop(): void {
		if (!this.active) return;
		this.end();
		this.channel.close();
	}

	isActive(): boolean {
		return this.active;
	}

	/** A live feed has no end of data; it only stops or disconnects. */
	exhausted(): boolean {
		return false;
	}

	stats(): TickSourceStats {
		return { emitted: this.emitted, malformed: this.normalizer.malformed };
	}

	/** The disconnect that ended the last run, if it ended that way. */
	disconnectError(): FeedDisconnectedError | null {
		return this.lastDisconnect;
	}

	private handleMessage(raw: unknown, emit: TickEmitter): void {
		if (!this.active) return;
		const result = this.normalizer.normalize(raw);
		if (!result.ok) {
			this.diagnostics.log(Severity.Debug, COMPONENT, result.error.message);
			return;
		}
		this.emitted++;
		emit(result.value);
	}

	private handleClose(reason: string): void {
		if (!this.active) return;
		const error = new FeedDisconnectedError(`Feed disconnected: ${reason}`, { reason });
		this.lastDisconnect = error;
		this.diagnostics.log(Severity.Warning, COMPONENT, error.message);
		this.end();
	}

	private end(): void {
		this.active = false;
		for (const off of this.unsubscribe) off();
		this.unsubscribe = [];
		const finish = this.finish;
		this.finish = null;
		finish?.();
	}
}

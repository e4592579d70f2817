/**
 * LiveChannel — the transport a push feed subscribes to.
 *
 * Handlers are delivered raw decoded payloads; normalization happens in the
 * source. Registration returns an unsubscribe function.
 */

import { TypedEmitter } from "../lib/events/index.js";

export interface LiveChannel {
	connect(): Promise<void>;
	onMessage(handler: (raw: unknown) => void): () => void;
	onClose(handler: (reason: string) => void): () => void;
	/** Transport errors that do not by themselves end the connection. */
	onError(handler: (error: Error) => void): () => void;
	close(): void;
}

type ChannelEvents = {
	message: (raw: unknown) => void;
	close: (reason: string) => void;
	error: (error: Error) => void;
};

/**
 * In-process channel: whatever is published is delivered synchronously to
 * subscribers. Stands in for a broker connection in tests and simulations.
 */
export class EmitterLiveChannel implements LiveChannel {
	private readonly emitter = new TypedEmitter<ChannelEvents>();
	private connected = false;

	async connect(): Promise<void> {
		this.connected = true;
	}

	onMessage(handler: (raw: unknown) => void): () => void {
		this.emitter.on("message", handler);
		return () => {
			this.emitter.off("message", handler);
		};
	}

	onClose(handler: (reason: string) => void): () => void {
		this.emitter.on("close", handler);
		return () => {
			this.emitter.off("close", handler);
		};
	}

	onError(handler: (error: Error) => void): () => void {
		this.emitter.on("error", handler);
		return () => {
			this.emitter.off("error", handler);
		};
	}

	/** Deliver one payload. Ignored while not connected, like a socket would. */
	publish(raw: unknown): void {
		if (!this.connected) return;
		this.emitter.emit("message", raw);
	}

	/** Simulate the remote end dropping the connection. */
	disconnect(reason = "remote closed"): void {
		if (!this.connected) return;
		this.connected = false;
		this.emitter.emit("close", reason);
	}

	/** Simulate a transport error on a connection that stays up. */
	fail(error: Error): void {
		if (!this.connected) return;
		this.emitter.emit("error", error);
	}

	close(): void {
		this.disconnect("closed by client");
	}

	isConnected(): boolean {
		return this.connected;
	}
}

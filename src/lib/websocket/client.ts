import WebSocket from "ws";
import { NetworkError } from "../../shared/errors.js";
import type { TradingError } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";
import type {
	WsCloseHandler,
	WsConfig,
	WsErrorHandler,
	WsMessageHandler,
	WsState,
} from "./types.js";

function removeFrom<T>(list: T[], item: T): void {
	const index = list.indexOf(item);
	if (index !== -1) list.splice(index, 1);
}

/**
 * WebSocket client wrapper with ping/pong keepalive.
 *
 * Encapsulates the ws library behind a small callback interface. Connection
 * failures reject `connect()` with a NetworkError; sends return a Result.
 */
export class WsClient {
	private readonly config: WsConfig;
	private ws: WebSocket | null = null;
	private state: WsState = "closed";
	private readonly messageHandlers: WsMessageHandler[] = [];
	private readonly closeHandlers: WsCloseHandler[] = [];
	private readonly errorHandlers: WsErrorHandler[] = [];
	private pingTimer: ReturnType<typeof setInterval> | null = null;
	private pongTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(config: WsConfig) {
		this.config = config;
	}

	/** Opens the connection and starts keepalive. Rejects if already connecting or open. */
	connect(): Promise<void> {
		if (this.state !== "closed") {
			return Promise.reject(new NetworkError("WebSocket is already connecting or open"));
		}
		return new Promise<void>((resolve, reject) => {
			this.state = "connecting";
			const ws = new WebSocket(this.config.url, {
				...(this.config.headers !== undefined && { headers: { ...this.config.headers } }),
			});
			this.ws = ws;

			ws.on("open", () => {
				this.state = "open";
				this.startPing();
				resolve();
			});

			ws.on("message", (data) => {
				const message = data.toString();
				for (const handler of [...this.messageHandlers]) {
					handler(message);
				}
			});

			ws.on("close", (code, reason) => {
				this.state = "closed";
				this.ws = null;
				this.clearTimers();
				for (const handler of [...this.closeHandlers]) {
					handler(code, reason.toString());
				}
			});

			ws.on("error", (error) => {
				for (const handler of [...this.errorHandlers]) {
					handler(error);
				}
				if (this.state === "connecting") {
					this.state = "closed";
					this.ws = null;
					this.clearTimers();
					reject(new NetworkError("WebSocket connection failed", { cause: error }));
				}
			});

			ws.on("pong", () => {
				this.clearPongTimeout();
			});
		});
	}

	/** Sends a text frame. */
	send(data: string): Result<void, TradingError> {
		if (this.state !== "open" || this.ws === null) {
			return err(new NetworkError("WebSocket is not connected"));
		}
		try {
			this.ws.send(data);
			return ok(undefined);
		} catch (error) {
			return err(new NetworkError("WebSocket send failed", { cause: error }));
		}
	}

	/** Gracefully closes the connection and clears keepalive timers. */
	close(): void {
		if (this.ws !== null) {
			this.state = "closing";
			this.clearTimers();
			this.ws.close();
		}
	}

	getState(): WsState {
		return this.state;
	}

	onMessage(handler: WsMessageHandler): () => void {
		this.messageHandlers.push(handler);
		return () => removeFrom(this.messageHandlers, handler);
	}

	onClose(handler: WsCloseHandler): () => void {
		this.closeHandlers.push(handler);
		return () => removeFrom(this.closeHandlers, handler);
	}

	onError(handler: WsErrorHandler): () => void {
		this.errorHandlers.push(handler);
		return () => removeFrom(this.errorHandlers, handler);
	}

	private startPing(): void {
		this.pingTimer = setInterval(() => {
			if (this.ws !== null && this.state === "open") {
				this.ws.ping();
				this.pongTimer = setTimeout(() => {
					this.ws?.terminate();
				}, this.config.pongTimeoutMs);
			}
		}, this.config.pingIntervalMs);
	}

	private clearTimers(): void {
		if (this.pingTimer !== null) {
			clearInterval(this.pingTimer);
			this.pingTimer = null;
		}
		this.clearPongTimeout();
	}

	private clearPongTimeout(): void {
		if (this.pongTimer !== null) {
			clearTimeout(this.pongTimer);
			this.pongTimer = null;
		}
	}
}

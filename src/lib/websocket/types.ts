/**
 * Configuration for the WebSocket client.
 */
export interface WsConfig {
	/** WebSocket server URL (ws:// or wss://) */
	readonly url: string;
	/** Interval between ping frames in milliseconds. */
	readonly pingIntervalMs: number;
	/** Timeout waiting for pong response before terminating connection. */
	readonly pongTimeoutMs: number;
	/** Extra request headers sent with the upgrade, e.g. a feed token. */
	readonly headers?: Readonly<Record<string, string>>;
}

/**
 * WebSocket connection lifecycle state.
 * - `connecting`: Connection in progress
 * - `open`: Connected and ready
 * - `closing`: Close initiated
 * - `closed`: Connection terminated
 */
export type WsState = "connecting" | "open" | "closing" | "closed";

/** Callback invoked with each text frame. */
export type WsMessageHandler = (data: string) => void;

/** Callback invoked when the connection closes. */
export type WsCloseHandler = (code: number, reason: string) => void;

export type WsErrorHandler = (error: Error) => void;

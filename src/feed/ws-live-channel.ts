/**
 * WsLiveChannel — LiveChannel over the WebSocket client.
 *
 * Text frames are decoded as JSON; a frame that is not JSON is handed on as
 * the raw string so the normalizer counts it as malformed. An optional
 * subscription payload is sent once the socket opens.
 */

import { WsClient } from "../lib/websocket/client.js";
import type { WsConfig } from "../lib/websocket/types.js";
import { tryCatch } from "../shared/result.js";
import type { LiveChannel } from "./live-channel.js";

export interface WsLiveChannelConfig extends WsConfig {
	readonly subscribe?: unknown;
}

export class WsLiveChannel implements LiveChannel {
	private readonly client: WsClient;
	private readonly subscribe: unknown;

	constructor(config: WsLiveChannelConfig, client: WsClient = new WsClient(config)) {
		this.client = client;
		this.subscribe = config.subscribe;
	}

	async connect(): Promise<void> {
		await this.client.connect();
		if (this.subscribe !== undefined) {
			const sent = this.client.send(JSON.stringify(this.subscribe));
			if (!sent.ok) throw sent.error;
		}
	}

	onMessage(handler: (raw: unknown) => void): () => void {
		return this.client.onMessage((data) => {
			const decoded = tryCatch((): unknown => JSON.parse(data));
			handler(decoded.ok ? decoded.value : data);
		});
	}

	onClose(handler: (reason: string) => void): () => void {
		return this.client.onClose((code, reason) => handler(reason.length > 0 ? reason : `code ${code}`));
	}

	onError(handler: (error: Error) => void): () => void {
		return this.client.onError(handler);
	}

	close(): void {
		this.client.close();
	}
}

import { createLogger } from "@tickcast/core";
import { parseClientMessage, topicMatches } from "./topics";
import type { HubClient } from "./types";

const hubLogger = createLogger("broadcast:hub");

export interface HubDelivery {
	delivered: number;
	failed: number;
	/** Slow clients disconnected instead of sent to. */
	dropped: number;
}

export interface BroadcastHubOptions {
	maxBufferedBytes?: number;
}

export const MAX_BUFFERED_BYTES = 1_000_000;

/**
 * Tracks connected clients and their topic subscriptions. Transport-free so
 * the WebSocket server and tests share it.
 */
export class BroadcastHub {
	private readonly clients = new Map<HubClient, Set<string>>();
	private readonly maxBufferedBytes: number;

	constructor(options: BroadcastHubOptions = {}) {
		this.maxBufferedBytes = options.maxBufferedBytes ?? MAX_BUFFERED_BYTES;
	}

	add(client: HubClient): void {
		if (!this.clients.has(client)) {
			this.clients.set(client, new Set());
		}
	}

	remove(client: HubClient): void {
		this.clients.delete(client);
	}

	get size(): number {
		return this.clients.size;
	}

	topicsOf(client: HubClient): string[] {
		return Array.from(this.clients.get(client) ?? []).sort();
	}

	/** Applies a control frame from a client. Returns false when it was not understood. */
	handleMessage(client: HubClient, raw: string): boolean {
		const subscriptions = this.clients.get(client);
		const message = parseClientMessage(raw);
		if (!subscriptions || !message) {
			hubLogger.warn("client_message_ignored", {
				reason: subscriptions ? "invalid_message" : "unknown_client",
			});
			return false;
		}
		for (const topic of message.topics) {
			if (message.op === "subscribe") {
				subscriptions.add(topic);
			} else {
				subscriptions.delete(topic);
			}
		}
		return true;
	}

	/**
	 * Sends to every open client subscribed to the topic. A client whose send
	 * buffer is over the limit is terminated and removed instead.
	 */
	deliver(topic: string, payload: string): HubDelivery {
		let delivered = 0;
		let failed = 0;
		let dropped = 0;
		for (const [client, subscriptions] of this.clients) {
			if (!client.isOpen || !topicMatches(subscriptions, topic)) {
				continue;
			}
			if (client.bufferedAmount > this.maxBufferedBytes) {
				dropped += 1;
				this.clients.delete(client);
				hubLogger.warn("client_dropped_slow", {
					topic,
					bufferedAmount: client.bufferedAmount,
				});
				client.terminate();
				continue;
			}
			try {
				client.send(payload);
				delivered += 1;
			} catch (error) {
				failed += 1;
				hubLogger.warn("client_send_failed", {
					topic,
					message: error instanceof Error ? error.message : String(error),
				});
			}
		}
		return { delivered, failed, dropped };
	}

	clear(): void {
		this.clients.clear();
	}
}

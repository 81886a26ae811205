import { createLogger } from "@tickcast/core";
import { topicMatches } from "./topics";
import type { BroadcastChannel } from "./types";

const channelLogger = createLogger("broadcast:memory");

export interface PublishedMessage {
	topic: string;
	payload: string;
}

export type MessageHandler = (message: PublishedMessage) => void;

/** In-process channel for embedding and tests. */
export class InMemoryBroadcastChannel implements BroadcastChannel {
	readonly published: PublishedMessage[] = [];
	private readonly handlers = new Map<MessageHandler, Set<string>>();
	private closed = false;

	async publish(topic: string, payload: string): Promise<void> {
		if (this.closed) {
			throw new Error("Broadcast channel is closed");
		}
		const message = { topic, payload };
		this.published.push(message);
		for (const [handler, topics] of this.handlers) {
			if (!topicMatches(topics, topic)) {
				continue;
			}
			try {
				handler(message);
			} catch (error) {
				channelLogger.error("subscriber_handler_failed", {
					topic,
					message: error instanceof Error ? error.message : String(error),
				});
			}
		}
	}

	subscribe(topics: string[], handler: MessageHandler): () => void {
		this.handlers.set(handler, new Set(topics));
		return () => {
			this.handlers.delete(handler);
		};
	}

	async close(): Promise<void> {
		this.closed = true;
		this.handlers.clear();
	}
}

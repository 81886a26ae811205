import WebSocket from "ws";
import { createLogger } from "@tickcast/core";
import { encodeClientMessage } from "./topics";
import { ALL_TOPICS } from "./types";
import { decodeRecordMessage } from "./wire";
import type { RecordEnvelope } from "./wire";

const subscriberLogger = createLogger("broadcast:subscriber");

export type EnvelopeHandler = (envelope: RecordEnvelope) => void | Promise<void>;

export interface WsBroadcastSubscriberOptions {
	url: string;
	topics?: string[];
	reconnectDelayMs?: number;
}

/**
 * Receives records from the point it connects onward; anything published
 * while disconnected is not replayed.
 */
export class WsBroadcastSubscriber {
	private readonly handlers = new Set<EnvelopeHandler>();
	private readonly topics: string[];
	private readonly reconnectDelayMs: number;
	private ws: WebSocket | null = null;
	private running = false;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;

	constructor(private readonly options: WsBroadcastSubscriberOptions) {
		const topics = (options.topics ?? []).map((topic) => topic.trim()).filter(Boolean);
		this.topics = topics.length ? Array.from(new Set(topics)) : [ALL_TOPICS];
		this.reconnectDelayMs = Math.max(options.reconnectDelayMs ?? 1_000, 100);
	}

	onRecord(handler: EnvelopeHandler): () => void {
		this.handlers.add(handler);
		return () => this.handlers.delete(handler);
	}

	start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		this.connect();
	}

	stop(): void {
		if (!this.running) {
			return;
		}
		this.running = false;
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
		this.cleanupWs();
	}

	/** Subscription frame sent on every (re)connect. */
	subscriptionMessage(): string {
		return encodeClientMessage({ op: "subscribe", topics: this.topics });
	}

	/** Decodes one frame and fans it out to the handlers. */
	async receive(raw: string): Promise<void> {
		let envelope: RecordEnvelope;
		try {
			envelope = decodeRecordMessage(raw);
		} catch (error) {
			subscriberLogger.warn("subscriber_message_rejected", {
				message: error instanceof Error ? error.message : String(error),
			});
			return;
		}
		for (const handler of this.handlers) {
			try {
				await handler(envelope);
			} catch (error) {
				subscriberLogger.error("subscriber_handler_failed", {
					topic: envelope.topic,
					message: error instanceof Error ? error.message : String(error),
				});
			}
		}
	}

	private connect(): void {
		if (!this.running) {
			return;
		}
		const ws = new WebSocket(this.options.url);
		this.ws = ws;

		ws.on("open", () => {
			ws.send(this.subscriptionMessage());
			subscriberLogger.info("subscriber_connected", {
				url: this.options.url,
				topics: this.topics,
			});
		});

		ws.on("message", (payload) => {
			void this.receive(payload.toString());
		});

		ws.on("close", () => {
			subscriberLogger.warn("subscriber_disconnected", { url: this.options.url });
			this.scheduleReconnect();
		});

		ws.on("error", (error) => {
			subscriberLogger.error("subscriber_socket_error", {
				url: this.options.url,
				message: error.message,
			});
		});
	}

	private scheduleReconnect(): void {
		if (!this.running || this.reconnectTimer) {
			return;
		}
		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.cleanupWs();
			this.connect();
		}, this.reconnectDelayMs);
	}

	private cleanupWs(): void {
		if (!this.ws) {
			return;
		}
		// The error listener stays so a handshake aborted by terminate() is logged.
		for (const event of ["open", "message", "close"] as const) {
			this.ws.removeAllListeners(event);
		}
		this.ws.terminate();
		this.ws = null;
	}
}

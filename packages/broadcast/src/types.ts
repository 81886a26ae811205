/**
 * One-way fan-out capability: the collector publishes, it never learns who
 * (if anyone) received a message.
 */
export interface BroadcastChannel {
	publish(topic: string, payload: string): Promise<void>;
	close(): Promise<void>;
}

export interface HubClient {
	readonly isOpen: boolean;
	/** Bytes queued on the socket and not yet written. */
	readonly bufferedAmount: number;
	send(payload: string): void;
	/** Drops the connection without a closing handshake. */
	terminate(): void;
}

export type ClientMessage =
	| { op: "subscribe"; topics: string[] }
	| { op: "unsubscribe"; topics: string[] };

/** Topic that matches every published topic. */
export const ALL_TOPICS = "*";

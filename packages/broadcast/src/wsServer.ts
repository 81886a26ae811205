import WebSocket, { WebSocketServer } from "ws";
import { createLogger } from "@tickcast/core";
import { BroadcastHub } from "./hub";
import type { BroadcastChannel, HubClient } from "./types";

const serverLogger = createLogger("broadcast:ws");

export interface WsBroadcastServerOptions {
	host: string;
	port: number;
	maxBufferedBytes?: number;
}

export class WsBroadcastServer implements BroadcastChannel {
	private readonly hub: BroadcastHub;
	private server: WebSocketServer | null = null;

	constructor(private readonly options: WsBroadcastServerOptions) {
		this.hub = new BroadcastHub({ maxBufferedBytes: options.maxBufferedBytes });
	}

	/** Resolves once listening; rejects when the port cannot be bound. */
	start(): Promise<void> {
		if (this.server) {
			return Promise.reject(new Error("Broadcast server already started"));
		}
		return new Promise((resolve, reject) => {
			const server = new WebSocketServer({
				host: this.options.host,
				port: this.options.port,
			});

			const onStartupError = (error: Error) => {
				server.removeAllListeners();
				reject(error);
			};

			server.once("error", onStartupError);
			server.once("listening", () => {
				server.off("error", onStartupError);
				server.on("error", (error) => {
					serverLogger.error("broadcast_server_error", {
						message: error.message,
					});
				});
				server.on("connection", (socket) => this.attach(socket));
				this.server = server;
				serverLogger.info("broadcast_server_listening", {
					host: this.options.host,
					port: this.port,
				});
				resolve();
			});
		});
	}

	/** Bound port, or the configured one before start. */
	get port(): number {
		const address = this.server?.address();
		return address && typeof address === "object" ? address.port : this.options.port;
	}

	get clientCount(): number {
		return this.hub.size;
	}

	async publish(topic: string, payload: string): Promise<void> {
		if (!this.server) {
			throw new Error("Broadcast server is not listening");
		}
		const { delivered, failed, dropped } = this.hub.deliver(topic, payload);
		serverLogger.debug("broadcast_published", { topic, delivered, failed, dropped });
	}

	async close(): Promise<void> {
		const server = this.server;
		if (!server) {
			return;
		}
		this.server = null;
		for (const socket of server.clients) {
			socket.terminate();
		}
		this.hub.clear();
		await new Promise<void>((resolve, reject) => {
			server.close((error) => (error ? reject(error) : resolve()));
		});
		serverLogger.info("broadcast_server_closed", { port: this.options.port });
	}

	private attach(socket: WebSocket): void {
		const client: HubClient = {
			get isOpen() {
				return socket.readyState === WebSocket.OPEN;
			},
			get bufferedAmount() {
				return socket.bufferedAmount;
			},
			send: (payload) => socket.send(payload),
			terminate: () => socket.terminate(),
		};
		this.hub.add(client);
		serverLogger.info("subscriber_connected", { clients: this.hub.size });

		socket.on("message", (data) => {
			this.hub.handleMessage(client, data.toString());
		});
		socket.on("close", () => {
			this.hub.remove(client);
			serverLogger.info("subscriber_disconnected", { clients: this.hub.size });
		});
		socket.on("error", (error) => {
			serverLogger.warn("subscriber_error", { message: error.message });
		});
	}
}

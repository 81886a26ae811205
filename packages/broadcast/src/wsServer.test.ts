import type { OhlcvRecord } from "@tickcast/core";
import WebSocket from "ws";
import { afterEach, describe, expect, it, vi } from "vitest";
import { encodeClientMessage } from "./topics";
import { encodeRecordMessage } from "./wire";
import { WsBroadcastServer } from "./wsServer";

const record = (instrument: string): OhlcvRecord => ({
	instrument,
	timeframe: "1d",
	timestamp: Date.UTC(2026, 9, 19),
	open: 10,
	high: 12,
	low: 9,
	close: 11,
	volume: 1_000,
});

const connect = (port: number): Promise<WebSocket> =>
	new Promise((resolve, reject) => {
		const socket = new WebSocket(`ws://127.0.0.1:${port}`);
		socket.once("open", () => resolve(socket));
		socket.once("error", reject);
	});

describe("WsBroadcastServer", () => {
	const cleanup: Array<() => Promise<void>> = [];

	afterEach(async () => {
		for (const step of cleanup.splice(0).reverse()) {
			await step();
		}
	});

	it("refuses to start on a port that is already bound", async () => {
		const server = new WsBroadcastServer({ host: "127.0.0.1", port: 0 });
		await server.start();
		cleanup.push(() => server.close());

		expect(server.port).toBeGreaterThan(0);
		const rival = new WsBroadcastServer({ host: "127.0.0.1", port: server.port });
		await expect(rival.start()).rejects.toMatchObject({ code: "EADDRINUSE" });
	});

	it("sends a subscriber only the topics it asked for", async () => {
		const server = new WsBroadcastServer({ host: "127.0.0.1", port: 0 });
		await server.start();
		cleanup.push(() => server.close());
		const socket = await connect(server.port);
		cleanup.push(async () => {
			socket.terminate();
		});
		const received: string[] = [];
		socket.on("message", (data) => {
			received.push(data.toString());
		});
		const aaa = encodeRecordMessage("AAA", record("AAA"));
		const bbb = encodeRecordMessage("BBB", record("BBB"));

		await vi.waitFor(() => {
			expect(server.clientCount).toBe(1);
		});
		socket.send(encodeClientMessage({ op: "subscribe", topics: ["AAA"] }));
		await vi.waitFor(async () => {
			await server.publish("BBB", bbb);
			await server.publish("AAA", aaa);
			expect(received.length).toBeGreaterThan(0);
		});

		expect(new Set(received)).toEqual(new Set([aaa]));
	});

	it("rejects publishes once closed", async () => {
		const server = new WsBroadcastServer({ host: "127.0.0.1", port: 0 });
		await server.start();
		await server.close();

		expect(server.clientCount).toBe(0);
		await expect(server.publish("AAA", "payload")).rejects.toThrowError(
			"Broadcast server is not listening"
		);
	});
});

import { describe, expect, it } from "vitest";
import { BroadcastHub } from "./hub";
import { parseClientMessage, topicForInstrument } from "./topics";
import type { HubClient } from "./types";

class FakeClient implements HubClient {
	readonly received: string[] = [];
	isOpen = true;
	failing = false;
	bufferedAmount = 0;
	terminated = false;

	send(payload: string): void {
		if (this.failing) {
			throw new Error("socket gone");
		}
		this.received.push(payload);
	}

	terminate(): void {
		this.terminated = true;
		this.isOpen = false;
	}
}

const subscribe = (...topics: string[]) => JSON.stringify({ op: "subscribe", topics });

describe("topics", () => {
	it("derives the topic from the trimmed instrument id", () => {
		expect(topicForInstrument("  AAA ")).toBe("AAA");
		expect(() => topicForInstrument("   ")).toThrowError(
			"Instrument id must not be empty"
		);
	});

	it("parses control frames", () => {
		expect(parseClientMessage(subscribe(" AAA ", "", "BBB"))).toEqual({
			op: "subscribe",
			topics: ["AAA", "BBB"],
		});
		expect(
			parseClientMessage(JSON.stringify({ op: "unsubscribe", topics: ["AAA"] }))
		).toEqual({ op: "unsubscribe", topics: ["AAA"] });
		expect(parseClientMessage("{")).toBeNull();
		expect(parseClientMessage(JSON.stringify({ op: "publish", topics: [] }))).toBeNull();
		expect(parseClientMessage(JSON.stringify({ op: "subscribe", topics: [1] }))).toBeNull();
	});
});

describe("BroadcastHub", () => {
	it("delivers only to clients subscribed to the topic", () => {
		const hub = new BroadcastHub();
		const aaa = new FakeClient();
		const bbb = new FakeClient();
		const idle = new FakeClient();
		[aaa, bbb, idle].forEach((client) => hub.add(client));
		hub.handleMessage(aaa, subscribe("AAA"));
		hub.handleMessage(bbb, subscribe("BBB"));

		expect(hub.deliver("AAA", "payload-a")).toEqual({
			delivered: 1,
			failed: 0,
			dropped: 0,
		});
		expect(aaa.received).toEqual(["payload-a"]);
		expect(bbb.received).toEqual([]);
		expect(idle.received).toEqual([]);
	});

	it("treats * as every topic", () => {
		const hub = new BroadcastHub();
		const all = new FakeClient();
		hub.add(all);
		hub.handleMessage(all, subscribe("*"));

		hub.deliver("AAA", "a");
		hub.deliver("BBB", "b");

		expect(all.received).toEqual(["a", "b"]);
	});

	it("stops delivering after unsubscribe and removal", () => {
		const hub = new BroadcastHub();
		const client = new FakeClient();
		hub.add(client);
		hub.handleMessage(client, subscribe("AAA", "BBB"));
		hub.handleMessage(client, JSON.stringify({ op: "unsubscribe", topics: ["AAA"] }));

		expect(hub.topicsOf(client)).toEqual(["BBB"]);
		hub.deliver("AAA", "a");
		hub.remove(client);
		hub.deliver("BBB", "b");

		expect(client.received).toEqual([]);
		expect(hub.size).toBe(0);
	});

	it("skips closed clients and counts send failures", () => {
		const hub = new BroadcastHub();
		const closed = new FakeClient();
		const broken = new FakeClient();
		const healthy = new FakeClient();
		[closed, broken, healthy].forEach((client) => {
			hub.add(client);
			hub.handleMessage(client, subscribe("AAA"));
		});
		closed.isOpen = false;
		broken.failing = true;

		expect(hub.deliver("AAA", "a")).toEqual({
			delivered: 1,
			failed: 1,
			dropped: 0,
		});
		expect(healthy.received).toEqual(["a"]);
	});

	it("disconnects a subscriber whose send buffer is over the limit", () => {
		const hub = new BroadcastHub({ maxBufferedBytes: 1_024 });
		const slow = new FakeClient();
		const fast = new FakeClient();
		[slow, fast].forEach((client) => {
			hub.add(client);
			hub.handleMessage(client, subscribe("AAA"));
		});
		slow.bufferedAmount = 4_096;

		expect(hub.deliver("AAA", "a")).toEqual({ delivered: 1, failed: 0, dropped: 1 });
		expect(slow.terminated).toBe(true);
		expect(slow.received).toEqual([]);
		expect(fast.received).toEqual(["a"]);
		expect(hub.size).toBe(1);

		expect(hub.deliver("AAA", "b")).toEqual({ delivered: 1, failed: 0, dropped: 0 });
	});

	it("keeps sending to a subscriber exactly at the limit", () => {
		const hub = new BroadcastHub({ maxBufferedBytes: 1_024 });
		const client = new FakeClient();
		hub.add(client);
		hub.handleMessage(client, subscribe("AAA"));
		client.bufferedAmount = 1_024;

		expect(hub.deliver("AAA", "a")).toEqual({ delivered: 1, failed: 0, dropped: 0 });
		expect(client.terminated).toBe(false);
	});

	it("ignores frames it does not understand", () => {
		const hub = new BroadcastHub();
		const client = new FakeClient();
		hub.add(client);

		expect(hub.handleMessage(client, "hello")).toBe(false);
		expect(hub.handleMessage(new FakeClient(), subscribe("AAA"))).toBe(false);
		expect(hub.topicsOf(client)).toEqual([]);
	});
});

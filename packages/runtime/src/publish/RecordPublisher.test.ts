import { PublishFailureError } from "@tickcast/core";
import { InMemoryBroadcastChannel, decodeRecordMessage } from "@tickcast/broadcast";
import { describe, expect, it } from "vitest";
import { MON_BAR, bar } from "../__tests__/harness";
import { RecordPublisher } from "./RecordPublisher";

describe("RecordPublisher", () => {
	it("publishes on the instrument topic", async () => {
		const channel = new InMemoryBroadcastChannel();
		const publisher = new RecordPublisher(channel);

		const result = await publisher.publish(bar("AAA", MON_BAR, 12));

		expect(result).toEqual({ ok: true, topic: "AAA" });
		expect(channel.published).toHaveLength(1);
		expect(decodeRecordMessage(channel.published[0]?.payload ?? "")).toMatchObject({
			topic: "AAA",
			timestamp: "2026-10-19",
			close: 12,
		});
	});

	it("uses one trimmed topic for the channel and the envelope", async () => {
		const channel = new InMemoryBroadcastChannel();
		const publisher = new RecordPublisher(channel);

		const result = await publisher.publish(bar(" AAA  ", MON_BAR));

		expect(result).toEqual({ ok: true, topic: "AAA" });
		expect(channel.published[0]?.topic).toBe("AAA");
		expect(decodeRecordMessage(channel.published[0]?.payload ?? "")).toMatchObject({
			topic: "AAA",
		});
	});

	it("reports a blank instrument id as a publish failure", async () => {
		const channel = new InMemoryBroadcastChannel();
		const publisher = new RecordPublisher(channel);

		const result = await publisher.publish(bar("   ", MON_BAR));

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.topic).toBe("");
			expect(result.error.message).toBe("Instrument id must not be empty");
		}
		expect(channel.published).toEqual([]);
	});

	it("returns a publish failure instead of throwing", async () => {
		const channel = new InMemoryBroadcastChannel();
		await channel.close();
		const publisher = new RecordPublisher(channel);

		const result = await publisher.publish(bar("AAA", MON_BAR));

		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.topic).toBe("AAA");
			expect(result.error).toBeInstanceOf(PublishFailureError);
			expect(result.error.message).toBe("Broadcast channel is closed");
		}
	});
});

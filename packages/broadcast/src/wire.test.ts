import type { OhlcvRecord } from "@tickcast/core";
import { describe, expect, it } from "vitest";
import {
	decodeRecordMessage,
	encodeRecordMessage,
	envelopeToRecord,
	formatWireTimestamp,
} from "./wire";

const dailyRecord: OhlcvRecord = {
	instrument: "AAA",
	timeframe: "1d",
	timestamp: Date.UTC(2026, 9, 16),
	open: 10.5,
	high: 11,
	low: 10,
	close: 10.75,
	volume: 12_000,
};

describe("formatWireTimestamp", () => {
	it("uses a calendar date for day timeframes", () => {
		expect(formatWireTimestamp(Date.UTC(2026, 9, 16), "1d")).toBe("2026-10-16");
	});

	it("uses ISO-8601 for intraday timeframes", () => {
		expect(formatWireTimestamp(Date.UTC(2026, 9, 16, 14), "1h")).toBe(
			"2026-10-16T14:00:00.000Z"
		);
	});
});

describe("record envelope", () => {
	it("encodes the versioned envelope", () => {
		expect(JSON.parse(encodeRecordMessage("AAA", dailyRecord))).toEqual({
			schema: "tickcast.ohlcv",
			version: 1,
			topic: "AAA",
			instrument: "AAA",
			timeframe: "1d",
			timestamp: "2026-10-16",
			ts: Date.UTC(2026, 9, 16),
			open: 10.5,
			high: 11,
			low: 10,
			close: 10.75,
			volume: 12_000,
		});
	});

	it("decodes back to the record", () => {
		const envelope = decodeRecordMessage(encodeRecordMessage("AAA", dailyRecord));
		expect(envelopeToRecord(envelope)).toEqual(dailyRecord);
	});

	it("rejects other schemas and versions", () => {
		const payload = JSON.parse(encodeRecordMessage("AAA", dailyRecord));
		expect(() =>
			decodeRecordMessage(JSON.stringify({ ...payload, version: 2 }))
		).toThrowError("Unsupported broadcast envelope tickcast.ohlcv@2");
		expect(() =>
			decodeRecordMessage(JSON.stringify({ ...payload, schema: "other" }))
		).toThrowError("Unsupported broadcast envelope other@1");
	});

	it("rejects malformed fields", () => {
		const payload = JSON.parse(encodeRecordMessage("AAA", dailyRecord));
		expect(() => decodeRecordMessage("not json")).toThrowError(
			"Broadcast message is not valid JSON"
		);
		expect(() => decodeRecordMessage("[1]")).toThrowError(
			"Broadcast message must be a JSON object"
		);
		expect(() =>
			decodeRecordMessage(JSON.stringify({ ...payload, close: "10" }))
		).toThrowError("Broadcast envelope field close must be a finite number");
		expect(() =>
			decodeRecordMessage(JSON.stringify({ ...payload, topic: 7 }))
		).toThrowError("Broadcast envelope field topic must be a string");
	});
});

import { isDayTimeframe } from "@tickcast/core";
import type { OhlcvRecord } from "@tickcast/core";

export const WIRE_SCHEMA = "tickcast.ohlcv";
export const WIRE_VERSION = 1;

export interface RecordEnvelope {
	schema: typeof WIRE_SCHEMA;
	version: typeof WIRE_VERSION;
	topic: string;
	instrument: string;
	timeframe: string;
	/** YYYY-MM-DD for day timeframes, ISO-8601 UTC otherwise. */
	timestamp: string;
	ts: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

const NUMERIC_FIELDS = ["ts", "open", "high", "low", "close", "volume"] as const;
const STRING_FIELDS = ["topic", "instrument", "timeframe", "timestamp"] as const;

export const formatWireTimestamp = (ts: number, timeframe: string): string => {
	const iso = new Date(ts).toISOString();
	return isDayTimeframe(timeframe) ? iso.slice(0, 10) : iso;
};

export const toRecordEnvelope = (
	topic: string,
	record: OhlcvRecord
): RecordEnvelope => ({
	schema: WIRE_SCHEMA,
	version: WIRE_VERSION,
	topic,
	instrument: record.instrument,
	timeframe: record.timeframe,
	timestamp: formatWireTimestamp(record.timestamp, record.timeframe),
	ts: record.timestamp,
	open: record.open,
	high: record.high,
	low: record.low,
	close: record.close,
	volume: record.volume,
});

export const encodeRecordMessage = (topic: string, record: OhlcvRecord): string =>
	JSON.stringify(toRecordEnvelope(topic, record));

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const decodeRecordMessage = (raw: string): RecordEnvelope => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		throw new Error("Broadcast message is not valid JSON", { cause: error });
	}
	if (!isRecord(parsed)) {
		throw new Error("Broadcast message must be a JSON object");
	}
	if (parsed.schema !== WIRE_SCHEMA || parsed.version !== WIRE_VERSION) {
		throw new Error(
			`Unsupported broadcast envelope ${String(parsed.schema)}@${String(parsed.version)}`
		);
	}
	const strings: Record<(typeof STRING_FIELDS)[number], string> = {
		topic: "",
		instrument: "",
		timeframe: "",
		timestamp: "",
	};
	for (const field of STRING_FIELDS) {
		const value = parsed[field];
		if (typeof value !== "string") {
			throw new Error(`Broadcast envelope field ${field} must be a string`);
		}
		strings[field] = value;
	}
	const numbers: Record<(typeof NUMERIC_FIELDS)[number], number> = {
		ts: 0,
		open: 0,
		high: 0,
		low: 0,
		close: 0,
		volume: 0,
	};
	for (const field of NUMERIC_FIELDS) {
		const value = parsed[field];
		if (typeof value !== "number" || !Number.isFinite(value)) {
			throw new Error(`Broadcast envelope field ${field} must be a finite number`);
		}
		numbers[field] = value;
	}
	return {
		schema: WIRE_SCHEMA,
		version: WIRE_VERSION,
		...strings,
		...numbers,
	};
};

export const envelopeToRecord = (envelope: RecordEnvelope): OhlcvRecord => ({
	instrument: envelope.instrument,
	timeframe: envelope.timeframe,
	timestamp: envelope.ts,
	open: envelope.open,
	high: envelope.high,
	low: envelope.low,
	close: envelope.close,
	volume: envelope.volume,
});

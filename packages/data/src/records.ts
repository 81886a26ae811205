import type { OhlcvRecord } from "@tickcast/core";
import type { FirstFetchPolicy } from "./types";

const PRICE_FIELDS = ["open", "high", "low", "close"] as const;

/** Returns the reason a row is unusable, or null. */
export const invalidRecordReason = (record: OhlcvRecord): string | null => {
	if (!Number.isFinite(record.timestamp) || record.timestamp < 0) {
		return "timestamp";
	}
	for (const field of PRICE_FIELDS) {
		if (!Number.isFinite(record[field])) {
			return field;
		}
	}
	if (!Number.isFinite(record.volume) || record.volume < 0) {
		return "volume";
	}
	if (record.high < record.low) {
		return "high_below_low";
	}
	return null;
};

export interface SelectRecordsResult {
	records: OhlcvRecord[];
	rejected: number;
}

/**
 * Keeps valid, closed rows newer than the watermark, one per timestamp (last
 * row wins), ascending and frozen. Rows opening at or after `openFrom` are
 * bars still in progress. Without a watermark only the newest closed row is
 * kept unless `firstFetch` is "all".
 */
export const selectNewRecords = (
	rows: readonly OhlcvRecord[],
	instrument: string,
	timeframe: string,
	lastObservedAt: number | undefined,
	firstFetch: FirstFetchPolicy,
	openFrom: number
): SelectRecordsResult => {
	const byTimestamp = new Map<number, OhlcvRecord>();
	let rejected = 0;
	for (const row of rows) {
		if (invalidRecordReason(row)) {
			rejected += 1;
			continue;
		}
		if (lastObservedAt !== undefined && row.timestamp <= lastObservedAt) {
			continue;
		}
		if (row.timestamp >= openFrom) {
			continue;
		}
		byTimestamp.set(row.timestamp, { ...row, instrument, timeframe });
	}

	let records = Array.from(byTimestamp.values()).sort(
		(a, b) => a.timestamp - b.timestamp
	);
	if (lastObservedAt === undefined && firstFetch === "latest") {
		records = records.slice(-1);
	}
	return { records: records.map((record) => Object.freeze(record)), rejected };
};

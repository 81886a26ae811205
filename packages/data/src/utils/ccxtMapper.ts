import type { OHLCV } from "ccxt";
import type { OhlcvRecord } from "@tickcast/core";

/**
 * Maps one ccxt OHLCV row to a record. A missing timestamp or price becomes
 * NaN so the fetcher's validation rejects the row; a missing volume is read
 * as 0, since some venues omit it.
 */
export const mapCcxtRowToRecord = (
	row: OHLCV,
	instrument: string,
	timeframe: string
): OhlcvRecord => {
	const [timestamp, open, high, low, close, volume] = row;
	return {
		instrument,
		timeframe,
		timestamp: Number(timestamp ?? Number.NaN),
		open: Number(open ?? Number.NaN),
		high: Number(high ?? Number.NaN),
		low: Number(low ?? Number.NaN),
		close: Number(close ?? Number.NaN),
		volume: Number(volume ?? 0),
	};
};

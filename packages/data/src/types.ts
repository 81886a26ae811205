import type { FirstFetchPolicy, OhlcvRecord, RateBudget } from "@tickcast/core";

export interface DataLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface OhlcvRequest {
	instrument: string;
	timeframe: string;
	/** Only bars at or after this epoch ms are requested. */
	since?: number;
	limit?: number;
}

/**
 * The single capability the collector needs from a data vendor. Implementations
 * throw the fetch error taxonomy from @tickcast/core.
 */
export interface OhlcvProvider {
	readonly name: string;
	fetchOHLCV(request: OhlcvRequest): Promise<OhlcvRecord[]>;
}

export interface RateLimiter {
	acquire(): Promise<void>;
	budget(now?: number): RateBudget;
}

export interface RetryPolicy {
	maxAttempts: number;
	providerErrorAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	rateLimitBackoffMultiplier: number;
}

export interface FetchTarget {
	id: string;
	lastObservedAt?: number;
}

export interface Fetcher {
	/**
	 * Closed bars newer than the watermark. Rows opening at or after `openFrom`
	 * are still in progress and are left for a later pass; without it, bars
	 * closing after the fetcher's clock are dropped.
	 */
	fetch(
		instrument: FetchTarget,
		timeframe: string,
		openFrom?: number
	): Promise<OhlcvRecord[]>;
}

export type { FirstFetchPolicy };

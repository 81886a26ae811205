import {
	FetchFailedError,
	isFetchErrorKind,
	sleep as defaultSleep,
	systemClock,
	timeframeToMs,
	toCollectorError,
} from "@tickcast/core";
import type { Clock, FetchErrorKind, OhlcvRecord, Sleep } from "@tickcast/core";
import { selectNewRecords } from "./records";
import type {
	DataLogger,
	Fetcher,
	FetchTarget,
	FirstFetchPolicy,
	OhlcvProvider,
	RateLimiter,
	RetryPolicy,
} from "./types";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	maxAttempts: 3,
	providerErrorAttempts: 2,
	baseDelayMs: 1_000,
	maxDelayMs: 30_000,
	rateLimitBackoffMultiplier: 4,
};

export interface RetryingFetcherOptions {
	provider: OhlcvProvider;
	rateLimiter: RateLimiter;
	retry?: Partial<RetryPolicy>;
	firstFetch?: FirstFetchPolicy;
	limitPerRequest?: number;
	sleep?: Sleep;
	clock?: Clock;
	logger?: DataLogger;
}

export class RetryingFetcher implements Fetcher {
	private readonly retry: RetryPolicy;
	private readonly firstFetch: FirstFetchPolicy;
	private readonly sleep: Sleep;
	private readonly clock: Clock;

	constructor(private readonly options: RetryingFetcherOptions) {
		this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
		this.firstFetch = options.firstFetch ?? "latest";
		this.sleep = options.sleep ?? defaultSleep;
		this.clock = options.clock ?? systemClock;
	}

	async fetch(
		instrument: FetchTarget,
		timeframe: string,
		openFrom?: number
	): Promise<OhlcvRecord[]> {
		const cutoff = openFrom ?? this.clock() - timeframeToMs(timeframe) + 1;
		const rows = await this.fetchWithRetry(instrument, timeframe);
		const { records, rejected } = selectNewRecords(
			rows,
			instrument.id,
			timeframe,
			instrument.lastObservedAt,
			this.firstFetch,
			cutoff
		);
		if (rejected > 0) {
			this.options.logger?.warn?.("fetch_rows_rejected", {
				instrument: instrument.id,
				timeframe,
				rejected,
				received: rows.length,
			});
		}
		return records;
	}

	/** Delay before attempt `attempt + 1`; never above `maxDelayMs`. */
	backoffDelay(attempt: number, kind: FetchErrorKind): number {
		const multiplier =
			kind === "RateLimitExceeded" ? this.retry.rateLimitBackoffMultiplier : 1;
		return Math.min(
			this.retry.baseDelayMs * 2 ** (attempt - 1) * multiplier,
			this.retry.maxDelayMs
		);
	}

	private attemptLimit(kind: FetchErrorKind): number {
		switch (kind) {
			case "NotFound":
				return 1;
			case "ProviderError":
				return this.retry.providerErrorAttempts;
			default:
				return this.retry.maxAttempts;
		}
	}

	private async fetchWithRetry(
		instrument: FetchTarget,
		timeframe: string
	): Promise<OhlcvRecord[]> {
		for (let attempt = 1; ; attempt += 1) {
			await this.options.rateLimiter.acquire();
			try {
				return await this.options.provider.fetchOHLCV({
					instrument: instrument.id,
					timeframe,
					since: instrument.lastObservedAt,
					limit: this.options.limitPerRequest,
				});
			} catch (error) {
				const failure = toCollectorError(error);
				const kind = isFetchErrorKind(failure.kind)
					? failure.kind
					: "ProviderError";
				if (attempt >= this.attemptLimit(kind)) {
					throw new FetchFailedError(kind, failure.message, attempt, {
						cause: error,
					});
				}
				const delayMs = this.backoffDelay(attempt, kind);
				this.options.logger?.warn?.("fetch_retry", {
					instrument: instrument.id,
					timeframe,
					kind,
					attempt,
					delayMs,
					message: failure.message,
				});
				await this.sleep(delayMs);
			}
		}
	}
}

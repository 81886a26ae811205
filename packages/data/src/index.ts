export * from "./types";
export { SlidingWindowRateLimiter, estimateCollectionMs } from "./rateLimiter";
export type { SlidingWindowRateLimiterOptions } from "./rateLimiter";
export { RetryingFetcher, DEFAULT_RETRY_POLICY } from "./fetcher";
export type { RetryingFetcherOptions } from "./fetcher";
export { selectNewRecords, invalidRecordReason } from "./records";
export type { SelectRecordsResult } from "./records";
export { mapCcxtRowToRecord } from "./utils/ccxtMapper";

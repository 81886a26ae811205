/**
 * One OHLCV observation. Uniquely keyed by `(instrument, timestamp)`.
 * `timestamp` is the bar open in epoch milliseconds (UTC).
 */
export interface OhlcvRecord {
	readonly instrument: string;
	readonly timeframe: string;
	readonly timestamp: number;
	readonly open: number;
	readonly high: number;
	readonly low: number;
	readonly close: number;
	readonly volume: number;
}

export type CadenceKind =
	| "market-daily"
	| "calendar-daily"
	| "hourly"
	| "market-intraday"
	| "calendar-intraday";

export interface CadenceClass {
	id: string;
	kind: CadenceKind;
	/** Provider granularity requested for member instruments. */
	timeframe: string;
	/** Delay after the nominal instant so the provider has the bar available. */
	offsetMs: number;
	/** calendar-daily / hourly / calendar-intraday only; market kinds use the trading calendar zone. */
	timeZone?: string;
	/** calendar-daily only, "HH:MM". */
	timeOfDay?: string;
	/** market-intraday and calendar-intraday only. */
	intervalMinutes?: number;
}

export type FlagReason = "not_found";

export interface Instrument {
	readonly id: string;
	readonly cadence: string;
	lastObservedAt?: number;
	flagged?: FlagReason;
}

export interface DueCadence {
	cadence: CadenceClass;
	/** Trigger instant (epoch ms) this evaluation fired for. */
	instant: number;
}

export interface RateBudget {
	windowStart: number;
	windowLength: number;
	capacity: number;
	consumed: number;
}

export interface FailureReason {
	kind: string;
	message: string;
	attempts: number;
}

export interface PublishFailureEntry {
	instrument: string;
	timestamp: number;
	topic: string;
	message: string;
}

export interface RunOutcome {
	readonly runId: string;
	readonly startedAt: number;
	readonly finishedAt: number;
	readonly due: ReadonlyArray<{ cadence: string; instant: number }>;
	readonly attempted: readonly string[];
	readonly succeeded: readonly string[];
	readonly failed: Readonly<Record<string, FailureReason>>;
	readonly flagged: readonly string[];
	readonly published: number;
	readonly publishFailures: readonly PublishFailureEntry[];
	readonly interrupted: boolean;
}

/** Persisted collector document. */
export interface CollectorState {
	version: 1;
	watermarks: Record<string, number>;
	lastFired: Record<string, number>;
	flagged: Record<string, FlagReason>;
}

export const createEmptyState = (): CollectorState => ({
	version: 1,
	watermarks: {},
	lastFired: {},
	flagged: {},
});

import { sleep as defaultSleep, systemClock } from "@tickcast/core";
import type { Clock, RateBudget, Sleep } from "@tickcast/core";
import type { RateLimiter } from "./types";

export interface SlidingWindowRateLimiterOptions {
	capacity: number;
	windowMs: number;
	clock?: Clock;
	sleep?: Sleep;
}

/**
 * Rolling-window limiter: at most `capacity` grants inside any interval of
 * `windowMs`. Callers are granted strictly in arrival order.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
	private readonly capacity: number;
	private readonly windowMs: number;
	private readonly clock: Clock;
	private readonly sleep: Sleep;
	private grants: number[] = [];
	private queue: Promise<void> = Promise.resolve();

	constructor(options: SlidingWindowRateLimiterOptions) {
		if (!Number.isInteger(options.capacity) || options.capacity < 1) {
			throw new Error(
				`Rate limiter capacity must be a positive integer, got ${options.capacity}`
			);
		}
		if (!(options.windowMs >= 1)) {
			throw new Error(
				`Rate limiter window must be >= 1ms, got ${options.windowMs}`
			);
		}
		this.capacity = options.capacity;
		this.windowMs = options.windowMs;
		this.clock = options.clock ?? systemClock;
		this.sleep = options.sleep ?? defaultSleep;
	}

	acquire(): Promise<void> {
		const granted = this.queue.then(() => this.grant());
		// A rejected grant is reported to its own caller; later callers keep queueing.
		this.queue = granted.catch(() => undefined);
		return granted;
	}

	budget(now: number = this.clock()): RateBudget {
		const windowStart = now - this.windowMs;
		return {
			windowStart,
			windowLength: this.windowMs,
			capacity: this.capacity,
			consumed: this.grants.filter((ts) => ts > windowStart).length,
		};
	}

	private async grant(): Promise<void> {
		for (;;) {
			const now = this.clock();
			this.grants = this.grants.filter((ts) => ts > now - this.windowMs);
			if (this.grants.length < this.capacity) {
				this.grants.push(now);
				return;
			}
			const oldest = this.grants[0] ?? now;
			await this.sleep(Math.max(oldest + this.windowMs - now, 0));
		}
	}
}

/**
 * Lower bound on how long `requests` calls take under the limiter, assuming
 * an empty window at the start.
 */
export const estimateCollectionMs = (
	requests: number,
	capacity: number,
	windowMs: number
): number => {
	if (requests <= capacity) {
		return 0;
	}
	return Math.ceil(requests / capacity - 1) * windowMs;
};

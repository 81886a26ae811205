import { createLogger } from "@tickcast/core";
import type { Clock, CollectorConfig, CollectorState } from "@tickcast/core";
import type { BroadcastChannel } from "@tickcast/broadcast";
import {
	RetryingFetcher,
	SlidingWindowRateLimiter,
	estimateCollectionMs,
} from "@tickcast/data";
import type { OhlcvProvider } from "@tickcast/data";
import { FileStateStore } from "@tickcast/persistence";
import type { CollectorStateStore } from "@tickcast/persistence";
import {
	CollectorLoop,
	InstrumentRegistry,
	RecordPublisher,
	RunCoordinator,
	ScheduleTrigger,
	WeekdayTradingCalendar,
} from "@tickcast/runtime";
import type { TradingCalendar } from "@tickcast/runtime";
import { createOhlcvProvider } from "./createOhlcvProvider";

const logger = createLogger("app-di");

export interface CollectorDependencies {
	channel: BroadcastChannel;
	provider?: OhlcvProvider;
	store?: CollectorStateStore;
	clock?: Clock;
}

export interface CollectorServices {
	config: CollectorConfig;
	provider: OhlcvProvider;
	rateLimiter: SlidingWindowRateLimiter;
	fetcher: RetryingFetcher;
	channel: BroadcastChannel;
	store: CollectorStateStore;
	registry: InstrumentRegistry;
	calendar: TradingCalendar;
	trigger: ScheduleTrigger;
	coordinator: RunCoordinator;
	loop: CollectorLoop;
}

export const createCollector = (
	config: CollectorConfig,
	deps: CollectorDependencies
): CollectorServices => {
	const provider = deps.provider ?? createOhlcvProvider(config.provider);
	const store = deps.store ?? new FileStateStore(config.statePath);
	const rateLimiter = new SlidingWindowRateLimiter({
		capacity: config.rateLimit.capacity,
		windowMs: config.rateLimit.windowMs,
		clock: deps.clock,
	});
	const fetcher = new RetryingFetcher({
		provider,
		rateLimiter,
		retry: config.retry,
		firstFetch: config.firstFetch,
		limitPerRequest: config.provider.limitPerRequest,
		clock: deps.clock,
		logger: createLogger("data:fetcher"),
	});
	const registry = InstrumentRegistry.fromConfig(config.instruments, config.cadences);
	const calendar = new WeekdayTradingCalendar(config.calendar);
	const trigger = new ScheduleTrigger({
		cadences: config.cadences,
		calendar,
		store,
	});
	const coordinator = new RunCoordinator({
		registry,
		trigger,
		fetcher,
		publisher: new RecordPublisher(deps.channel),
		store,
		concurrency: config.concurrency,
		clock: deps.clock,
	});
	const loop = new CollectorLoop({
		coordinator,
		trigger,
		pollIntervalMs: config.pollIntervalMs,
		clock: deps.clock,
	});

	return {
		config,
		provider,
		rateLimiter,
		fetcher,
		channel: deps.channel,
		store,
		registry,
		calendar,
		trigger,
		coordinator,
		loop,
	};
};

/**
 * Loads persisted watermarks and flags into the registry and logs how long a
 * full pass of each cadence class takes at the configured budget.
 */
export const prepareCollector = async (
	services: CollectorServices
): Promise<CollectorState> => {
	const state = await services.store.load();
	services.registry.hydrate(state);
	logCollectionEstimates(services);
	return state;
};

export const logCollectionEstimates = (services: CollectorServices): void => {
	const { capacity, windowMs } = services.config.rateLimit;
	const counts = services.registry.countByCadence();
	for (const cadence of services.config.cadences) {
		const instruments = counts[cadence.id] ?? 0;
		if (!instruments) {
			continue;
		}
		logger.info("collection_estimate", {
			cadence: cadence.id,
			instruments,
			estimatedMs: estimateCollectionMs(instruments, capacity, windowMs),
		});
	}
};

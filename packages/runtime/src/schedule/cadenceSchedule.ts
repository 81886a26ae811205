import {
	MINUTE_MS,
	addDays,
	isDayTimeframe,
	parseTimeOfDay,
	timeframeToMs,
	toDateKey,
	zonedTimeToUtc,
} from "@tickcast/core";
import type { CadenceClass, DateKey } from "@tickcast/core";
import type { TradingCalendar } from "./tradingCalendar";

/** Longest stretch without a trigger instant that is searched (holiday weekends). */
const SEARCH_DAYS = 14;

export interface CadenceSchedule {
	readonly cadence: CadenceClass;
	/** Trigger instants (offset applied) belonging to a local date, ascending. */
	instantsOn(dateKey: DateKey): number[];
	/** Most recent instant at or before `now`, or null. */
	latestAtOrBefore(now: number): number | null;
	/** Earliest instant strictly after `now`, or null. */
	nextAfter(now: number): number | null;
	/** Bars opening at or after this instant are still in progress at `now`. */
	openBarsFrom(now: number): number;
}

const MINUTES_PER_DAY = 24 * 60;

const localSteps = (dateKey: DateKey, stepMinutes: number, timeZone: string): number[] => {
	const instants = new Set<number>();
	for (let minute = 0; minute < MINUTES_PER_DAY; minute += stepMinutes) {
		instants.add(zonedTimeToUtc(dateKey, minute, timeZone));
	}
	return Array.from(instants).sort((a, b) => a - b);
};

const dayInstants = (
	cadence: CadenceClass,
	calendar: TradingCalendar
): ((dateKey: DateKey) => number[]) => {
	switch (cadence.kind) {
		case "market-daily":
			return (dateKey) => {
				const session = calendar.session(dateKey);
				return session ? [session.closeAt] : [];
			};
		case "market-intraday": {
			const stepMs = (cadence.intervalMinutes ?? 1) * MINUTE_MS;
			return (dateKey) => {
				const session = calendar.session(dateKey);
				if (!session) {
					return [];
				}
				const instants: number[] = [];
				for (let at = session.openAt + stepMs; at <= session.closeAt; at += stepMs) {
					instants.push(at);
				}
				return instants;
			};
		}
		case "calendar-daily": {
			const timeZone = cadence.timeZone ?? "UTC";
			const minutes = parseTimeOfDay(cadence.timeOfDay ?? "00:00");
			return (dateKey) => [zonedTimeToUtc(dateKey, minutes, timeZone)];
		}
		case "hourly": {
			const timeZone = cadence.timeZone ?? "UTC";
			return (dateKey) => localSteps(dateKey, 60, timeZone);
		}
		case "calendar-intraday": {
			const timeZone = cadence.timeZone ?? "UTC";
			const stepMinutes = cadence.intervalMinutes ?? 1;
			return (dateKey) => localSteps(dateKey, stepMinutes, timeZone);
		}
	}
};

/**
 * Daily bars are stamped at UTC midnight of their trading date and complete
 * at that session's close; every other bar completes one timeframe after it
 * opens.
 */
const openBarsFrom = (
	cadence: CadenceClass,
	calendar: TradingCalendar
): ((now: number) => number) => {
	if (cadence.kind === "market-daily" && isDayTimeframe(cadence.timeframe)) {
		return (now) => {
			const today = toDateKey(now, calendar.timeZone);
			const session = calendar.session(today);
			const dateKey = session && now >= session.closeAt ? addDays(today, 1) : today;
			return zonedTimeToUtc(dateKey, 0, "UTC");
		};
	}
	const timeframeMs = timeframeToMs(cadence.timeframe);
	return (now) => now - timeframeMs + 1;
};

const scheduleTimeZone = (cadence: CadenceClass, calendar: TradingCalendar): string =>
	cadence.kind === "market-daily" || cadence.kind === "market-intraday"
		? calendar.timeZone
		: cadence.timeZone ?? "UTC";

export const createCadenceSchedule = (
	cadence: CadenceClass,
	calendar: TradingCalendar
): CadenceSchedule => {
	const timeZone = scheduleTimeZone(cadence, calendar);
	const nominal = dayInstants(cadence, calendar);
	const barsOpenFrom = openBarsFrom(cadence, calendar);
	const instantsOn = (dateKey: DateKey): number[] =>
		nominal(dateKey).map((instant) => instant + cadence.offsetMs);

	return {
		cadence,
		instantsOn,
		latestAtOrBefore(now) {
			const today = toDateKey(now, timeZone);
			let best: number | null = null;
			for (let back = 0; back <= SEARCH_DAYS; back += 1) {
				for (const instant of instantsOn(addDays(today, -back))) {
					if (instant <= now && (best === null || instant > best)) {
						best = instant;
					}
				}
				// The previous day is always checked: an offset can push its last
				// instant past midnight.
				if (best !== null && back >= 1) {
					return best;
				}
			}
			return best;
		},
		nextAfter(now) {
			const today = toDateKey(now, timeZone);
			let best: number | null = null;
			for (let ahead = -1; ahead <= SEARCH_DAYS; ahead += 1) {
				for (const instant of instantsOn(addDays(today, ahead))) {
					if (instant > now && (best === null || instant < best)) {
						best = instant;
					}
				}
				if (best !== null && ahead >= 1) {
					return best;
				}
			}
			return best;
		},
		openBarsFrom: barsOpenFrom,
	};
};

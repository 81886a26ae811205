import { parseTimeOfDay, weekdayOf, zonedTimeToUtc } from "@tickcast/core";
import type { CalendarConfig, DateKey } from "@tickcast/core";

export interface TradingSession {
	dateKey: DateKey;
	openAt: number;
	closeAt: number;
}

export interface TradingCalendar {
	readonly timeZone: string;
	isTradingDay(dateKey: DateKey): boolean;
	/** Session bounds in epoch ms, or null on non-trading days. */
	session(dateKey: DateKey): TradingSession | null;
}

/** Monday–Friday sessions minus holidays, with optional early closes. */
export class WeekdayTradingCalendar implements TradingCalendar {
	readonly timeZone: string;
	private readonly openMinutes: number;
	private readonly closeMinutes: number;
	private readonly holidays: Set<DateKey>;
	private readonly earlyCloses: Map<DateKey, number>;

	constructor(config: CalendarConfig) {
		this.timeZone = config.timeZone;
		this.openMinutes = parseTimeOfDay(config.open);
		this.closeMinutes = parseTimeOfDay(config.close);
		this.holidays = new Set(config.holidays);
		this.earlyCloses = new Map(
			Object.entries(config.earlyCloses).map(([dateKey, time]) => [
				dateKey,
				parseTimeOfDay(time),
			])
		);
	}

	isTradingDay(dateKey: DateKey): boolean {
		const weekday = weekdayOf(dateKey);
		return weekday >= 1 && weekday <= 5 && !this.holidays.has(dateKey);
	}

	session(dateKey: DateKey): TradingSession | null {
		if (!this.isTradingDay(dateKey)) {
			return null;
		}
		const closeMinutes = this.earlyCloses.get(dateKey) ?? this.closeMinutes;
		return {
			dateKey,
			openAt: zonedTimeToUtc(dateKey, this.openMinutes, this.timeZone),
			closeAt: zonedTimeToUtc(dateKey, closeMinutes, this.timeZone),
		};
	}
}

import { DAY_MS, MINUTE_MS } from "./constants";

/** Calendar date in some time zone, formatted "YYYY-MM-DD". */
export type DateKey = string;

export interface ZonedParts {
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
}

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})$/;

const formatters = new Map<string, Intl.DateTimeFormat>();

const getFormatter = (timeZone: string): Intl.DateTimeFormat => {
	const cached = formatters.get(timeZone);
	if (cached) {
		return cached;
	}
	const formatter = new Intl.DateTimeFormat("en-US", {
		timeZone,
		hourCycle: "h23",
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
		hour: "2-digit",
		minute: "2-digit",
		second: "2-digit",
	});
	formatters.set(timeZone, formatter);
	return formatter;
};

export const isValidTimeZone = (timeZone: string): boolean => {
	try {
		getFormatter(timeZone);
		return true;
	} catch {
		return false;
	}
};

export const zonedParts = (ts: number, timeZone: string): ZonedParts => {
	const parts: ZonedParts = {
		year: 0,
		month: 0,
		day: 0,
		hour: 0,
		minute: 0,
		second: 0,
	};
	for (const part of getFormatter(timeZone).formatToParts(new Date(ts))) {
		switch (part.type) {
			case "year":
			case "month":
			case "day":
			case "hour":
			case "minute":
			case "second":
				parts[part.type] = Number(part.value);
				break;
			default:
				break;
		}
	}
	return parts;
};

const pad = (value: number): string => String(value).padStart(2, "0");

export const toDateKey = (ts: number, timeZone: string): DateKey => {
	const { year, month, day } = zonedParts(ts, timeZone);
	return `${year}-${pad(month)}-${pad(day)}`;
};

const parseDateKey = (dateKey: DateKey): [number, number, number] => {
	const match = dateKey.match(DATE_KEY_PATTERN);
	if (!match) {
		throw new Error(`Invalid date key: "${dateKey}". Expected YYYY-MM-DD`);
	}
	return [Number(match[1]), Number(match[2]), Number(match[3])];
};

export const isDateKey = (value: string): boolean => DATE_KEY_PATTERN.test(value);

export const addDays = (dateKey: DateKey, days: number): DateKey => {
	const [year, month, day] = parseDateKey(dateKey);
	return toDateKey(Date.UTC(year, month - 1, day) + days * DAY_MS, "UTC");
};

/** 0 = Sunday … 6 = Saturday. */
export const weekdayOf = (dateKey: DateKey): number => {
	const [year, month, day] = parseDateKey(dateKey);
	return new Date(Date.UTC(year, month - 1, day)).getUTCDay();
};

/** "HH:MM" to minutes after midnight. */
export const parseTimeOfDay = (value: string): number => {
	const match = value.trim().match(TIME_OF_DAY_PATTERN);
	if (!match) {
		throw new Error(`Invalid time of day: "${value}". Expected HH:MM`);
	}
	const hours = Number(match[1]);
	const minutes = Number(match[2]);
	if (hours > 23 || minutes > 59) {
		throw new Error(`Invalid time of day: "${value}"`);
	}
	return hours * 60 + minutes;
};

const offsetAt = (ts: number, timeZone: string): number => {
	const p = zonedParts(ts, timeZone);
	const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
	return asUtc - Math.floor(ts / 1_000) * 1_000;
};

/** Epoch ms of a wall-clock time on a calendar date in `timeZone`. */
export const zonedTimeToUtc = (
	dateKey: DateKey,
	minutesAfterMidnight: number,
	timeZone: string
): number => {
	const [year, month, day] = parseDateKey(dateKey);
	const local = Date.UTC(year, month - 1, day) + minutesAfterMidnight * MINUTE_MS;
	const firstGuess = local - offsetAt(local, timeZone);
	const secondOffset = offsetAt(firstGuess, timeZone);
	return local - secondOffset;
};

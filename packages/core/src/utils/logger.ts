export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

type Nullable<T> = T | null | undefined;

interface LoggerSettings {
	prettyEnabled: boolean;
	jsonEnabled: boolean;
	minLevel: LogLevel;
	moduleFilter: Set<string> | null;
}

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel =>
	Object.prototype.hasOwnProperty.call(LEVELS, value);

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

const parseModuleFilter = (raw?: string): Set<string> | null => {
	if (!raw) {
		return null;
	}
	const entries = raw
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	return entries.length ? new Set(entries) : null;
};

const readSettings = (): LoggerSettings => {
	const prettyEnabled =
		process.env.LOG_PRETTY === "true" || process.env.NODE_ENV === "development";
	return {
		prettyEnabled,
		jsonEnabled: process.env.LOG_JSON === "true" || !prettyEnabled,
		minLevel: normalizeLevel(process.env.LOG_LEVEL),
		moduleFilter: parseModuleFilter(process.env.LOG_MODULE),
	};
};

let settings: LoggerSettings | null = null;

const getSettings = (): LoggerSettings => {
	if (!settings) {
		settings = readSettings();
	}
	return settings;
};

/** Re-read LOG_* variables, e.g. after a .env file was loaded. */
export const refreshLoggerSettings = (): void => {
	settings = readSettings();
};

const shouldLog = (level: LogLevel, moduleName: string): boolean => {
	const { minLevel, moduleFilter } = getSettings();
	if (LEVELS[level] < LEVELS[minLevel]) {
		return false;
	}
	if (moduleFilter && !moduleFilter.has(moduleName)) {
		return false;
	}
	return true;
};

export function log(payload: BaseLogPayload): void {
	if (!shouldLog(payload.level, payload.module)) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ts, ...payload };
	const { prettyEnabled, jsonEnabled } = getSettings();

	if (prettyEnabled) {
		try {
			printPretty(base);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}

	if (jsonEnabled) {
		try {
			const json = JSON.stringify(sanitize(base));
			console.log(json);
		} catch (err) {
			console.log(
				JSON.stringify({
					ts,
					level: "error",
					event: "logging_error",
					module: "logger",
					error: err instanceof Error ? err.message : "serialization_failed",
				})
			);
		}
	}
}

export function debug(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "debug", event, module: moduleName, ...data });
}

export function info(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "info", event, module: moduleName, ...data });
}

export function warn(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "warn", event, module: moduleName, ...data });
}

export function error(
	event: string,
	moduleName: string,
	data: Record<string, unknown> = {}
): void {
	log({ level: "error", event, module: moduleName, ...data });
}

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: Record<string, unknown>) => void;
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

export const createLogger = (moduleName: string): ModuleLogger => ({
	log: (level, event, data) =>
		log({ level, event, module: moduleName, ...(data ?? {}) }),
	debug: (event, data) =>
		log({ level: "debug", event, module: moduleName, ...(data ?? {}) }),
	info: (event, data) =>
		log({ level: "info", event, module: moduleName, ...(data ?? {}) }),
	warn: (event, data) =>
		log({ level: "warn", event, module: moduleName, ...(data ?? {}) }),
	error: (event, data) =>
		log({ level: "error", event, module: moduleName, ...(data ?? {}) }),
});

const sanitize = (payload: BaseLogPayload): BaseLogPayload => {
	const seen = new WeakSet<object>();
	return sanitizeValue(payload, seen) as BaseLogPayload;
};

const sanitizeValue = (value: unknown, seen: WeakSet<object>): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(
			value as Record<string, unknown>
		)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

function printPretty(base: BaseLogPayload): void {
	const { level, event, module, ts, ...rest } = base;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);
	const termWidth =
		typeof process.stdout?.columns === "number" ? process.stdout.columns : 120;
	const isNarrow = termWidth < 120;

	try {
		switch (event) {
			case "run_outcome": {
				printRunOutcome(rest, isNarrow);
				break;
			}
			case "record_published":
			case "record_received": {
				printRecord(rest);
				break;
			}
			default:
				break;
		}
	} catch (error) {
		console.warn(
			`[logger] pretty render error: ${
				error instanceof Error ? error.message : "unknown"
			}`
		);
	}
}

const printRunOutcome = (
	rest: Record<string, unknown>,
	isNarrow: boolean
): void => {
	const {
		runId,
		due,
		attempted,
		succeeded,
		published,
		failed,
		flagged,
		interrupted,
		durationMs,
	} = rest as RunOutcomePrettyPayload;

	const summaryRow = {
		runId,
		due: due?.map((entry) => entry.cadence).join(","),
		attempted: attempted?.length ?? 0,
		succeeded: succeeded?.length ?? 0,
		failed: failed ? Object.keys(failed).length : 0,
		flagged: flagged?.length ?? 0,
		published,
		interrupted,
		durationMs,
	};

	if (!isNarrow) {
		console.table([summaryRow]);
	} else {
		const fmtValue = (value: unknown): string =>
			value === undefined || value === null ? "-" : String(value);
		console.log(
			Object.entries(summaryRow)
				.map(([key, value]) => `${key}=${fmtValue(value)}`)
				.join(" | ")
		);
	}

	const failures = Object.entries(failed ?? {});
	if (failures.length > 0) {
		console.log("Failures:");
		for (const [instrument, reason] of failures) {
			console.log(
				`${instrument.padEnd(16)}  ${String(reason?.kind ?? "-").padEnd(18)} ${
					reason?.message ?? ""
				}`
			);
		}
	}
};

const printRecord = (rest: Record<string, unknown>): void => {
	const { instrument, topic, timestamp, open, high, low, close, volume } =
		rest as RecordPrettyPayload;
	console.table([{ instrument, topic, timestamp, open, high, low, close, volume }]);
};

interface RunOutcomePrettyPayload {
	runId?: string;
	due?: Array<{ cadence?: string; instant?: number }>;
	attempted?: string[];
	succeeded?: string[];
	failed?: Record<string, Nullable<{ kind?: string; message?: string }>>;
	flagged?: string[];
	published?: number;
	interrupted?: boolean;
	durationMs?: number;
}

interface RecordPrettyPayload {
	instrument?: string;
	topic?: string;
	timestamp?: string;
	open?: number;
	high?: number;
	low?: number;
	close?: number;
	volume?: number;
}

import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "./errors";
import { isDateKey, isValidTimeZone, parseTimeOfDay, parseTimeframe } from "./time";
import type { CadenceClass, CadenceKind } from "./types";

export interface ProviderConfig {
	/** ccxt exchange id, e.g. "binance". */
	exchange: string;
	/** Published provider quota for one rate window; capacity must stay below it. */
	hardLimitPerWindow?: number;
	/** Max rows requested per call. */
	limitPerRequest: number;
}

export interface RateLimitConfig {
	capacity: number;
	windowMs: number;
}

export interface BroadcastConfig {
	host: string;
	port: number;
	/** Subscribers with more unsent bytes than this are disconnected. */
	maxBufferedBytes: number;
}

export interface RetryConfig {
	maxAttempts: number;
	providerErrorAttempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
	rateLimitBackoffMultiplier: number;
}

export interface CalendarConfig {
	timeZone: string;
	open: string;
	close: string;
	holidays: string[];
	/** Date key → early close time ("HH:MM"). */
	earlyCloses: Record<string, string>;
}

export interface InstrumentConfig {
	id: string;
	cadence: string;
}

export type FirstFetchPolicy = "latest" | "all";

export interface CollectorConfig {
	provider: ProviderConfig;
	rateLimit: RateLimitConfig;
	pollIntervalMs: number;
	broadcast: BroadcastConfig;
	statePath: string;
	concurrency: number;
	retry: RetryConfig;
	firstFetch: FirstFetchPolicy;
	calendar: CalendarConfig;
	cadences: CadenceClass[];
	instruments: InstrumentConfig[];
}

export type ConfigSourceType = "file" | "embedded";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
}

export interface ConfigLoadOptions {
	configPath?: string;
	env?: NodeJS.ProcessEnv;
}

const CONFIG_META_SYMBOL = Symbol.for("tickcast.config.meta");

const WORKSPACE_SENTINELS = [path.join("config", "collector.json"), ".git"];

const CADENCE_KINDS: readonly CadenceKind[] = [
	"market-daily",
	"calendar-daily",
	"hourly",
	"market-intraday",
	"calendar-intraday",
];

const MINUTES_PER_DAY = 24 * 60;

export const DEFAULT_CADENCES: readonly CadenceClass[] = [
	{
		id: "market-daily",
		kind: "market-daily",
		timeframe: "1d",
		offsetMs: 90_000,
	},
	{
		id: "calendar-daily",
		kind: "calendar-daily",
		timeframe: "1d",
		offsetMs: 90_000,
		timeZone: "UTC",
		timeOfDay: "00:00",
	},
	{
		id: "hourly",
		kind: "hourly",
		timeframe: "1h",
		offsetMs: 30_000,
		timeZone: "UTC",
	},
];

export const DEFAULT_CALENDAR: CalendarConfig = {
	timeZone: "America/New_York",
	open: "09:30",
	close: "16:00",
	holidays: [],
	earlyCloses: {},
};

export const DEFAULT_RETRY: RetryConfig = {
	maxAttempts: 3,
	providerErrorAttempts: 2,
	baseDelayMs: 1_000,
	maxDelayMs: 30_000,
	rateLimitBackoffMultiplier: 4,
};

const DEFAULT_POLL_INTERVAL_MS = 60_000;
const MIN_POLL_INTERVAL_MS = 1_000;

let cachedWorkspaceRoot: string | undefined;

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

export const getDefaultConfigPath = (): string =>
	path.join(findWorkspaceRoot(), "config", "collector.json");

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: metadata,
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	isRecord(value) && (value.source === "file" || value.source === "embedded");

export const getConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isConfigMetadata(meta) ? meta : null;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const readSection = (
	value: unknown,
	field: string
): Record<string, unknown> => {
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new ConfigError(`${field} must be an object`);
	}
	return value;
};

const readArray = (value: unknown, field: string): unknown[] => {
	if (value === undefined) {
		return [];
	}
	if (!Array.isArray(value)) {
		throw new ConfigError(`${field} must be an array`);
	}
	return value;
};

const ensureNumber = (
	value: unknown,
	field: string,
	options: { fallback?: number; min?: number; integer?: boolean } = {}
): number => {
	const resolved = value === undefined ? options.fallback : value;
	if (typeof resolved !== "number" || Number.isNaN(resolved)) {
		throw new ConfigError(`Required numeric field missing in ${field}`);
	}
	if (options.integer && !Number.isInteger(resolved)) {
		throw new ConfigError(`${field} must be an integer, got ${resolved}`);
	}
	if (options.min !== undefined && resolved < options.min) {
		throw new ConfigError(
			`${field} must be >= ${options.min}, got ${resolved}`
		);
	}
	return resolved;
};

const ensureString = (value: unknown, field: string, fallback?: string): string => {
	const resolved = value === undefined ? fallback : value;
	if (typeof resolved !== "string" || !resolved.trim().length) {
		throw new ConfigError(`Required string field missing in ${field}`);
	}
	return resolved.trim();
};

const optionalNumber = (value: unknown, field: string): number | undefined =>
	value === undefined ? undefined : ensureNumber(value, field, { min: 1 });

const ensureTimeOfDay = (value: unknown, field: string, fallback: string): string => {
	const resolved = ensureString(value, field, fallback);
	try {
		parseTimeOfDay(resolved);
	} catch (error) {
		throw new ConfigError(`${field}: ${error instanceof Error ? error.message : String(error)}`);
	}
	return resolved;
};

const ensureTimeZone = (value: unknown, field: string, fallback: string): string => {
	const resolved = ensureString(value, field, fallback);
	if (!isValidTimeZone(resolved)) {
		throw new ConfigError(`${field}: unknown time zone "${resolved}"`);
	}
	return resolved;
};

const ensureTimeframe = (value: unknown, field: string): string => {
	const resolved = ensureString(value, field);
	try {
		parseTimeframe(resolved);
	} catch (error) {
		throw new ConfigError(`${field}: ${error instanceof Error ? error.message : String(error)}`);
	}
	return resolved;
};

const isFirstFetchPolicy = (value: unknown): value is FirstFetchPolicy =>
	value === "latest" || value === "all";

const isCadenceKind = (value: unknown): value is CadenceKind =>
	CADENCE_KINDS.some((kind) => kind === value);

const parseCadence = (raw: unknown, index: number): CadenceClass => {
	const field = `cadences[${index}]`;
	if (!isRecord(raw)) {
		throw new ConfigError(`${field} must be an object`);
	}
	const id = ensureString(raw.id, `${field}.id`);
	if (!isCadenceKind(raw.kind)) {
		throw new ConfigError(
			`${field}.kind must be one of ${CADENCE_KINDS.join(", ")}`
		);
	}
	const cadence: CadenceClass = {
		id,
		kind: raw.kind,
		timeframe: ensureTimeframe(raw.timeframe, `${field}.timeframe`),
		offsetMs: ensureNumber(raw.offsetMs, `${field}.offsetMs`, {
			fallback: 30_000,
			min: 0,
		}),
	};
	if (
		raw.kind === "calendar-daily" ||
		raw.kind === "hourly" ||
		raw.kind === "calendar-intraday"
	) {
		cadence.timeZone = ensureTimeZone(raw.timeZone, `${field}.timeZone`, "UTC");
	}
	if (raw.kind === "calendar-daily") {
		cadence.timeOfDay = ensureTimeOfDay(raw.timeOfDay, `${field}.timeOfDay`, "00:00");
	}
	if (raw.kind === "market-intraday" || raw.kind === "calendar-intraday") {
		cadence.intervalMinutes = ensureNumber(
			raw.intervalMinutes,
			`${field}.intervalMinutes`,
			{ min: 1, integer: true }
		);
	}
	// Round-the-clock steps restart at local midnight, so they must tile the day.
	if (
		raw.kind === "calendar-intraday" &&
		MINUTES_PER_DAY % (cadence.intervalMinutes ?? 1) !== 0
	) {
		throw new ConfigError(
			`${field}.intervalMinutes must divide ${MINUTES_PER_DAY}, got ${cadence.intervalMinutes}`
		);
	}
	return cadence;
};

const parseCadences = (raw: unknown): CadenceClass[] => {
	const byId = new Map<string, CadenceClass>(
		DEFAULT_CADENCES.map((cadence) => [cadence.id, { ...cadence }])
	);
	readArray(raw, "cadences").forEach((entry, index) => {
		const cadence = parseCadence(entry, index);
		byId.set(cadence.id, cadence);
	});
	return Array.from(byId.values());
};

const parseCalendar = (raw: unknown): CalendarConfig => {
	const section = readSection(raw, "calendar");
	const holidayKeys = readArray(section.holidays, "calendar.holidays").map((value, index) => {
		if (typeof value !== "string" || !isDateKey(value)) {
			throw new ConfigError(`calendar.holidays[${index}] must be YYYY-MM-DD`);
		}
		return value;
	});
	const earlyCloses: Record<string, string> = {};
	for (const [dateKey, time] of Object.entries(
		readSection(section.earlyCloses, "calendar.earlyCloses")
	)) {
		if (!isDateKey(dateKey)) {
			throw new ConfigError(`calendar.earlyCloses key "${dateKey}" must be YYYY-MM-DD`);
		}
		earlyCloses[dateKey] = ensureTimeOfDay(time, `calendar.earlyCloses.${dateKey}`, "");
	}
	const calendar: CalendarConfig = {
		timeZone: ensureTimeZone(section.timeZone, "calendar.timeZone", DEFAULT_CALENDAR.timeZone),
		open: ensureTimeOfDay(section.open, "calendar.open", DEFAULT_CALENDAR.open),
		close: ensureTimeOfDay(section.close, "calendar.close", DEFAULT_CALENDAR.close),
		holidays: holidayKeys,
		earlyCloses,
	};
	if (parseTimeOfDay(calendar.close) <= parseTimeOfDay(calendar.open)) {
		throw new ConfigError("calendar.close must be after calendar.open");
	}
	return calendar;
};

/**
 * Newline-separated instrument list. Blank lines and `#` comments are
 * skipped; the result is deduplicated and sorted.
 */
export const readInstrumentList = (filePath: string): string[] => {
	let contents: string;
	try {
		contents = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Instrument list not readable: ${filePath}`, {
			cause: error,
		});
	}
	const ids = contents
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0 && !line.startsWith("#"));
	return Array.from(new Set(ids)).sort();
};

const parseInstruments = (
	inline: unknown,
	files: unknown,
	cadenceIds: Set<string>,
	baseDir: string
): InstrumentConfig[] => {
	const instruments: InstrumentConfig[] = [];
	const seen = new Set<string>();
	const push = (id: string, cadence: string, field: string): void => {
		if (!cadenceIds.has(cadence)) {
			throw new ConfigError(`${field}: unknown cadence "${cadence}"`);
		}
		if (seen.has(id)) {
			throw new ConfigError(`${field}: duplicate instrument "${id}"`);
		}
		seen.add(id);
		instruments.push({ id, cadence });
	};

	readArray(inline, "instruments").forEach((entry, index) => {
		const field = `instruments[${index}]`;
		if (!isRecord(entry)) {
			throw new ConfigError(`${field} must be an object`);
		}
		push(
			ensureString(entry.id, `${field}.id`),
			ensureString(entry.cadence, `${field}.cadence`),
			field
		);
	});

	readArray(files, "instrumentFiles").forEach((entry, index) => {
		const field = `instrumentFiles[${index}]`;
		if (!isRecord(entry)) {
			throw new ConfigError(`${field} must be an object`);
		}
		const listPath = ensureString(entry.path, `${field}.path`);
		const cadence = ensureString(entry.cadence, `${field}.cadence`);
		const resolved = path.isAbsolute(listPath)
			? listPath
			: path.join(baseDir, listPath);
		for (const id of readInstrumentList(resolved)) {
			push(id, cadence, field);
		}
	});

	return instruments;
};

const readEnvNumber = (
	env: NodeJS.ProcessEnv,
	key: string
): number | undefined => {
	const raw = env[key]?.trim();
	if (!raw) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigError(`Environment variable ${key} must be numeric, got "${raw}"`);
	}
	return value;
};

export interface ParseCollectorConfigOptions {
	/** Directory that relative instrument list paths resolve against. */
	baseDir: string;
	/** Directory that a relative statePath resolves against. */
	workspaceRoot: string;
	env?: NodeJS.ProcessEnv;
}

export const parseCollectorConfig = (
	raw: unknown,
	options: ParseCollectorConfigOptions
): CollectorConfig => {
	if (!isRecord(raw)) {
		throw new ConfigError("Collector config must be a JSON object");
	}
	const env = options.env ?? process.env;

	const providerSection = readSection(raw.provider, "provider");
	const provider: ProviderConfig = {
		exchange: ensureString(providerSection.exchange, "provider.exchange", "binance"),
		hardLimitPerWindow: optionalNumber(
			providerSection.hardLimitPerWindow,
			"provider.hardLimitPerWindow"
		),
		limitPerRequest: ensureNumber(
			providerSection.limitPerRequest,
			"provider.limitPerRequest",
			{ fallback: 500, min: 1, integer: true }
		),
	};

	const rateSection = readSection(raw.rateLimit, "rateLimit");
	const rateLimit: RateLimitConfig = {
		capacity: ensureNumber(rateSection.capacity, "rateLimit.capacity", {
			min: 1,
			integer: true,
		}),
		windowMs: ensureNumber(rateSection.windowMs, "rateLimit.windowMs", {
			min: 1,
		}),
	};
	if (
		provider.hardLimitPerWindow !== undefined &&
		rateLimit.capacity >= provider.hardLimitPerWindow
	) {
		throw new ConfigError(
			`rateLimit.capacity (${rateLimit.capacity}) must stay below provider.hardLimitPerWindow (${provider.hardLimitPerWindow})`
		);
	}

	const broadcastSection = readSection(raw.broadcast, "broadcast");
	const broadcast: BroadcastConfig = {
		host: ensureString(broadcastSection.host, "broadcast.host", "0.0.0.0"),
		port: ensureNumber(
			readEnvNumber(env, "TICKCAST_BROADCAST_PORT") ?? broadcastSection.port,
			"broadcast.port",
			{ fallback: 21_000, min: 0, integer: true }
		),
		maxBufferedBytes: ensureNumber(
			broadcastSection.maxBufferedBytes,
			"broadcast.maxBufferedBytes",
			{ fallback: 1_000_000, min: 1, integer: true }
		),
	};

	const retrySection = readSection(raw.retry, "retry");
	const retry: RetryConfig = {
		maxAttempts: ensureNumber(retrySection.maxAttempts, "retry.maxAttempts", {
			fallback: DEFAULT_RETRY.maxAttempts,
			min: 1,
			integer: true,
		}),
		providerErrorAttempts: ensureNumber(
			retrySection.providerErrorAttempts,
			"retry.providerErrorAttempts",
			{ fallback: DEFAULT_RETRY.providerErrorAttempts, min: 1, integer: true }
		),
		baseDelayMs: ensureNumber(retrySection.baseDelayMs, "retry.baseDelayMs", {
			fallback: DEFAULT_RETRY.baseDelayMs,
			min: 0,
		}),
		maxDelayMs: ensureNumber(retrySection.maxDelayMs, "retry.maxDelayMs", {
			fallback: DEFAULT_RETRY.maxDelayMs,
			min: 0,
		}),
		rateLimitBackoffMultiplier: ensureNumber(
			retrySection.rateLimitBackoffMultiplier,
			"retry.rateLimitBackoffMultiplier",
			{ fallback: DEFAULT_RETRY.rateLimitBackoffMultiplier, min: 1 }
		),
	};

	const firstFetch = raw.firstFetch ?? "latest";
	if (!isFirstFetchPolicy(firstFetch)) {
		throw new ConfigError('firstFetch must be "latest" or "all"');
	}

	const cadences = parseCadences(raw.cadences);
	const instruments = parseInstruments(
		raw.instruments,
		raw.instrumentFiles,
		new Set(cadences.map((cadence) => cadence.id)),
		options.baseDir
	);

	const statePath = ensureString(
		env.TICKCAST_STATE_PATH ?? raw.statePath,
		"statePath",
		path.join("state", "collector-state.json")
	);

	return {
		provider,
		rateLimit,
		pollIntervalMs: Math.max(
			ensureNumber(
				readEnvNumber(env, "TICKCAST_POLL_INTERVAL_MS") ?? raw.pollIntervalMs,
				"pollIntervalMs",
				{ fallback: DEFAULT_POLL_INTERVAL_MS, min: 0 }
			),
			MIN_POLL_INTERVAL_MS
		),
		broadcast,
		statePath: path.isAbsolute(statePath)
			? statePath
			: path.join(options.workspaceRoot, statePath),
		concurrency: ensureNumber(raw.concurrency, "concurrency", {
			fallback: 1,
			min: 1,
			integer: true,
		}),
		retry,
		firstFetch,
		calendar: parseCalendar(raw.calendar),
		cadences,
		instruments,
	};
};

const readJsonFile = (filePath: string): unknown => {
	let contents: string;
	try {
		contents = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Collector config not found at ${filePath}`, {
			cause: error,
		});
	}
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(`Collector config at ${filePath} is not valid JSON`, {
			cause: error,
		});
	}
};

export const loadCollectorConfig = (
	options: ConfigLoadOptions = {}
): CollectorConfig => {
	const env = options.env ?? process.env;
	const configPath = path.resolve(
		options.configPath ?? env.TICKCAST_CONFIG ?? getDefaultConfigPath()
	);
	const config = parseCollectorConfig(readJsonFile(configPath), {
		baseDir: path.dirname(configPath),
		workspaceRoot: findWorkspaceRoot(),
		env,
	});
	return withConfigMetadata(config, { source: "file", path: configPath });
};

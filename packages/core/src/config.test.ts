import path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import {
	DEFAULT_RETRY,
	getConfigMetadata,
	loadCollectorConfig,
	parseCollectorConfig,
	readInstrumentList,
} from "./config";
import { ConfigError } from "./errors";

const FIXTURE_DIR = path.join(
	path.dirname(fileURLToPath(import.meta.url)),
	"__tests__",
	"fixtures"
);

const parse = (raw: unknown, env: NodeJS.ProcessEnv = {}) =>
	parseCollectorConfig(raw, {
		baseDir: FIXTURE_DIR,
		workspaceRoot: "/srv/tickcast",
		env,
	});

const minimal = {
	rateLimit: { capacity: 2, windowMs: 60_000 },
};

describe("readInstrumentList", () => {
	it("trims, drops comments, dedupes and sorts", () => {
		expect(readInstrumentList(path.join(FIXTURE_DIR, "crypto.txt"))).toEqual([
			"BTC-USD",
			"ETH-USD",
			"SOL-USD",
		]);
	});

	it("throws a ConfigError for a missing file", () => {
		expect(() =>
			readInstrumentList(path.join(FIXTURE_DIR, "missing.txt"))
		).toThrowError(ConfigError);
	});
});

describe("parseCollectorConfig", () => {
	it("fills defaults around the required rate limit", () => {
		const config = parse(minimal);
		expect(config.rateLimit).toEqual({ capacity: 2, windowMs: 60_000 });
		expect(config.provider).toEqual({
			exchange: "binance",
			hardLimitPerWindow: undefined,
			limitPerRequest: 500,
		});
		expect(config.broadcast).toEqual({
			host: "0.0.0.0",
			port: 21_000,
			maxBufferedBytes: 1_000_000,
		});
		expect(config.retry).toEqual(DEFAULT_RETRY);
		expect(config.firstFetch).toBe("latest");
		expect(config.concurrency).toBe(1);
		expect(config.pollIntervalMs).toBe(60_000);
		expect(config.statePath).toBe(
			path.join("/srv/tickcast", "state", "collector-state.json")
		);
		expect(config.cadences.map((cadence) => cadence.id)).toEqual([
			"market-daily",
			"calendar-daily",
			"hourly",
		]);
		expect(config.calendar.timeZone).toBe("America/New_York");
		expect(config.instruments).toEqual([]);
	});

	it("requires a rate limit", () => {
		expect(() => parse({})).toThrowError(
			/Required numeric field missing in rateLimit.capacity/
		);
	});

	it("rejects a capacity at or above the provider hard limit", () => {
		expect(() =>
			parse({
				provider: { hardLimitPerWindow: 2 },
				rateLimit: { capacity: 2, windowMs: 60_000 },
			})
		).toThrowError(/must stay below provider.hardLimitPerWindow/);
	});

	it("overrides a default cadence by id and adds new ones", () => {
		const config = parse({
			...minimal,
			cadences: [
				{ id: "hourly", kind: "hourly", timeframe: "1h", offsetMs: 5_000 },
				{
					id: "intraday-15m",
					kind: "market-intraday",
					timeframe: "15m",
					intervalMinutes: 15,
				},
			],
		});
		const hourly = config.cadences.find((cadence) => cadence.id === "hourly");
		expect(hourly).toEqual({
			id: "hourly",
			kind: "hourly",
			timeframe: "1h",
			offsetMs: 5_000,
			timeZone: "UTC",
		});
		expect(config.cadences.at(-1)).toEqual({
			id: "intraday-15m",
			kind: "market-intraday",
			timeframe: "15m",
			offsetMs: 30_000,
			intervalMinutes: 15,
		});
	});

	it("parses a round-the-clock intraday cadence", () => {
		const config = parse({
			...minimal,
			cadences: [
				{ id: "crypto-5m", kind: "calendar-intraday", timeframe: "5m", intervalMinutes: 5 },
			],
		});
		expect(config.cadences.at(-1)).toEqual({
			id: "crypto-5m",
			kind: "calendar-intraday",
			timeframe: "5m",
			offsetMs: 30_000,
			timeZone: "UTC",
			intervalMinutes: 5,
		});
	});

	it("rejects a round-the-clock interval that does not tile the day", () => {
		expect(() =>
			parse({
				...minimal,
				cadences: [
					{ id: "odd", kind: "calendar-intraday", timeframe: "7m", intervalMinutes: 7 },
				],
			})
		).toThrowError("cadences[0].intervalMinutes must divide 1440, got 7");
		expect(() =>
			parse({
				...minimal,
				cadences: [{ id: "none", kind: "calendar-intraday", timeframe: "5m" }],
			})
		).toThrowError(/Required numeric field missing in cadences\[0\]\.intervalMinutes/);
	});

	it("rejects unknown cadence kinds and bad time zones", () => {
		expect(() =>
			parse({ ...minimal, cadences: [{ id: "x", kind: "weekly", timeframe: "1d" }] })
		).toThrowError(/cadences\[0\]\.kind must be one of/);
		expect(() =>
			parse({
				...minimal,
				cadences: [
					{ id: "x", kind: "hourly", timeframe: "1h", timeZone: "Mars/Base" },
				],
			})
		).toThrowError(/unknown time zone "Mars\/Base"/);
	});

	it("rejects instruments on unknown cadences and duplicates", () => {
		expect(() =>
			parse({ ...minimal, instruments: [{ id: "SPY", cadence: "weekly" }] })
		).toThrowError(/unknown cadence "weekly"/);
		expect(() =>
			parse({
				...minimal,
				instruments: [
					{ id: "SPY", cadence: "market-daily" },
					{ id: "SPY", cadence: "hourly" },
				],
			})
		).toThrowError(/duplicate instrument "SPY"/);
	});

	it("validates the market calendar", () => {
		const config = parse({
			...minimal,
			calendar: {
				holidays: ["2026-11-26"],
				earlyCloses: { "2026-11-27": "13:00" },
			},
		});
		expect(config.calendar).toEqual({
			timeZone: "America/New_York",
			open: "09:30",
			close: "16:00",
			holidays: ["2026-11-26"],
			earlyCloses: { "2026-11-27": "13:00" },
		});
		expect(() =>
			parse({ ...minimal, calendar: { holidays: ["26-11-2026"] } })
		).toThrowError(/calendar.holidays\[0\] must be YYYY-MM-DD/);
		expect(() =>
			parse({ ...minimal, calendar: { open: "16:00", close: "09:30" } })
		).toThrowError(/calendar.close must be after calendar.open/);
	});

	it("rejects an unknown first fetch policy", () => {
		expect(() => parse({ ...minimal, firstFetch: "oldest" })).toThrowError(
			/firstFetch must be/
		);
	});

	it("applies environment overrides", () => {
		const config = parse(minimal, {
			TICKCAST_BROADCAST_PORT: "22000",
			TICKCAST_STATE_PATH: "/tmp/state.json",
			TICKCAST_POLL_INTERVAL_MS: "5000",
		});
		expect(config.broadcast.port).toBe(22_000);
		expect(config.statePath).toBe("/tmp/state.json");
		expect(config.pollIntervalMs).toBe(5_000);
	});

	it("clamps the poll interval to one second", () => {
		expect(parse({ ...minimal, pollIntervalMs: 10 }).pollIntervalMs).toBe(1_000);
	});

	it("rejects a non-numeric environment override", () => {
		expect(() =>
			parse(minimal, { TICKCAST_BROADCAST_PORT: "abc" })
		).toThrowError(/TICKCAST_BROADCAST_PORT must be numeric/);
	});
});

describe("loadCollectorConfig", () => {
	it("loads inline and file-listed instruments in order", () => {
		const configPath = path.join(FIXTURE_DIR, "collector.json");
		const config = loadCollectorConfig({ configPath, env: {} });
		expect(config.instruments).toEqual([
			{ id: "SPY", cadence: "market-daily" },
			{ id: "BTC-USD", cadence: "calendar-daily" },
			{ id: "ETH-USD", cadence: "calendar-daily" },
			{ id: "SOL-USD", cadence: "calendar-daily" },
		]);
		expect(config.rateLimit.capacity).toBe(1_800);
		expect(path.basename(config.statePath)).toBe("test-state.json");
		expect(getConfigMetadata(config)).toEqual({ source: "file", path: configPath });
	});

	it("throws a ConfigError when the file is missing", () => {
		expect(() =>
			loadCollectorConfig({
				configPath: path.join(FIXTURE_DIR, "nope.json"),
				env: {},
			})
		).toThrowError(/Collector config not found/);
	});
});

import {
	BadSymbol,
	DDoSProtection,
	ExchangeError,
	RateLimitExceeded,
	RequestTimeout,
} from "ccxt";
import type { OHLCV } from "ccxt";
import { NotFoundError } from "@tickcast/core";
import { describe, expect, it } from "vitest";
import {
	CcxtOhlcvProvider,
	createCcxtExchange,
	toMarketSymbol,
} from "./ccxtProvider";
import type { CcxtExchangeLike } from "./ccxtProvider";
import { mapCcxtError } from "./errors";

class FakeExchange implements CcxtExchangeLike {
	readonly id = "fake";
	loadMarketsCalls = 0;
	readonly calls: Array<{ symbol: string; timeframe?: string; since?: number; limit?: number }> = [];
	fetchError: unknown = null;

	constructor(
		private readonly markets: string[],
		private readonly rows: OHLCV[]
	) {}

	async loadMarkets(): Promise<unknown> {
		this.loadMarketsCalls += 1;
		return {};
	}

	market(symbol: string): { symbol: string } {
		if (!this.markets.includes(symbol)) {
			throw new BadSymbol(`fake does not have market symbol ${symbol}`);
		}
		return { symbol };
	}

	async fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]> {
		this.calls.push({ symbol, timeframe, since, limit });
		if (this.fetchError) {
			throw this.fetchError;
		}
		return this.rows;
	}
}

describe("CcxtOhlcvProvider", () => {
	const rows: OHLCV[] = [[1_700_000_000_000, 100, 110, 95, 105, 12.5]];

	it("maps rows to records for the requested instrument", async () => {
		const exchange = new FakeExchange(["BTC/USD"], rows);
		const provider = new CcxtOhlcvProvider({ exchange });

		const records = await provider.fetchOHLCV({
			instrument: "BTC-USD",
			timeframe: "1d",
			since: 1_600_000_000_000,
			limit: 10,
		});

		expect(provider.name).toBe("ccxt:fake");
		expect(records).toEqual([
			{
				instrument: "BTC-USD",
				timeframe: "1d",
				timestamp: 1_700_000_000_000,
				open: 100,
				high: 110,
				low: 95,
				close: 105,
				volume: 12.5,
			},
		]);
		expect(exchange.calls).toEqual([
			{ symbol: "BTC/USD", timeframe: "1d", since: 1_600_000_000_000, limit: 10 },
		]);
	});

	it("loads markets once", async () => {
		const exchange = new FakeExchange(["BTC/USD"], rows);
		const provider = new CcxtOhlcvProvider({ exchange });

		await provider.fetchOHLCV({ instrument: "BTC-USD", timeframe: "1d" });
		await provider.fetchOHLCV({ instrument: "BTC-USD", timeframe: "1d" });

		expect(exchange.loadMarketsCalls).toBe(1);
	});

	it("reports unknown markets as not found", async () => {
		const exchange = new FakeExchange(["BTC/USD"], rows);
		const provider = new CcxtOhlcvProvider({ exchange });

		await expect(
			provider.fetchOHLCV({ instrument: "NOPE-USD", timeframe: "1d" })
		).rejects.toBeInstanceOf(NotFoundError);
		expect(exchange.calls).toEqual([]);
	});

	it("maps fetch failures onto the fetch taxonomy", async () => {
		const exchange = new FakeExchange(["BTC/USD"], rows);
		exchange.fetchError = new RequestTimeout("timed out");
		const provider = new CcxtOhlcvProvider({ exchange });

		await expect(
			provider.fetchOHLCV({ instrument: "BTC-USD", timeframe: "1d" })
		).rejects.toMatchObject({ kind: "Transient", message: "timed out" });
	});

	it("uses a custom symbol resolver", async () => {
		const exchange = new FakeExchange(["BTC/USDT"], rows);
		const provider = new CcxtOhlcvProvider({
			exchange,
			resolveSymbol: (instrument) => `${instrument.split("-")[0]}/USDT`,
		});

		await provider.fetchOHLCV({ instrument: "BTC-USD", timeframe: "1h" });

		expect(exchange.calls[0]?.symbol).toBe("BTC/USDT");
	});
});

describe("mapCcxtError", () => {
	it("classifies ccxt errors", () => {
		expect(mapCcxtError(new RateLimitExceeded("429")).kind).toBe("RateLimitExceeded");
		expect(mapCcxtError(new DDoSProtection("slow down")).kind).toBe(
			"RateLimitExceeded"
		);
		expect(mapCcxtError(new RequestTimeout("timeout")).kind).toBe("Transient");
		expect(mapCcxtError(new BadSymbol("unknown")).kind).toBe("NotFound");
		expect(mapCcxtError(new ExchangeError("boom")).kind).toBe("ProviderError");
		expect(mapCcxtError("weird").kind).toBe("ProviderError");
	});

	it("keeps already classified errors", () => {
		const error = new NotFoundError("gone");
		expect(mapCcxtError(error)).toBe(error);
	});
});

describe("exchange helpers", () => {
	it("converts dash-separated ids to market symbols", () => {
		expect(toMarketSymbol("ETH-USD")).toBe("ETH/USD");
		expect(toMarketSymbol("ETH/USDT")).toBe("ETH/USDT");
	});

	it("rejects unsupported exchanges", () => {
		expect(() => createCcxtExchange("nowhere")).toThrowError(
			/Unsupported exchange "nowhere"/
		);
	});
});

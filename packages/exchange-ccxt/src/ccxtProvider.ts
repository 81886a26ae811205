import ccxt from "ccxt";
import type { Exchange, OHLCV } from "ccxt";
import { createLogger } from "@tickcast/core";
import type { OhlcvRecord } from "@tickcast/core";
import { mapCcxtRowToRecord } from "@tickcast/data";
import type { OhlcvProvider, OhlcvRequest } from "@tickcast/data";
import { mapCcxtError } from "./errors";

const ccxtLogger = createLogger("exchange:ccxt");

/** The slice of a ccxt exchange the provider uses. */
export interface CcxtExchangeLike {
	readonly id: string;
	loadMarkets(): Promise<unknown>;
	market(symbol: string): { symbol: string };
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number
	): Promise<OHLCV[]>;
}

interface ExchangeUserConfig {
	enableRateLimit: boolean;
	timeout?: number;
}

const EXCHANGE_FACTORIES: Record<string, (config: ExchangeUserConfig) => Exchange> = {
	binance: (config) => new ccxt.binance(config),
	binanceus: (config) => new ccxt.binanceus(config),
	bitstamp: (config) => new ccxt.bitstamp(config),
	bybit: (config) => new ccxt.bybit(config),
	coinbase: (config) => new ccxt.coinbase(config),
	gemini: (config) => new ccxt.gemini(config),
	kraken: (config) => new ccxt.kraken(config),
	kucoin: (config) => new ccxt.kucoin(config),
	mexc: (config) => new ccxt.mexc(config),
	okx: (config) => new ccxt.okx(config),
};

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGE_FACTORIES).sort();

export const createCcxtExchange = (
	exchangeId: string,
	options: { timeoutMs?: number } = {}
): Exchange => {
	const factory = EXCHANGE_FACTORIES[exchangeId];
	if (!factory) {
		throw new Error(
			`Unsupported exchange "${exchangeId}". Expected one of: ${SUPPORTED_EXCHANGES.join(", ")}`
		);
	}
	return factory({ enableRateLimit: true, timeout: options.timeoutMs });
};

/** "BTC-USD" → "BTC/USD"; ids that already carry a slash pass through. */
export const toMarketSymbol = (instrument: string): string =>
	instrument.includes("/") ? instrument : instrument.replace("-", "/");

export interface CcxtOhlcvProviderOptions {
	exchange: CcxtExchangeLike;
	resolveSymbol?: (instrument: string) => string;
}

export class CcxtOhlcvProvider implements OhlcvProvider {
	readonly name: string;
	private readonly exchange: CcxtExchangeLike;
	private readonly resolveSymbol: (instrument: string) => string;
	private marketsLoaded = false;

	constructor(options: CcxtOhlcvProviderOptions) {
		this.exchange = options.exchange;
		this.name = `ccxt:${options.exchange.id}`;
		this.resolveSymbol = options.resolveSymbol ?? toMarketSymbol;
	}

	async fetchOHLCV(request: OhlcvRequest): Promise<OhlcvRecord[]> {
		try {
			const marketSymbol = await this.resolveMarketSymbol(request.instrument);
			const rows = await this.exchange.fetchOHLCV(
				marketSymbol,
				request.timeframe,
				request.since,
				request.limit
			);
			return rows.map((row) =>
				mapCcxtRowToRecord(row, request.instrument, request.timeframe)
			);
		} catch (error) {
			throw mapCcxtError(error);
		}
	}

	private async resolveMarketSymbol(instrument: string): Promise<string> {
		await this.ensureMarketsLoaded();
		return this.exchange.market(this.resolveSymbol(instrument)).symbol;
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.exchange.loadMarkets();
		this.marketsLoaded = true;
		ccxtLogger.info("markets_loaded", { exchange: this.exchange.id });
	}
}

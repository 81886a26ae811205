export {
	CcxtOhlcvProvider,
	SUPPORTED_EXCHANGES,
	createCcxtExchange,
	toMarketSymbol,
} from "./ccxtProvider";
export type { CcxtExchangeLike, CcxtOhlcvProviderOptions } from "./ccxtProvider";
export { mapCcxtError } from "./errors";

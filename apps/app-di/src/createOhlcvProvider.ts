import type { ProviderConfig } from "@tickcast/core";
import type { OhlcvProvider } from "@tickcast/data";
import { CcxtOhlcvProvider, createCcxtExchange } from "@tickcast/exchange-ccxt";

const DEFAULT_PROVIDER_TIMEOUT_MS = 15_000;

export const createOhlcvProvider = (
	config: ProviderConfig,
	options: { timeoutMs?: number } = {}
): OhlcvProvider => {
	const exchange = createCcxtExchange(config.exchange, {
		timeoutMs: options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
	});
	return new CcxtOhlcvProvider({ exchange });
};

import {
	BadSymbol,
	DDoSProtection,
	NetworkError,
	RateLimitExceeded,
} from "ccxt";
import {
	CollectorError,
	NotFoundError,
	ProviderError,
	RateLimitExceededError,
	TransientError,
	errorMessage,
} from "@tickcast/core";

/**
 * ccxt error hierarchy → fetch taxonomy. Order matters: RateLimitExceeded
 * and DDoSProtection are NetworkError subclasses.
 */
export const mapCcxtError = (error: unknown): CollectorError => {
	if (error instanceof CollectorError) {
		return error;
	}
	const message = errorMessage(error);
	if (error instanceof RateLimitExceeded || error instanceof DDoSProtection) {
		return new RateLimitExceededError(message, { cause: error });
	}
	if (error instanceof NetworkError) {
		return new TransientError(message, { cause: error });
	}
	if (error instanceof BadSymbol) {
		return new NotFoundError(message, { cause: error });
	}
	return new ProviderError(message, { cause: error });
};

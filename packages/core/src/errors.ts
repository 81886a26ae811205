export type FetchErrorKind =
	| "RateLimitExceeded"
	| "Transient"
	| "NotFound"
	| "ProviderError";

export type CollectorErrorKind = FetchErrorKind | "PublishFailure" | "ConfigError";

export class CollectorError extends Error {
	readonly kind: CollectorErrorKind;

	constructor(kind: CollectorErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.kind = kind;
	}
}

/** Provider rejected the call for quota reasons despite local limiting. */
export class RateLimitExceededError extends CollectorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("RateLimitExceeded", message, options);
	}
}

/** Network failure or timeout. */
export class TransientError extends CollectorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("Transient", message, options);
	}
}

/** Provider does not know the instrument. Never retried. */
export class NotFoundError extends CollectorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("NotFound", message, options);
	}
}

/** Malformed or unexpected provider response. */
export class ProviderError extends CollectorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("ProviderError", message, options);
	}
}

export class PublishFailureError extends CollectorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("PublishFailure", message, options);
	}
}

export class ConfigError extends CollectorError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("ConfigError", message, options);
	}
}

/** Terminal fetch failure after the retry policy gave up. */
export class FetchFailedError extends CollectorError {
	readonly attempts: number;

	constructor(
		kind: FetchErrorKind,
		message: string,
		attempts: number,
		options?: { cause?: unknown }
	) {
		super(kind, message, options);
		this.attempts = attempts;
	}
}

export const errorMessage = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

export const isFetchErrorKind = (kind: CollectorErrorKind): kind is FetchErrorKind =>
	kind === "RateLimitExceeded" ||
	kind === "Transient" ||
	kind === "NotFound" ||
	kind === "ProviderError";

/** Anything thrown by a provider that is not already classified is a ProviderError. */
export const toCollectorError = (error: unknown): CollectorError => {
	if (error instanceof CollectorError) {
		return error;
	}
	return new ProviderError(errorMessage(error), { cause: error });
};

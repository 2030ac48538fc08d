import type { TradingPair } from "./types";

export type TradingErrorCode =
	| "DATA_ERROR"
	| "DATA_UNAVAILABLE"
	| "STRATEGY_ERROR"
	| "INSUFFICIENT_SIZING"
	| "BROKER_ERROR"
	| "STATE_ERROR"
	| "CONFIG_ERROR"
	| "LEDGER_ERROR"
	| "POSITION_CONFLICT"
	| "POSITION_LIMIT";

export class TradingError extends Error {
	readonly code: TradingErrorCode;

	constructor(code: TradingErrorCode, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Missing or short price window. Recovered locally by skipping the pair. */
export class DataError extends TradingError {
	constructor(message: string, options?: ErrorOptions) {
		super("DATA_ERROR", message, options);
	}
}

export class DataUnavailableError extends DataError {
	constructor(
		readonly symbol: string,
		readonly from: number,
		readonly to: number,
		options?: ErrorOptions
	) {
		super(
			`Price data unavailable for ${symbol} between ${new Date(
				from
			).toISOString()} and ${new Date(to).toISOString()}`,
			options
		);
	}
}

export class StrategyError extends TradingError {
	constructor(
		readonly strategy: string,
		readonly symbol: string,
		message: string,
		options?: ErrorOptions
	) {
		super("STRATEGY_ERROR", `[${strategy}/${symbol}] ${message}`, options);
	}
}

export type SizingRejection = "zero_quantity" | "max_positions" | "capital_exhausted";

export class InsufficientSizingError extends TradingError {
	constructor(
		readonly rejection: SizingRejection,
		message: string
	) {
		super("INSUFFICIENT_SIZING", message);
	}
}

export class BrokerError extends TradingError {
	constructor(
		message: string,
		readonly kind: "auth" | "rate_limit" | "rejected" | "network" | "unknown" = "unknown",
		options?: ErrorOptions
	) {
		super("BROKER_ERROR", message, options);
	}
}

/** Corrupt or unreadable checkpoint. Halts the affected pair only. */
export class StateError extends TradingError {
	constructor(
		readonly pair: Pick<TradingPair, "symbol" | "strategy">,
		message: string,
		options?: ErrorOptions
	) {
		super("STATE_ERROR", message, options);
	}
}

export class ConfigError extends TradingError {
	constructor(message: string, options?: ErrorOptions) {
		super("CONFIG_ERROR", message, options);
	}
}

export class LedgerError extends TradingError {
	constructor(message: string) {
		super("LEDGER_ERROR", message);
	}
}

export class PositionConflictError extends TradingError {
	constructor(symbol: string, strategy: string) {
		super(
			"POSITION_CONFLICT",
			`An open position already exists for ${symbol}/${strategy}`
		);
	}
}

export class PositionLimitError extends TradingError {
	constructor(limit: number) {
		super(
			"POSITION_LIMIT",
			`Opening another position would exceed the limit of ${limit} concurrent positions`
		);
	}
}

export const isTradingError = (value: unknown): value is TradingError =>
	value instanceof TradingError;

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

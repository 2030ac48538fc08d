import type {
	BrokerError,
	Instrument,
	StateError,
	Strategy,
	TradingError,
	TradingPair,
} from "@algorunner/core";

/** A configured pair resolved to its instrument and strategy instance. */
export interface ActivePair {
	readonly pair: TradingPair;
	readonly instrument: Instrument;
	readonly strategy: Strategy;
}

export type BacktestPairStatus =
	| "pending"
	| "running"
	| "caught_up"
	| "data_error"
	| "failed"
	| "halted";

export interface BacktestProgress {
	symbol: string;
	strategy: string;
	/** Last persisted cursor, `null` until the checkpoint has been read. */
	cursor: string | null;
	tradeCount: number;
	realizedPnl: number;
	status: BacktestPairStatus;
	lastError?: string;
}

export type EngineEvent =
	| {
			type: "broker_error";
			symbol: string;
			strategy?: string;
			error: BrokerError;
	  }
	| {
			type: "state_error";
			symbol: string;
			strategy: string;
			error: StateError;
	  }
	| {
			/** A filled entry the ledger refused; `flattened` is false if the unwind order failed too. */
			type: "position_unbooked";
			symbol: string;
			strategy: string;
			orderId: string;
			flattened: boolean;
			error: TradingError;
	  };

export interface EngineNotifier {
	notify(event: EngineEvent): void | Promise<void>;
}

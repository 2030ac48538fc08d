export interface Candle {
	symbol: string;
	timeframe: string;
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
}

/**
 * Tradable instrument as loaded from a broker master list. Immutable once
 * loaded; looked up by (segment, symbol).
 */
export interface Instrument {
	readonly symbol: string;
	readonly segment: string;
	readonly exchange: string;
	readonly lotSize: number;
	readonly tickSize: number;
	readonly token: string;
	readonly name?: string;
	/** Broker trading symbol when it differs from `symbol`. */
	readonly tradingSymbol?: string;
}

export type SignalAction = "BUY" | "SELL";
export type OrderKind = "MARKET" | "LIMIT";
export type OrderSide = "buy" | "sell";

export interface TradeSignal {
	action: SignalAction;
	orderKind: OrderKind;
	price: number;
	stopLoss: number;
	target: number;
	reason: string;
}

export type PositionStatus = "OPEN" | "CLOSED";

export type ExitReason = "stopped_out" | "target_hit" | "manual" | "session_end";

export type ExecutionMode = "paper" | "live";
export type TradeMode = ExecutionMode | "backtest";

export interface Position {
	readonly id: string;
	readonly symbol: string;
	readonly segment: string;
	readonly strategy: string;
	readonly side: SignalAction;
	readonly entryPrice: number;
	readonly quantity: number;
	readonly stopLoss: number;
	readonly target: number;
	readonly status: PositionStatus;
	readonly openedAt: number;
	readonly closedAt?: number;
	readonly exitPrice?: number;
	readonly exitReason?: ExitReason;
	readonly realizedPnl?: number;
}

export interface TradeRecord {
	readonly positionId: string;
	readonly symbol: string;
	readonly segment: string;
	readonly strategy: string;
	readonly side: SignalAction;
	readonly quantity: number;
	readonly entryPrice: number;
	readonly exitPrice: number;
	readonly stopLoss: number;
	readonly target: number;
	readonly openedAt: number;
	readonly closedAt: number;
	readonly exitReason: ExitReason;
	readonly realizedPnl: number;
	readonly mode: TradeMode;
	readonly note?: string;
}

export interface RiskPolicy {
	readonly capital: number;
	/** Percent of capital risked per trade, e.g. 2 for 2%. */
	readonly riskPerTradePct: number;
	readonly maxConcurrentPositions: number;
}

/** A (symbol, strategy) combination tracked independently. */
export interface TradingPair {
	readonly segment: string;
	readonly symbol: string;
	readonly strategy: string;
}

export interface BacktestCheckpoint {
	version: 1;
	symbol: string;
	strategy: string;
	/** ISO-8601 UTC timestamp of the last processed window end. */
	cursor: string;
	tradeCount: number;
	realizedPnl: number;
	updatedAt: string;
}

export type SchedulerPhase = "IDLE" | "POLLING" | "PROCESSING_CHUNK";

export const pairKey = (pair: Pick<TradingPair, "symbol" | "strategy">): string =>
	`${pair.symbol}::${pair.strategy}`;

export * from "./types";
export { resolveActivePairs } from "./activePairs";
export { LoggingNotifier, deliver } from "./notifier";
export { MemoryTradeJournal } from "./tradeJournal";
export type { TradeJournal } from "./tradeJournal";
export { QuoteCache } from "./quoteCache";
export type { Quote } from "./quoteCache";
export { SignalPipeline } from "./pipeline/signalPipeline";
export type {
	PipelineOutcome,
	PipelineSkipReason,
	SignalPipelineOptions,
} from "./pipeline/signalPipeline";
export {
	BacktestReplayScheduler,
	nextChunkWindow,
} from "./backtest/BacktestReplayScheduler";
export type {
	BacktestReplaySchedulerOptions,
	BacktestRunReport,
	ChunkOutcome,
	ChunkWindow,
	ReplaySettings,
} from "./backtest/BacktestReplayScheduler";
export { RealtimeScheduler } from "./realtime/RealtimeScheduler";
export type {
	RealtimeSchedulerOptions,
	SymbolTickResult,
	TickOutcome,
} from "./realtime/RealtimeScheduler";
export { TradingEngine } from "./TradingEngine";
export type { TradingEngineOptions } from "./TradingEngine";

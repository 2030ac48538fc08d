import {
	ConfigError,
	SystemClock,
	type CheckpointStore,
	type Clock,
	type OrderGateway,
	type PriceDataSource,
	type RunnerConfig,
} from "@algorunner/core";
import { ClientPriceSource, CsvPriceSource } from "@algorunner/data";
import {
	KeyedLock,
	OrderRouter,
	PositionLedger,
} from "@algorunner/execution-engine";
import { FileCheckpointStore } from "@algorunner/persistence";
import { RiskSizer } from "@algorunner/risk-engine";
import {
	BacktestReplayScheduler,
	LoggingNotifier,
	MemoryTradeJournal,
	QuoteCache,
	RealtimeScheduler,
	SignalPipeline,
	TradingEngine,
	type EngineNotifier,
	type TradeJournal,
} from "@algorunner/runtime";

import {
	createBrokerClient,
	hasBrokerCredentials,
	type BrokerClient,
} from "./createBrokerClient";
import type { RuntimeContext } from "./loadRuntime";

export interface EngineOverrides {
	clock?: Clock;
	notifier?: EngineNotifier;
	journal?: TradeJournal;
	priceSource?: PriceDataSource;
	checkpoints?: CheckpointStore;
	broker?: BrokerClient;
}

export interface WiredEngine {
	engine: TradingEngine;
	clock: Clock;
	notifier: EngineNotifier;
	journal: TradeJournal;
}

const createPipeline = (
	config: RunnerConfig,
	notifier: EngineNotifier,
	journal: TradeJournal,
	gateway?: OrderGateway
): SignalPipeline =>
	new SignalPipeline({
		ledger: new PositionLedger({
			capital: config.risk.capital,
			maxConcurrentPositions: config.risk.maxConcurrentPositions,
			mode: config.mode,
		}),
		router: new OrderRouter({ mode: config.mode, gateway }),
		sizer: new RiskSizer(config.risk),
		notifier,
		journal,
	});

/**
 * Engine whose replay scheduler reads CSV price files and JSON checkpoints
 * from the configured directories.
 */
export const createBacktestEngine = (
	context: RuntimeContext,
	overrides: EngineOverrides = {}
): WiredEngine => {
	const { config, pairs } = context;
	const clock = overrides.clock ?? new SystemClock();
	const notifier = overrides.notifier ?? new LoggingNotifier();
	const journal = overrides.journal ?? new MemoryTradeJournal();

	const backtest = new BacktestReplayScheduler({
		pairs,
		priceSource:
			overrides.priceSource ?? new CsvPriceSource({ dataDir: config.backtest.dataDir }),
		checkpoints:
			overrides.checkpoints ?? new FileCheckpointStore(config.backtest.stateDir),
		clock,
		risk: config.risk,
		settings: config.backtest,
		timeframe: config.timeframe,
		notifier,
		journal,
	});

	const engine = new TradingEngine({
		pipeline: createPipeline({ ...config, mode: "paper" }, notifier, journal),
		lock: new KeyedLock(),
		quoteCache: new QuoteCache(),
		clock,
		notifier,
		backtest,
	});
	return { engine, clock, notifier, journal };
};

/**
 * Engine polling the configured broker. Orders reach the venue only in live
 * mode, which needs broker credentials.
 */
export const createRealtimeEngine = (
	context: RuntimeContext,
	overrides: EngineOverrides = {}
): WiredEngine => {
	const { config, pairs } = context;
	const canTrade = overrides.broker !== undefined || hasBrokerCredentials(config.broker);
	if (config.mode === "live" && !canTrade) {
		throw new ConfigError(
			"Live mode needs BROKER_API_KEY and BROKER_API_SECRET to be set"
		);
	}

	const clock = overrides.clock ?? new SystemClock();
	const notifier = overrides.notifier ?? new LoggingNotifier();
	const journal = overrides.journal ?? new MemoryTradeJournal();
	const broker = overrides.broker ?? createBrokerClient(config.broker);
	const pipeline = createPipeline(
		config,
		notifier,
		journal,
		canTrade ? broker : undefined
	);
	const lock = new KeyedLock();
	const quoteCache = new QuoteCache();

	const realtime = new RealtimeScheduler({
		pairs,
		pipeline,
		quotes: broker,
		priceSource: overrides.priceSource ?? new ClientPriceSource({ client: broker }),
		quoteCache,
		lock,
		clock,
		settings: config.realtime,
		timeframe: config.timeframe,
		notifier,
	});

	const engine = new TradingEngine({
		pipeline,
		lock,
		quoteCache,
		clock,
		notifier,
		quotes: broker,
		realtime,
	});
	return { engine, clock, notifier, journal };
};

import {
	BrokerError,
	DataError,
	createLogger,
	describeError,
	isWithinTradingHours,
	timeframeToMs,
	type Candle,
	type Clock,
	type ModuleLogger,
	type PriceDataSource,
	type QuoteSource,
	type RealtimeSettings,
	type SchedulerPhase,
} from "@algorunner/core";
import type { KeyedLock } from "@algorunner/execution-engine";

import { deliver } from "../notifier";
import type { PipelineOutcome, SignalPipeline } from "../pipeline/signalPipeline";
import type { QuoteCache } from "../quoteCache";
import type { ActivePair, EngineNotifier } from "../types";

export interface RealtimeSchedulerOptions {
	pairs: readonly ActivePair[];
	pipeline: SignalPipeline;
	quotes: QuoteSource;
	priceSource: PriceDataSource;
	quoteCache: QuoteCache;
	lock: KeyedLock;
	clock: Clock;
	settings: RealtimeSettings;
	timeframe: string;
	notifier: EngineNotifier;
	logger?: ModuleLogger;
}

export interface SymbolTickResult {
	symbol: string;
	price?: number;
	exits: number;
	outcomes: Array<{ strategy: string; outcome: PipelineOutcome }>;
	error?: string;
}

export type TickOutcome =
	| { status: "outside_hours" }
	| { status: "polled"; symbols: SymbolTickResult[] };

/**
 * Polling loop for live and paper trading. Inside trading hours each tick
 * refreshes quotes, applies exits and evaluates every pair; outside them
 * nothing is fetched.
 */
export class RealtimeScheduler {
	private readonly logger: ModuleLogger;
	private readonly bySymbol: ReadonlyMap<string, ActivePair[]>;
	private phase: SchedulerPhase = "IDLE";

	constructor(private readonly options: RealtimeSchedulerOptions) {
		this.logger = options.logger ?? createLogger("runtime:realtime");
		const grouped = new Map<string, ActivePair[]>();
		for (const active of options.pairs) {
			const list = grouped.get(active.pair.symbol) ?? [];
			list.push(active);
			grouped.set(active.pair.symbol, list);
		}
		this.bySymbol = grouped;
	}

	getPhase(): SchedulerPhase {
		return this.phase;
	}

	async tick(): Promise<TickOutcome> {
		const now = this.options.clock.now();
		if (!isWithinTradingHours(now, this.options.settings.tradingHours)) {
			if (this.phase !== "IDLE") {
				this.logger.info("trading_hours_closed", { at: new Date(now) });
			}
			this.phase = "IDLE";
			return { status: "outside_hours" };
		}
		if (this.phase !== "POLLING") {
			this.logger.info("trading_hours_open", { at: new Date(now) });
		}
		this.phase = "POLLING";

		const symbols = await Promise.all(
			Array.from(this.bySymbol.entries(), ([symbol, pairs]) =>
				this.options.lock.run(symbol, () => this.processSymbol(symbol, pairs, now))
			)
		);
		return { status: "polled", symbols };
	}

	/**
	 * Tick until `signal` aborts. A failed tick is logged and the loop keeps
	 * polling.
	 */
	async start(signal: AbortSignal): Promise<void> {
		const { clock, settings } = this.options;
		this.logger.info("realtime_started", {
			pairs: this.options.pairs.map(({ pair }) => `${pair.symbol}::${pair.strategy}`),
			pollIntervalMs: settings.pollIntervalMs,
		});
		while (!signal.aborted) {
			try {
				await this.tick();
			} catch (error) {
				this.logger.error("tick_failed", { error: describeError(error) });
			}
			try {
				await clock.sleep(settings.pollIntervalMs, signal);
			} catch (error) {
				if (signal.aborted) {
					break;
				}
				throw error;
			}
		}
		this.phase = "IDLE";
		this.logger.info("realtime_stopped", {});
	}

	private async processSymbol(
		symbol: string,
		pairs: readonly ActivePair[],
		now: number
	): Promise<SymbolTickResult> {
		const { pipeline, quotes, quoteCache, priceSource, settings, timeframe } =
			this.options;
		const result: SymbolTickResult = { symbol, exits: 0, outcomes: [] };

		let price: number;
		try {
			price = await quotes.fetchLastPrice(symbol);
		} catch (error) {
			return this.fail(result, error);
		}
		quoteCache.set(symbol, price, now);
		result.price = price;

		const closed = await pipeline.applyExits(symbol, {
			high: price,
			low: price,
			timestamp: now,
		});
		result.exits = closed.length;

		let series: Candle[];
		try {
			series = await priceSource.fetchSeries(
				pairs[0].instrument,
				now - settings.lookbackBars * timeframeToMs(timeframe),
				now + 1,
				timeframe
			);
		} catch (error) {
			return this.fail(result, error);
		}

		for (const active of pairs) {
			const outcome = await pipeline.evaluate(active, series, now);
			result.outcomes.push({ strategy: active.pair.strategy, outcome });
		}
		return result;
	}

	private async fail(result: SymbolTickResult, error: unknown): Promise<SymbolTickResult> {
		if (error instanceof BrokerError) {
			await deliver(this.options.notifier, {
				type: "broker_error",
				symbol: result.symbol,
				error,
			});
		} else if (error instanceof DataError) {
			this.logger.warn("series_unavailable", {
				symbol: result.symbol,
				error: error.message,
			});
		} else {
			throw error;
		}
		return { ...result, error: error.message };
	}
}

import {
	BrokerError,
	DataError,
	StateError,
	addUtcMonths,
	createLogger,
	describeError,
	normalizeSeries,
	pairKey,
	timeframeToMs,
	toIsoUtc,
	type BacktestCheckpoint,
	type BacktestSettings,
	type Candle,
	type CheckpointStore,
	type Clock,
	type ModuleLogger,
	type PriceDataSource,
	type RiskPolicy,
	type SchedulerPhase,
	type TradeRecord,
} from "@algorunner/core";
import { OrderRouter, PositionLedger } from "@algorunner/execution-engine";
import { RiskSizer } from "@algorunner/risk-engine";

import { deliver } from "../notifier";
import { SignalPipeline } from "../pipeline/signalPipeline";
import type { TradeJournal } from "../tradeJournal";
import type {
	ActivePair,
	BacktestProgress,
	EngineNotifier,
} from "../types";

export type ReplaySettings = Pick<
	BacktestSettings,
	"startDate" | "chunkMonths" | "chunksPerRun" | "historyWindowBars"
>;

export interface BacktestReplaySchedulerOptions {
	pairs: readonly ActivePair[];
	priceSource: PriceDataSource;
	checkpoints: CheckpointStore;
	clock: Clock;
	risk: RiskPolicy;
	settings: ReplaySettings;
	timeframe: string;
	notifier: EngineNotifier;
	journal?: TradeJournal;
	logger?: ModuleLogger;
}

export interface ChunkWindow {
	from: number;
	to: number;
}

export type ChunkOutcome =
	| {
			status: "processed";
			window: ChunkWindow;
			bars: number;
			trades: TradeRecord[];
			checkpoint: BacktestCheckpoint;
	  }
	| { status: "caught_up"; cursor: number }
	| { status: "data_error"; error: DataError }
	| { status: "failed"; error: Error }
	| { status: "halted"; error: StateError }
	| { status: "aborted" };

export interface BacktestRunReport {
	chunksProcessed: number;
	tradesRecorded: number;
	aborted: boolean;
	results: Array<{ pair: string; outcome: ChunkOutcome }>;
}

/**
 * Next replay window for a cursor: `chunkMonths` calendar months, cut at
 * `now` and at the end of the available data. `null` once caught up.
 */
export const nextChunkWindow = (
	cursor: number,
	chunkMonths: number,
	now: number,
	coverageEnd: number | null = null
): ChunkWindow | null => {
	const to = Math.min(
		addUtcMonths(cursor, chunkMonths),
		now,
		coverageEnd ?? Number.POSITIVE_INFINITY
	);
	return cursor >= to ? null : { from: cursor, to };
};

/**
 * Resumable historical replay. Each pair walks forward from its checkpoint
 * one bounded chunk at a time; the checkpoint is rewritten only after a
 * chunk completes, so an interrupted run repeats at most that chunk.
 */
export class BacktestReplayScheduler {
	private readonly logger: ModuleLogger;
	private readonly sizer: RiskSizer;
	private readonly progress = new Map<string, BacktestProgress>();
	private readonly halted = new Map<string, StateError>();
	private phase: SchedulerPhase = "IDLE";

	constructor(private readonly options: BacktestReplaySchedulerOptions) {
		this.logger = options.logger ?? createLogger("runtime:backtest");
		this.sizer = new RiskSizer(options.risk);
		for (const { pair } of options.pairs) {
			this.progress.set(pairKey(pair), {
				symbol: pair.symbol,
				strategy: pair.strategy,
				cursor: null,
				tradeCount: 0,
				realizedPnl: 0,
				status: "pending",
			});
		}
	}

	getPhase(): SchedulerPhase {
		return this.phase;
	}

	getProgress(): Record<string, BacktestProgress> {
		return Object.fromEntries(
			Array.from(this.progress.entries(), ([key, value]) => [key, { ...value }])
		);
	}

	isHalted(pair: Pick<ActivePair["pair"], "symbol" | "strategy">): boolean {
		return this.halted.has(pairKey(pair));
	}

	/**
	 * One scheduler pass: up to `chunksPerRun` chunks for every pair that is
	 * neither halted nor caught up.
	 */
	async runOnce(signal?: AbortSignal): Promise<BacktestRunReport> {
		if (this.phase !== "IDLE") {
			throw new Error("Backtest replay is already running");
		}
		const report: BacktestRunReport = {
			chunksProcessed: 0,
			tradesRecorded: 0,
			aborted: false,
			results: [],
		};
		this.phase = "PROCESSING_CHUNK";
		try {
			for (const active of this.options.pairs) {
				const key = pairKey(active.pair);
				if (this.halted.has(key)) {
					this.logger.warn("pair_halted_skip", { pair: key });
					continue;
				}
				for (let chunk = 0; chunk < this.options.settings.chunksPerRun; chunk += 1) {
					if (signal?.aborted) {
						report.aborted = true;
						break;
					}
					const outcome = await this.processNextChunk(active, signal).catch(
						(error: unknown) => this.failChunk(active, error, signal)
					);
					report.results.push({ pair: key, outcome });
					if (outcome.status === "aborted") {
						report.aborted = true;
					}
					if (outcome.status !== "processed") {
						break;
					}
					report.chunksProcessed += 1;
					report.tradesRecorded += outcome.trades.length;
				}
				if (report.aborted) {
					break;
				}
			}
		} finally {
			this.phase = "IDLE";
		}
		return report;
	}

	/**
	 * Forget a pair's checkpoint and lift its halt. The next pass replays it
	 * from the configured start date.
	 */
	async resetPair(pair: Pick<ActivePair["pair"], "symbol" | "strategy">): Promise<void> {
		const key = pairKey(pair);
		await this.options.checkpoints.reset(pair);
		this.halted.delete(key);
		this.updateProgress(key, {
			cursor: null,
			tradeCount: 0,
			realizedPnl: 0,
			status: "pending",
			lastError: undefined,
		});
		this.logger.info("pair_reset", { pair: key });
	}

	private async processNextChunk(
		active: ActivePair,
		signal?: AbortSignal
	): Promise<ChunkOutcome> {
		const { pair, instrument } = active;
		const { checkpoints, clock, priceSource, settings, timeframe } = this.options;
		const key = pairKey(pair);

		const previous = await checkpoints.read(pair);

		const cursor = previous ? Date.parse(previous.cursor) : settings.startDate;
		const baseTrades = previous?.tradeCount ?? 0;
		const basePnl = previous?.realizedPnl ?? 0;
		this.updateProgress(key, {
			cursor: toIsoUtc(cursor),
			tradeCount: baseTrades,
			realizedPnl: basePnl,
		});

		const now = clock.now();
		const coverageEnd = priceSource.coverageEnd
			? await priceSource.coverageEnd(instrument, timeframe)
			: null;
		const window = nextChunkWindow(cursor, settings.chunkMonths, now, coverageEnd);
		if (!window) {
			this.updateProgress(key, { status: "caught_up" });
			this.logger.debug("pair_caught_up", { pair: key, cursor: toIsoUtc(cursor) });
			return { status: "caught_up", cursor };
		}
		this.updateProgress(key, { status: "running" });
		const warmupFrom = Math.max(
			0,
			window.from - settings.historyWindowBars * timeframeToMs(timeframe)
		);
		const series = normalizeSeries(
			await priceSource.fetchSeries(instrument, warmupFrom, window.to, timeframe, signal),
			warmupFrom,
			window.to
		);

		const { trades, bars } = await this.replay(active, series, window);
		if (signal?.aborted) {
			return { status: "aborted" };
		}

		const realizedPnl = trades.reduce((sum, trade) => sum + trade.realizedPnl, 0);
		const checkpoint: BacktestCheckpoint = {
			version: 1,
			symbol: pair.symbol,
			strategy: pair.strategy,
			cursor: toIsoUtc(window.to),
			tradeCount: baseTrades + trades.length,
			realizedPnl: basePnl + realizedPnl,
			updatedAt: toIsoUtc(now),
		};
		await checkpoints.write(pair, checkpoint);

		this.options.journal?.append(trades);
		this.updateProgress(key, {
			cursor: checkpoint.cursor,
			tradeCount: checkpoint.tradeCount,
			realizedPnl: checkpoint.realizedPnl,
			status: "running",
			lastError: undefined,
		});
		this.logger.info("chunk_processed", {
			symbol: pair.symbol,
			strategy: pair.strategy,
			from: toIsoUtc(window.from),
			to: checkpoint.cursor,
			bars,
			trades: trades.length,
			pnl: realizedPnl,
		});
		return { status: "processed", window, bars, trades, checkpoint };
	}

	/**
	 * Replay the chunk's bars through a fresh backtest ledger. Bars before
	 * `window.from` only feed the strategy's history.
	 */
	private async replay(
		active: ActivePair,
		series: readonly Candle[],
		window: ChunkWindow
	): Promise<{ trades: TradeRecord[]; bars: number }> {
		const { risk, notifier, settings } = this.options;
		const { pair } = active;
		const ledger = new PositionLedger({
			capital: risk.capital,
			maxConcurrentPositions: risk.maxConcurrentPositions,
			mode: "backtest",
			log: false,
		});
		const pipeline = new SignalPipeline({
			ledger,
			router: new OrderRouter({ mode: "paper" }),
			sizer: this.sizer,
			notifier,
			logger: this.logger,
		});

		let bars = 0;
		let lastClose: { price: number; at: number } | null = null;
		for (let index = 0; index < series.length; index += 1) {
			const bar = series[index];
			if (bar.timestamp < window.from) {
				continue;
			}
			bars += 1;
			await pipeline.applyExits(pair.symbol, bar);
			const history = series.slice(
				Math.max(0, index + 1 - settings.historyWindowBars),
				index + 1
			);
			await pipeline.evaluate(active, history, bar.timestamp);
			lastClose = { price: bar.close, at: bar.timestamp };
		}

		if (lastClose) {
			const { price, at } = lastClose;
			ledger.closeAll("session_end", () => price, at);
		}
		return { trades: [...ledger.getTrades()], bars };
	}

	/**
	 * Turn a chunk failure into that pair's outcome so the pass moves on to
	 * the next pair. Nothing was written, so the checkpoint stays where it was.
	 */
	private async failChunk(
		active: ActivePair,
		error: unknown,
		signal?: AbortSignal
	): Promise<ChunkOutcome> {
		const { pair } = active;
		const key = pairKey(pair);
		if (error instanceof StateError) {
			this.halted.set(key, error);
			this.updateProgress(key, { status: "halted", lastError: error.message });
			this.logger.error("pair_halted", { pair: key, error: describeError(error) });
			await deliver(this.options.notifier, {
				type: "state_error",
				symbol: pair.symbol,
				strategy: pair.strategy,
				error,
			});
			return { status: "halted", error };
		}
		if (signal?.aborted) {
			return { status: "aborted" };
		}
		if (error instanceof DataError) {
			this.updateProgress(key, { status: "data_error", lastError: error.message });
			this.logger.warn("chunk_data_error", { pair: key, error: error.message });
			return { status: "data_error", error };
		}

		const failure = error instanceof Error ? error : new Error(String(error));
		this.updateProgress(key, { status: "failed", lastError: failure.message });
		this.logger.error("chunk_failed", { pair: key, error: describeError(failure) });
		if (failure instanceof BrokerError) {
			await deliver(this.options.notifier, {
				type: "broker_error",
				symbol: pair.symbol,
				strategy: pair.strategy,
				error: failure,
			});
		}
		return { status: "failed", error: failure };
	}

	private updateProgress(key: string, patch: Partial<BacktestProgress>): void {
		const current = this.progress.get(key);
		if (current) {
			this.progress.set(key, { ...current, ...patch });
		}
	}
}

import {
	BrokerError,
	createLogger,
	type Clock,
	type ExecutionMode,
	type Position,
	type QuoteSource,
} from "@algorunner/core";
import type { KeyedLock, LedgerSummary } from "@algorunner/execution-engine";

import type { BacktestReplayScheduler } from "./backtest/BacktestReplayScheduler";
import { deliver } from "./notifier";
import type { SignalPipeline } from "./pipeline/signalPipeline";
import type { QuoteCache } from "./quoteCache";
import type { RealtimeScheduler } from "./realtime/RealtimeScheduler";
import type { BacktestProgress, EngineNotifier } from "./types";

const engineLogger = createLogger("runtime:engine");

export interface TradingEngineOptions {
	pipeline: SignalPipeline;
	lock: KeyedLock;
	quoteCache: QuoteCache;
	clock: Clock;
	notifier: EngineNotifier;
	/** Used when a position's symbol has no cached quote yet. */
	quotes?: QuoteSource;
	backtest?: BacktestReplayScheduler;
	realtime?: RealtimeScheduler;
}

/**
 * Control surface exposed to operators: positions, close-all, replay
 * progress, execution mode and PnL summary.
 */
export class TradingEngine {
	constructor(private readonly options: TradingEngineOptions) {}

	get realtime(): RealtimeScheduler | undefined {
		return this.options.realtime;
	}

	get backtest(): BacktestReplayScheduler | undefined {
		return this.options.backtest;
	}

	getOpenPositions(): Position[] {
		return this.options.pipeline.ledger.getOpenPositions();
	}

	/**
	 * Close every open position at its symbol's last price with exit reason
	 * `manual`. Runs under the per-symbol locks so it never interleaves with a
	 * realtime tick. Returns the number of positions closed.
	 */
	async closeAllPositions(reason = "close_all"): Promise<number> {
		const { pipeline, lock, clock } = this.options;
		const symbols = Array.from(
			new Set(this.getOpenPositions().map((position) => position.symbol))
		);
		const counts = await Promise.all(
			symbols.map((symbol) =>
				lock.run(symbol, async () => {
					const price = await this.priceFor(symbol);
					if (price === undefined) {
						return 0;
					}
					let closed = 0;
					const positions = pipeline.ledger
						.getOpenPositions()
						.filter((position) => position.symbol === symbol);
					for (const position of positions) {
						const record = await pipeline.closePosition(
							position,
							price,
							"manual",
							clock.now(),
							reason
						);
						if (record) {
							closed += 1;
						}
					}
					return closed;
				})
			)
		);
		const total = counts.reduce((sum, count) => sum + count, 0);
		engineLogger.info("positions_closed_all", { reason, closed: total });
		return total;
	}

	getBacktestProgress(): Record<string, BacktestProgress> {
		return this.options.backtest?.getProgress() ?? {};
	}

	getMode(): ExecutionMode {
		return this.options.pipeline.router.getMode();
	}

	switchMode(mode: ExecutionMode): void {
		this.options.pipeline.router.switchMode(mode);
		this.options.pipeline.ledger.setMode(mode);
	}

	getSummary(): LedgerSummary {
		return this.options.pipeline.ledger.summary(this.options.quoteCache.prices());
	}

	logSummary(): LedgerSummary {
		const summary = this.getSummary();
		engineLogger.info("engine_summary", { mode: this.getMode(), summary });
		return summary;
	}

	private async priceFor(symbol: string): Promise<number | undefined> {
		const cached = this.options.quoteCache.get(symbol);
		if (cached) {
			return cached.price;
		}
		if (!this.options.quotes) {
			engineLogger.warn("close_all_no_price", { symbol });
			return undefined;
		}
		try {
			const price = await this.options.quotes.fetchLastPrice(symbol);
			this.options.quoteCache.set(symbol, price, this.options.clock.now());
			return price;
		} catch (error) {
			if (!(error instanceof BrokerError)) {
				throw error;
			}
			await deliver(this.options.notifier, { type: "broker_error", symbol, error });
			return undefined;
		}
	}
}

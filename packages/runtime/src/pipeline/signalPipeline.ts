import {
	BrokerError,
	InsufficientSizingError,
	createLogger,
	evaluateSafely,
	isTradingError,
	type Candle,
	type ExitReason,
	type ModuleLogger,
	type OrderRequest,
	type Position,
	type TradeRecord,
	type TradeSignal,
} from "@algorunner/core";
import {
	KeyedLock,
	exitForBar,
	type BarRange,
	type OrderRouter,
	type PositionLedger,
	type RoutedOrder,
} from "@algorunner/execution-engine";
import type { RiskSizer } from "@algorunner/risk-engine";

import { deliver } from "../notifier";
import type { TradeJournal } from "../tradeJournal";
import type { ActivePair, EngineNotifier } from "../types";

export type PipelineSkipReason =
	| "insufficient_history"
	| "position_open"
	| "no_signal"
	| "strategy_error"
	| "sizing_rejected"
	| "broker_error"
	| "ledger_rejected";

export type PipelineOutcome =
	| { status: "opened"; position: Position }
	| { status: "skipped"; reason: PipelineSkipReason; detail?: string };

export interface SignalPipelineOptions {
	ledger: PositionLedger;
	router: OrderRouter;
	sizer: RiskSizer;
	notifier: EngineNotifier;
	journal?: TradeJournal;
	logger?: ModuleLogger;
}

const MIN_HISTORY_BARS = 2;
const ENTRY_LOCK_KEY = "entries";

/**
 * Shared bar → exits → signal → sizing → order → ledger path. Backtest and
 * realtime both drive positions through this class.
 *
 * Entries run one at a time across all symbols: sizing reads the ledger's
 * open count and deployed risk, and the position is booked only after the
 * order returns.
 */
export class SignalPipeline {
	private readonly logger: ModuleLogger;
	private readonly entries = new KeyedLock();

	constructor(private readonly options: SignalPipelineOptions) {
		this.logger = options.logger ?? createLogger("runtime:pipeline");
	}

	get ledger(): PositionLedger {
		return this.options.ledger;
	}

	get router(): OrderRouter {
		return this.options.router;
	}

	/**
	 * Close every open position on `symbol` whose stop-loss or target the bar
	 * touches. Positions whose exit order fails stay open.
	 */
	async applyExits(symbol: string, bar: BarRange): Promise<TradeRecord[]> {
		const closed: TradeRecord[] = [];
		const positions = this.options.ledger
			.getOpenPositions()
			.filter((position) => position.symbol === symbol);
		for (const position of positions) {
			const exit = exitForBar(position, bar);
			if (!exit) {
				continue;
			}
			const record = await this.closePosition(
				position,
				exit.price,
				exit.reason,
				bar.timestamp
			);
			if (record) {
				closed.push(record);
			}
		}
		return closed;
	}

	async closePosition(
		position: Position,
		price: number,
		reason: ExitReason,
		at: number,
		note?: string
	): Promise<TradeRecord | null> {
		const routed = await this.routeOrSkip(
			{
				symbol: position.symbol,
				side: position.side === "BUY" ? "sell" : "buy",
				quantity: position.quantity,
				orderKind: "MARKET",
			},
			price,
			position.strategy
		);
		if (!routed) {
			return null;
		}
		const record = this.options.ledger.close(
			position.id,
			routed.fillPrice,
			reason,
			at,
			note
		);
		this.options.journal?.append([record]);
		return record;
	}

	async evaluate(
		active: ActivePair,
		history: readonly Candle[],
		at: number
	): Promise<PipelineOutcome> {
		const { pair, instrument, strategy } = active;
		const { ledger } = this.options;

		if (history.length < MIN_HISTORY_BARS) {
			return { status: "skipped", reason: "insufficient_history" };
		}
		if (ledger.hasOpenPosition(pair.symbol, pair.strategy)) {
			return { status: "skipped", reason: "position_open" };
		}

		const evaluation = evaluateSafely(strategy, history, instrument);
		if (!evaluation.ok) {
			this.logger.warn("strategy_error", {
				symbol: pair.symbol,
				strategy: pair.strategy,
				error: evaluation.error.message,
			});
			return {
				status: "skipped",
				reason: "strategy_error",
				detail: evaluation.error.message,
			};
		}
		const signal = evaluation.signal;
		if (!signal) {
			return { status: "skipped", reason: "no_signal" };
		}

		return this.entries.run(ENTRY_LOCK_KEY, () => this.enter(active, signal, at));
	}

	private async enter(
		active: ActivePair,
		signal: TradeSignal,
		at: number
	): Promise<PipelineOutcome> {
		const { pair, instrument } = active;
		const { ledger, sizer, notifier } = this.options;

		let quantity: number;
		try {
			quantity = sizer.size({
				signal,
				instrument,
				openPositions: ledger.openCount,
				deployedRisk: ledger.deployedRisk,
			}).quantity;
		} catch (error) {
			if (error instanceof InsufficientSizingError) {
				this.logger.info("signal_rejected", {
					symbol: pair.symbol,
					strategy: pair.strategy,
					rejection: error.rejection,
					reason: error.message,
				});
				return { status: "skipped", reason: "sizing_rejected", detail: error.message };
			}
			throw error;
		}

		const routed = await this.routeOrSkip(
			{
				symbol: pair.symbol,
				side: signal.action === "BUY" ? "buy" : "sell",
				quantity,
				orderKind: signal.orderKind,
				price: signal.orderKind === "LIMIT" ? signal.price : undefined,
			},
			signal.price,
			pair.strategy
		);
		if (!routed) {
			return { status: "skipped", reason: "broker_error" };
		}

		try {
			const position = ledger.openPosition({
				symbol: pair.symbol,
				segment: pair.segment,
				strategy: pair.strategy,
				side: signal.action,
				entryPrice: routed.fillPrice,
				quantity,
				stopLoss: signal.stopLoss,
				target: signal.target,
				lotSize: instrument.lotSize,
				openedAt: at,
			});
			return { status: "opened", position };
		} catch (error) {
			if (!isTradingError(error)) {
				throw error;
			}
			this.logger.error("position_rejected", {
				symbol: pair.symbol,
				strategy: pair.strategy,
				orderId: routed.confirmation.id,
				fillPrice: routed.fillPrice,
				error: error.message,
			});
			// The fill exists at the venue but not in the ledger: unwind it.
			const flattened = await this.routeOrSkip(
				{
					symbol: pair.symbol,
					side: signal.action === "BUY" ? "sell" : "buy",
					quantity,
					orderKind: "MARKET",
				},
				routed.fillPrice,
				pair.strategy
			);
			await deliver(notifier, {
				type: "position_unbooked",
				symbol: pair.symbol,
				strategy: pair.strategy,
				orderId: routed.confirmation.id,
				flattened: flattened !== null,
				error,
			});
			return { status: "skipped", reason: "ledger_rejected", detail: error.message };
		}
	}

	private async routeOrSkip(
		request: OrderRequest,
		referencePrice: number,
		strategy: string
	): Promise<RoutedOrder | null> {
		try {
			return await this.options.router.route(request, referencePrice);
		} catch (error) {
			if (!(error instanceof BrokerError)) {
				throw error;
			}
			await deliver(this.options.notifier, {
				type: "broker_error",
				symbol: request.symbol,
				strategy,
				error,
			});
			return null;
		}
	}
}

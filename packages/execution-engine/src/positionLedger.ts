import {
	createLogger,
	LedgerError,
	PositionConflictError,
	PositionLimitError,
	pairKey,
	type ExitReason,
	type Position,
	type SignalAction,
	type TradeMode,
	type TradeRecord,
} from "@algorunner/core";

import { PaperAccount, type AccountSnapshot } from "./paperAccount";

const ledgerLogger = createLogger("execution-engine:ledger");

export interface OpenPositionRequest {
	symbol: string;
	segment: string;
	strategy: string;
	side: SignalAction;
	entryPrice: number;
	quantity: number;
	stopLoss: number;
	target: number;
	lotSize: number;
	openedAt: number;
}

export interface BarRange {
	high: number;
	low: number;
	timestamp: number;
}

export interface LedgerSummary {
	openPositions: number;
	closedTrades: number;
	wins: number;
	losses: number;
	winRate: number;
	realizedPnl: number;
	unrealizedPnl: number;
	totalPnl: number;
	account: AccountSnapshot;
}

export interface PositionLedgerOptions {
	capital: number;
	maxConcurrentPositions: number;
	mode: TradeMode;
	log?: boolean;
}

export type PriceLookup = (position: Position) => number | undefined;

const LOT_EPSILON = 1e-9;

export const realizedPnlFor = (
	side: SignalAction,
	entryPrice: number,
	exitPrice: number,
	quantity: number
): number =>
	side === "BUY"
		? (exitPrice - entryPrice) * quantity
		: (entryPrice - exitPrice) * quantity;

/**
 * Bar exit check. Stop-loss wins when one bar touches both levels.
 */
export const exitForBar = (
	position: Pick<Position, "side" | "stopLoss" | "target">,
	bar: Pick<BarRange, "high" | "low">
): { reason: ExitReason; price: number } | null => {
	if (position.side === "BUY") {
		if (bar.low <= position.stopLoss) {
			return { reason: "stopped_out", price: position.stopLoss };
		}
		if (bar.high >= position.target) {
			return { reason: "target_hit", price: position.target };
		}
		return null;
	}
	if (bar.high >= position.stopLoss) {
		return { reason: "stopped_out", price: position.stopLoss };
	}
	if (bar.low <= position.target) {
		return { reason: "target_hit", price: position.target };
	}
	return null;
};

/**
 * Owns every position and the append-only trade journal. Exactly one OPEN
 * position per (symbol, strategy); OPEN -> CLOSED only.
 */
export class PositionLedger {
	private readonly open = new Map<string, Position>();
	private readonly closedById = new Map<string, Position>();
	private readonly trades: TradeRecord[] = [];
	private readonly account: PaperAccount;
	private mode: TradeMode;
	private sequence = 0;

	constructor(private readonly options: PositionLedgerOptions) {
		this.mode = options.mode;
		this.account = new PaperAccount(options.capital);
	}

	get openCount(): number {
		return this.open.size;
	}

	/** Σ quantity × |entry − stop| over open positions. */
	get deployedRisk(): number {
		let total = 0;
		for (const position of this.open.values()) {
			total += position.quantity * Math.abs(position.entryPrice - position.stopLoss);
		}
		return total;
	}

	getMode(): TradeMode {
		return this.mode;
	}

	setMode(mode: TradeMode): void {
		this.mode = mode;
	}

	openPosition(request: OpenPositionRequest): Position {
		const key = pairKey(request);
		if (this.open.has(key)) {
			throw new PositionConflictError(request.symbol, request.strategy);
		}
		if (this.open.size >= this.options.maxConcurrentPositions) {
			throw new PositionLimitError(this.options.maxConcurrentPositions);
		}
		this.validateRequest(request);

		this.sequence += 1;
		const position: Position = Object.freeze({
			id: `${request.strategy}:${request.symbol}:${request.openedAt}:${this.sequence}`,
			symbol: request.symbol,
			segment: request.segment,
			strategy: request.strategy,
			side: request.side,
			entryPrice: request.entryPrice,
			quantity: request.quantity,
			stopLoss: request.stopLoss,
			target: request.target,
			status: "OPEN",
			openedAt: request.openedAt,
		});
		this.open.set(key, position);

		if (this.options.log !== false) {
			ledgerLogger.info("position_opened", { ...position, mode: this.mode });
		}
		return position;
	}

	/**
	 * Apply stop-loss and target exits for every open position on `symbol`
	 * against the bar's range.
	 */
	evaluateBar(symbol: string, bar: BarRange): TradeRecord[] {
		const closed: TradeRecord[] = [];
		for (const position of this.positionsFor(symbol)) {
			const exit = exitForBar(position, bar);
			if (exit) {
				closed.push(this.close(position.id, exit.price, exit.reason, bar.timestamp));
			}
		}
		return closed;
	}

	markPrice(symbol: string, price: number, at: number): TradeRecord[] {
		return this.evaluateBar(symbol, { high: price, low: price, timestamp: at });
	}

	close(
		id: string,
		exitPrice: number,
		reason: ExitReason,
		at: number,
		note?: string
	): TradeRecord {
		const entry = Array.from(this.open.entries()).find(
			([, position]) => position.id === id
		);
		if (!entry) {
			if (this.closedById.has(id)) {
				throw new LedgerError(`Position ${id} is already closed`);
			}
			throw new LedgerError(`Unknown position ${id}`);
		}
		if (!Number.isFinite(exitPrice) || exitPrice <= 0) {
			throw new LedgerError(`Exit price for ${id} must be positive, got ${exitPrice}`);
		}
		const [key, position] = entry;
		const realizedPnl = realizedPnlFor(
			position.side,
			position.entryPrice,
			exitPrice,
			position.quantity
		);
		const closedPosition: Position = Object.freeze({
			...position,
			status: "CLOSED",
			closedAt: at,
			exitPrice,
			exitReason: reason,
			realizedPnl,
		});
		this.open.delete(key);
		this.closedById.set(id, closedPosition);

		const record: TradeRecord = Object.freeze({
			positionId: position.id,
			symbol: position.symbol,
			segment: position.segment,
			strategy: position.strategy,
			side: position.side,
			quantity: position.quantity,
			entryPrice: position.entryPrice,
			exitPrice,
			stopLoss: position.stopLoss,
			target: position.target,
			openedAt: position.openedAt,
			closedAt: at,
			exitReason: reason,
			realizedPnl,
			mode: this.mode,
			...(note ? { note } : {}),
		});
		this.trades.push(record);
		this.account.registerClosedTrade(realizedPnl);

		if (this.options.log !== false) {
			ledgerLogger.info("position_closed", { ...record });
		}
		return record;
	}

	/**
	 * Close every open position at the price `priceFor` returns. Positions
	 * without a price are left open and reported in `skipped`.
	 */
	closeAll(
		reason: ExitReason,
		priceFor: PriceLookup,
		at: number,
		note?: string
	): { closed: TradeRecord[]; skipped: Position[] } {
		const closed: TradeRecord[] = [];
		const skipped: Position[] = [];
		for (const position of this.getOpenPositions()) {
			const price = priceFor(position);
			if (price === undefined) {
				skipped.push(position);
				continue;
			}
			closed.push(this.close(position.id, price, reason, at, note));
		}
		return { closed, skipped };
	}

	getOpenPositions(): Position[] {
		return Array.from(this.open.values());
	}

	getOpenPosition(symbol: string, strategy: string): Position | undefined {
		return this.open.get(pairKey({ symbol, strategy }));
	}

	hasOpenPosition(symbol: string, strategy: string): boolean {
		return this.open.has(pairKey({ symbol, strategy }));
	}

	getPosition(id: string): Position | undefined {
		return (
			this.closedById.get(id) ??
			this.getOpenPositions().find((position) => position.id === id)
		);
	}

	getTrades(): readonly TradeRecord[] {
		return this.trades;
	}

	unrealizedPnl(prices: ReadonlyMap<string, number>): number {
		let total = 0;
		for (const position of this.open.values()) {
			const price = prices.get(position.symbol);
			if (price !== undefined) {
				total += realizedPnlFor(
					position.side,
					position.entryPrice,
					price,
					position.quantity
				);
			}
		}
		return total;
	}

	summary(prices: ReadonlyMap<string, number> = new Map()): LedgerSummary {
		const unrealizedPnl = this.unrealizedPnl(prices);
		const account = this.account.snapshot(unrealizedPnl);
		const { wins, losses, total } = account.trades;
		return {
			openPositions: this.open.size,
			closedTrades: total,
			wins,
			losses,
			winRate: total === 0 ? 0 : (wins / total) * 100,
			realizedPnl: account.totalRealizedPnl,
			unrealizedPnl,
			totalPnl: account.totalRealizedPnl + unrealizedPnl,
			account,
		};
	}

	private positionsFor(symbol: string): Position[] {
		return this.getOpenPositions().filter((position) => position.symbol === symbol);
	}

	private validateRequest(request: OpenPositionRequest): void {
		const { quantity, lotSize, entryPrice, stopLoss, target, side } = request;
		if (!Number.isFinite(quantity) || quantity <= 0) {
			throw new LedgerError(`Quantity must be positive, got ${quantity}`);
		}
		const lots = quantity / lotSize;
		if (Math.abs(lots - Math.round(lots)) > LOT_EPSILON * Math.max(1, lots)) {
			throw new LedgerError(
				`Quantity ${quantity} is not a whole multiple of lot size ${lotSize}`
			);
		}
		const ordered =
			side === "BUY"
				? stopLoss < entryPrice && entryPrice < target
				: target < entryPrice && entryPrice < stopLoss;
		if (!ordered) {
			throw new LedgerError(
				`${side} position needs ${
					side === "BUY" ? "stopLoss < entry < target" : "target < entry < stopLoss"
				}, got stop ${stopLoss}, entry ${entryPrice}, target ${target}`
			);
		}
	}
}

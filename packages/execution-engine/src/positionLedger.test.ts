import { describe, expect, it } from "vitest";
import {
	LedgerError,
	PositionConflictError,
	PositionLimitError,
} from "@algorunner/core";
import { PositionLedger, type OpenPositionRequest } from "./positionLedger";

const T0 = Date.UTC(2024, 2, 4, 4, 0);

const createLedger = (maxConcurrentPositions = 5): PositionLedger =>
	new PositionLedger({
		capital: 500_000,
		maxConcurrentPositions,
		mode: "paper",
		log: false,
	});

const request = (overrides: Partial<OpenPositionRequest> = {}): OpenPositionRequest => ({
	symbol: "NIFTY24MARFUT",
	segment: "NSE_FO",
	strategy: "ema_crossover",
	side: "BUY",
	entryPrice: 21500,
	quantity: 200,
	stopLoss: 21450,
	target: 21600,
	lotSize: 50,
	openedAt: T0,
	...overrides,
});

describe("PositionLedger", () => {
	it("opens a position and tracks deployed risk", () => {
		const ledger = createLedger();
		const position = ledger.openPosition(request());

		expect(position.status).toBe("OPEN");
		expect(position.id).toBe(`ema_crossover:NIFTY24MARFUT:${T0}:1`);
		expect(ledger.openCount).toBe(1);
		expect(ledger.deployedRisk).toBe(10_000);
		expect(ledger.hasOpenPosition("NIFTY24MARFUT", "ema_crossover")).toBe(true);
	});

	it("allows only one open position per pair", () => {
		const ledger = createLedger();
		ledger.openPosition(request());
		expect(() => ledger.openPosition(request({ openedAt: T0 + 60_000 }))).toThrow(
			PositionConflictError
		);
		// a different strategy on the same symbol is its own pair
		ledger.openPosition(request({ strategy: "sma_crossover" }));
		expect(ledger.openCount).toBe(2);
	});

	it("enforces the concurrent position limit", () => {
		const ledger = createLedger(1);
		ledger.openPosition(request());
		expect(() => ledger.openPosition(request({ symbol: "BANKNIFTY" }))).toThrow(
			PositionLimitError
		);
	});

	it("validates lot multiples and stop/target sides", () => {
		const ledger = createLedger();
		expect(() => ledger.openPosition(request({ quantity: 120 }))).toThrow(
			"Quantity 120 is not a whole multiple of lot size 50"
		);
		expect(() => ledger.openPosition(request({ stopLoss: 21550 }))).toThrow(
			LedgerError
		);
		expect(() =>
			ledger.openPosition(
				request({ side: "SELL", stopLoss: 21550, target: 21400 })
			)
		).not.toThrow();
	});

	it("records stopped_out when a bar touches both stop and target", () => {
		const ledger = createLedger();
		ledger.openPosition(request());
		const [trade] = ledger.evaluateBar("NIFTY24MARFUT", {
			high: 21650,
			low: 21400,
			timestamp: T0 + 60_000,
		});

		expect(trade.exitReason).toBe("stopped_out");
		expect(trade.exitPrice).toBe(21450);
		expect(trade.realizedPnl).toBe(-10_000);
		expect(ledger.openCount).toBe(0);
	});

	it("exits at the target when only the target is touched", () => {
		const ledger = createLedger();
		ledger.openPosition(request({ side: "SELL", stopLoss: 21550, target: 21400 }));
		const [trade] = ledger.evaluateBar("NIFTY24MARFUT", {
			high: 21520,
			low: 21390,
			timestamp: T0 + 60_000,
		});
		expect(trade.exitReason).toBe("target_hit");
		expect(trade.exitPrice).toBe(21400);
		expect(trade.realizedPnl).toBe(20_000);
	});

	it("leaves positions open while the bar stays inside the range", () => {
		const ledger = createLedger();
		ledger.openPosition(request());
		expect(ledger.markPrice("NIFTY24MARFUT", 21520, T0 + 60_000)).toEqual([]);
		expect(ledger.markPrice("NIFTY24MARFUT", 21600, T0 + 120_000)[0].exitReason).toBe(
			"target_hit"
		);
	});

	it("closes all three open positions with reason manual", () => {
		const ledger = createLedger();
		ledger.openPosition(request());
		ledger.openPosition(request({ symbol: "BANKNIFTY", entryPrice: 46000, stopLoss: 45900, target: 46200 }));
		ledger.openPosition(request({ symbol: "FINNIFTY", entryPrice: 20500, stopLoss: 20450, target: 20600 }));

		const prices = new Map([
			["NIFTY24MARFUT", 21510],
			["BANKNIFTY", 46000],
			["FINNIFTY", 20490],
		]);
		const { closed, skipped } = ledger.closeAll(
			"manual",
			(position) => prices.get(position.symbol),
			T0 + 300_000,
			"operator request"
		);

		expect(closed).toHaveLength(3);
		expect(skipped).toEqual([]);
		expect(closed.every((trade) => trade.exitReason === "manual")).toBe(true);
		expect(closed[0].note).toBe("operator request");
		expect(ledger.getOpenPositions()).toEqual([]);
		expect(ledger.getTrades()).toHaveLength(3);
	});

	it("never re-opens or double-closes a position", () => {
		const ledger = createLedger();
		const position = ledger.openPosition(request());
		ledger.close(position.id, 21520, "manual", T0 + 1);
		expect(() => ledger.close(position.id, 21520, "manual", T0 + 2)).toThrow(
			`Position ${position.id} is already closed`
		);
		expect(ledger.getPosition(position.id)?.status).toBe("CLOSED");
	});

	it("summarizes realized and unrealized PnL", () => {
		const ledger = createLedger();
		const first = ledger.openPosition(request());
		ledger.close(first.id, 21550, "manual", T0 + 1);
		const second = ledger.openPosition(request({ symbol: "BANKNIFTY", entryPrice: 46000, stopLoss: 45900, target: 46200 }));
		ledger.close(second.id, 45950, "manual", T0 + 2);
		ledger.openPosition(request({ openedAt: T0 + 3 }));

		const summary = ledger.summary(new Map([["NIFTY24MARFUT", 21510]]));
		expect(summary).toMatchObject({
			openPositions: 1,
			closedTrades: 2,
			wins: 1,
			losses: 1,
			winRate: 50,
			realizedPnl: 0,
			unrealizedPnl: 2_000,
			totalPnl: 2_000,
		});
	});

	it("stamps trades with the current mode", () => {
		const ledger = createLedger();
		ledger.setMode("live");
		const position = ledger.openPosition(request());
		expect(ledger.close(position.id, 21500, "manual", T0 + 1).mode).toBe("live");
	});
});

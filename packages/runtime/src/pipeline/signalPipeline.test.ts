import { describe, expect, it, vi } from "vitest";
import {
	BrokerError,
	type Instrument,
	type OrderGateway,
	type OrderRequest,
	type Strategy,
} from "@algorunner/core";
import { OrderRouter, PositionLedger } from "@algorunner/execution-engine";
import { RiskSizer } from "@algorunner/risk-engine";

import {
	ACME,
	RecordingNotifier,
	activePair,
	dailyBars,
	scriptedStrategy,
} from "../testing";
import { MemoryTradeJournal } from "../tradeJournal";
import { SignalPipeline } from "./signalPipeline";

const START = Date.UTC(2024, 0, 1);
const SECOND_BAR = START + 86_400_000;

const NIFTY: Instrument = {
	symbol: "NIFTY24MARFUT",
	segment: "NSE_FO",
	exchange: "NFO",
	lotSize: 50,
	tickSize: 0.05,
	token: "35001",
};

const buildPipeline = (options: { capital?: number; gateway?: OrderGateway } = {}) => {
	const capital = options.capital ?? 100_000;
	const ledger = new PositionLedger({
		capital,
		maxConcurrentPositions: 5,
		mode: options.gateway ? "live" : "paper",
		log: false,
	});
	const router = new OrderRouter({
		mode: options.gateway ? "live" : "paper",
		gateway: options.gateway,
	});
	const notifier = new RecordingNotifier();
	const journal = new MemoryTradeJournal();
	const pipeline = new SignalPipeline({
		ledger,
		router,
		sizer: new RiskSizer({ capital, riskPerTradePct: 2, maxConcurrentPositions: 5 }),
		notifier,
		journal,
	});
	return { pipeline, ledger, notifier, journal };
};

const buyAt = (price: number, stopLoss: number, target: number): Strategy =>
	scriptedStrategy(new Map([[SECOND_BAR, { action: "BUY", price, stopLoss, target }]]));

const acceptingGateway = (averagePrice: number) => ({
	placeOrder: vi.fn(async (request: OrderRequest) => ({
		id: "ord-1",
		symbol: request.symbol,
		side: request.side,
		quantity: request.quantity,
		orderKind: request.orderKind,
		averagePrice,
		status: "closed" as const,
	})),
});

describe("SignalPipeline.evaluate", () => {
	it("waits for at least two bars", async () => {
		const { pipeline } = buildPipeline();
		const outcome = await pipeline.evaluate(
			activePair(buyAt(101, 96, 111)),
			dailyBars(START, [100]),
			START
		);
		expect(outcome).toEqual({ status: "skipped", reason: "insufficient_history" });
	});

	it("sizes and opens a paper position at the signal price", async () => {
		const { pipeline, ledger } = buildPipeline();

		const outcome = await pipeline.evaluate(
			activePair(buyAt(101, 96, 111)),
			dailyBars(START, [100, 101]),
			SECOND_BAR
		);

		expect(outcome.status).toBe("opened");
		expect(ledger.getOpenPosition("ACME", "scripted")).toMatchObject({
			side: "BUY",
			entryPrice: 101,
			quantity: 400,
			stopLoss: 96,
			target: 111,
			openedAt: SECOND_BAR,
		});
	});

	it("ignores a second signal while the pair holds a position", async () => {
		const { pipeline } = buildPipeline();
		const active = activePair(buyAt(101, 96, 111));
		const series = dailyBars(START, [100, 101]);

		await pipeline.evaluate(active, series, SECOND_BAR);
		const again = await pipeline.evaluate(active, series, SECOND_BAR);

		expect(again).toEqual({ status: "skipped", reason: "position_open" });
	});

	it("rejects a signal whose risk buys less than one lot", async () => {
		const { pipeline, ledger } = buildPipeline({ capital: 100_000 });

		const outcome = await pipeline.evaluate(
			activePair(buyAt(100, 50, 200), NIFTY),
			dailyBars(START, [99, 100]),
			SECOND_BAR
		);

		expect(outcome).toEqual({
			status: "skipped",
			reason: "sizing_rejected",
			detail: "Raw quantity 40 for NIFTY24MARFUT is below one lot of 50",
		});
		expect(ledger.openCount).toBe(0);
	});

	it("opens four lots of the same instrument with more capital", async () => {
		const { pipeline, ledger } = buildPipeline({ capital: 500_000 });

		await pipeline.evaluate(
			activePair(buyAt(100, 50, 200), NIFTY),
			dailyBars(START, [99, 100]),
			SECOND_BAR
		);

		expect(ledger.getOpenPosition("NIFTY24MARFUT", "scripted")?.quantity).toBe(200);
	});

	it("drops the tick when the strategy throws", async () => {
		const { pipeline } = buildPipeline();
		const broken: Strategy = {
			name: "broken",
			parameters: {},
			evaluate() {
				throw new Error("boom");
			},
		};

		const outcome = await pipeline.evaluate(
			activePair(broken),
			dailyBars(START, [100, 101]),
			SECOND_BAR
		);

		expect(outcome).toEqual({
			status: "skipped",
			reason: "strategy_error",
			detail: "[broken/ACME] evaluation failed: boom",
		});
	});

	it("books live entries at the venue's average fill", async () => {
		const gateway = acceptingGateway(101.2);
		const { pipeline, ledger } = buildPipeline({ gateway });

		await pipeline.evaluate(
			activePair(buyAt(101, 96, 111)),
			dailyBars(START, [100, 101]),
			SECOND_BAR
		);

		expect(gateway.placeOrder).toHaveBeenCalledWith({
			symbol: "ACME",
			side: "buy",
			quantity: 400,
			orderKind: "MARKET",
			price: undefined,
		});
		expect(ledger.getOpenPosition("ACME", "scripted")?.entryPrice).toBe(101.2);
	});

	it("leaves the ledger untouched and notifies when the broker rejects", async () => {
		const gateway: OrderGateway = {
			placeOrder: async () => {
				throw new BrokerError("insufficient margin", "rejected");
			},
		};
		const { pipeline, ledger, notifier } = buildPipeline({ gateway });

		const outcome = await pipeline.evaluate(
			activePair(buyAt(101, 96, 111)),
			dailyBars(START, [100, 101]),
			SECOND_BAR
		);

		expect(outcome).toEqual({ status: "skipped", reason: "broker_error" });
		expect(ledger.openCount).toBe(0);
		expect(notifier.events).toHaveLength(1);
		expect(notifier.events[0]).toMatchObject({
			type: "broker_error",
			symbol: "ACME",
			strategy: "scripted",
		});
	});
});

describe("SignalPipeline fills the ledger refuses", () => {
	it("unwinds a live fill beyond the stop and reports it", async () => {
		const gateway = acceptingGateway(95);
		const { pipeline, ledger, notifier } = buildPipeline({ gateway });

		const outcome = await pipeline.evaluate(
			activePair(buyAt(101, 96, 111)),
			dailyBars(START, [100, 101]),
			SECOND_BAR
		);

		expect(outcome).toEqual({
			status: "skipped",
			reason: "ledger_rejected",
			detail: "BUY position needs stopLoss < entry < target, got stop 96, entry 95, target 111",
		});
		expect(ledger.openCount).toBe(0);
		expect(gateway.placeOrder).toHaveBeenCalledTimes(2);
		expect(gateway.placeOrder).toHaveBeenLastCalledWith({
			symbol: "ACME",
			side: "sell",
			quantity: 400,
			orderKind: "MARKET",
		});
		expect(notifier.events).toHaveLength(1);
		expect(notifier.events[0]).toMatchObject({
			type: "position_unbooked",
			symbol: "ACME",
			strategy: "scripted",
			orderId: "ord-1",
			flattened: true,
		});
	});

	it("still reports the fill when the unwind order fails", async () => {
		const gateway = acceptingGateway(95);
		const { pipeline, notifier } = buildPipeline({ gateway });
		gateway.placeOrder
			.mockImplementationOnce(async (request: OrderRequest) => ({
				id: "ord-1",
				symbol: request.symbol,
				side: request.side,
				quantity: request.quantity,
				orderKind: request.orderKind,
				averagePrice: 95,
				status: "closed" as const,
			}))
			.mockRejectedValueOnce(new BrokerError("exchange offline", "network"));

		await pipeline.evaluate(
			activePair(buyAt(101, 96, 111)),
			dailyBars(START, [100, 101]),
			SECOND_BAR
		);

		expect(notifier.events.map((event) => event.type)).toEqual([
			"broker_error",
			"position_unbooked",
		]);
		expect(notifier.events[1]).toMatchObject({ flattened: false });
	});
});

describe("SignalPipeline.applyExits", () => {
	it("closes at the target and journals the trade", async () => {
		const { pipeline, ledger, journal } = buildPipeline();
		await pipeline.evaluate(
			activePair(buyAt(101, 96, 111)),
			dailyBars(START, [100, 101]),
			SECOND_BAR
		);

		const closed = await pipeline.applyExits("ACME", {
			high: 112,
			low: 100,
			timestamp: SECOND_BAR + 1,
		});

		expect(closed).toHaveLength(1);
		expect(closed[0]).toMatchObject({
			exitReason: "target_hit",
			exitPrice: 111,
			realizedPnl: 4000,
			mode: "paper",
		});
		expect(journal.list()).toEqual(closed);
		expect(ledger.openCount).toBe(0);
	});

	it("keeps a live position open when the exit order fails", async () => {
		const gateway = acceptingGateway(101);
		const { pipeline, ledger, notifier } = buildPipeline({ gateway });
		await pipeline.evaluate(
			activePair(buyAt(101, 96, 111)),
			dailyBars(START, [100, 101]),
			SECOND_BAR
		);
		gateway.placeOrder.mockRejectedValueOnce(new BrokerError("timeout", "network"));

		const closed = await pipeline.applyExits("ACME", {
			high: 101,
			low: 95,
			timestamp: SECOND_BAR + 1,
		});

		expect(closed).toEqual([]);
		expect(ledger.openCount).toBe(1);
		expect(notifier.events.map((event) => event.type)).toEqual(["broker_error"]);
	});
});

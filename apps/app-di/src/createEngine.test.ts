import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import {
	ConfigError,
	ManualClock,
	type Candle,
	type OrderRequest,
} from "@algorunner/core";
import { MemoryCheckpointStore } from "@algorunner/persistence";

import type { BrokerClient } from "./createBrokerClient";
import { createBacktestEngine, createRealtimeEngine } from "./createEngine";
import { loadRuntime } from "./loadRuntime";

const configDir = path.join(__dirname, "__tests__", "fixtures", "config");

const fakeBroker = (): BrokerClient => ({
	fetchOHLCV: vi.fn(async (): Promise<Candle[]> => []),
	fetchLastPrice: vi.fn(async () => 1500),
	placeOrder: vi.fn(async (request: OrderRequest) => ({
		id: "ord-1",
		symbol: request.symbol,
		side: request.side,
		quantity: request.quantity,
		orderKind: request.orderKind,
		status: "closed" as const,
	})),
});

describe("loadRuntime", () => {
	it("resolves configured pairs against the master list and registry", () => {
		const context = loadRuntime({ configDir, env: {} });

		expect(context.pairs.map(({ pair }) => pair)).toEqual([
			{ segment: "NSE_EQ", symbol: "INFY", strategy: "ema_crossover" },
			{ segment: "NSE_EQ", symbol: "TCS", strategy: "sma_crossover" },
		]);
		expect(context.pairs[0].instrument.token).toBe("1594");
		expect(context.pairs[1].strategy.parameters).toMatchObject({
			shortPeriod: 5,
			longPeriod: 15,
		});
		expect(context.config.backtest.dataDir).toBe(
			path.join(path.dirname(configDir), "data", "prices")
		);
	});
});

describe("createBacktestEngine", () => {
	it("replays each pair from the configured start date", async () => {
		const context = loadRuntime({ configDir, env: {} });
		const checkpoints = new MemoryCheckpointStore();
		const { engine } = createBacktestEngine(context, {
			clock: new ManualClock(Date.UTC(2024, 0, 1)),
			checkpoints,
			priceSource: { fetchSeries: async () => [] },
		});

		await engine.backtest?.runOnce();

		expect(engine.getBacktestProgress()).toMatchObject({
			"INFY::ema_crossover": { cursor: "2015-04-01T00:00:00.000Z", tradeCount: 0 },
			"TCS::sma_crossover": { cursor: "2015-04-01T00:00:00.000Z", tradeCount: 0 },
		});
		expect(engine.realtime).toBeUndefined();
		expect(engine.getMode()).toBe("paper");
	});
});

describe("createRealtimeEngine", () => {
	it("wires the broker as quote source in paper mode", async () => {
		const context = loadRuntime({ configDir, env: {} });
		const broker = fakeBroker();
		// Wednesday 05:00 UTC is 10:30 in Kolkata
		const { engine } = createRealtimeEngine(context, {
			broker,
			clock: new ManualClock(Date.UTC(2024, 0, 3, 5, 0)),
		});

		const outcome = await engine.realtime?.tick();

		expect(outcome?.status).toBe("polled");
		expect(broker.fetchLastPrice).toHaveBeenCalledWith("INFY");
		expect(broker.fetchLastPrice).toHaveBeenCalledWith("TCS");
		expect(engine.getMode()).toBe("paper");
		expect(engine.backtest).toBeUndefined();
	});

	it("refuses live mode without broker credentials", () => {
		const context = loadRuntime({ configDir, env: { ALGORUNNER_MODE: "live" } });

		expect(() => createRealtimeEngine(context)).toThrow(ConfigError);
	});

	it("starts live when credentials are configured", () => {
		const context = loadRuntime({
			configDir,
			env: {
				ALGORUNNER_MODE: "live",
				BROKER_API_KEY: "test-key",
				BROKER_API_SECRET: "test-secret",
			},
		});

		const { engine } = createRealtimeEngine(context, { broker: fakeBroker() });

		expect(engine.getMode()).toBe("live");
	});
});

import { describe, expect, it, vi } from "vitest";
import {
	AuthenticationError,
	InvalidOrder,
	NetworkError,
	RateLimitExceeded,
	type Exchange,
} from "ccxt";
import { BrokerError, ConfigError } from "@algorunner/core";

import { CcxtBrokerClient, createCcxtExchange, toBrokerError } from "./ccxtBrokerClient";

const buildFakeExchange = () => {
	const fake = {
		id: "fakeex",
		markets: {} as Record<string, { symbol: string }>,
		loadMarkets: vi.fn(async () => ({})),
		market: vi.fn((symbol: string) => {
			if (symbol === "BTC/USDT") {
				return { symbol };
			}
			throw new Error(`market ${symbol} not found`);
		}),
		fetchOHLCV: vi.fn(async () => [
			[1_700_000_000_000, 100, 110, 95, 105, 12],
			[1_700_000_900_000, 105, 108, 101, 107, 9],
		]),
		fetchTicker: vi.fn(async () => ({ last: 107.5, close: 107 })),
		createOrder: vi.fn(async () => ({
			id: "ex-1",
			status: "closed",
			average: 107.6,
		})),
	};
	return { fake, exchange: fake as unknown as Exchange };
};

describe("CcxtBrokerClient", () => {
	it("maps OHLCV rows to candles and loads markets once", async () => {
		const { fake, exchange } = buildFakeExchange();
		const client = new CcxtBrokerClient({ exchange });

		const candles = await client.fetchOHLCV("BTC/USDT", "15m", 2);
		await client.fetchOHLCV("BTC/USDT", "15m", 2);

		expect(candles).toEqual([
			{
				symbol: "BTC/USDT",
				timeframe: "15m",
				timestamp: 1_700_000_000_000,
				open: 100,
				high: 110,
				low: 95,
				close: 105,
				volume: 12,
			},
			{
				symbol: "BTC/USDT",
				timeframe: "15m",
				timestamp: 1_700_000_900_000,
				open: 105,
				high: 108,
				low: 101,
				close: 107,
				volume: 9,
			},
		]);
		expect(fake.fetchOHLCV).toHaveBeenCalledWith("BTC/USDT", "15m", undefined, 2);
		expect(fake.loadMarkets).toHaveBeenCalledTimes(1);
	});

	it("falls back to the linear USDT market when the spot symbol is unknown", async () => {
		const { fake, exchange } = buildFakeExchange();
		fake.markets["ETH/USDT:USDT"] = { symbol: "ETH/USDT:USDT" };
		const client = new CcxtBrokerClient({ exchange });

		await client.fetchLastPrice("ETH/USDT");

		expect(fake.fetchTicker).toHaveBeenCalledWith("ETH/USDT:USDT");
	});

	it("rejects symbols the venue does not list", async () => {
		const { exchange } = buildFakeExchange();
		const client = new CcxtBrokerClient({ exchange });

		await expect(client.fetchLastPrice("DOGE/EUR")).rejects.toMatchObject({
			name: "BrokerError",
			kind: "rejected",
		});
	});

	it("returns the last traded price", async () => {
		const { exchange } = buildFakeExchange();
		const client = new CcxtBrokerClient({ exchange });

		await expect(client.fetchLastPrice("BTC/USDT")).resolves.toBe(107.5);
	});

	it("throws when the ticker carries no usable price", async () => {
		const { fake, exchange } = buildFakeExchange();
		fake.fetchTicker.mockResolvedValueOnce({ last: 0, close: 0 });
		const client = new CcxtBrokerClient({ exchange });

		await expect(client.fetchLastPrice("BTC/USDT")).rejects.toThrow(
			"No last price available for BTC/USDT"
		);
	});

	it("places market orders and reports the average fill", async () => {
		const { fake, exchange } = buildFakeExchange();
		const client = new CcxtBrokerClient({ exchange });

		const confirmation = await client.placeOrder({
			symbol: "BTC/USDT",
			side: "buy",
			quantity: 0.25,
			orderKind: "MARKET",
			clientOrderId: "ema_crossover-1",
		});

		expect(fake.createOrder).toHaveBeenCalledWith(
			"BTC/USDT",
			"market",
			"buy",
			0.25,
			undefined,
			{ clientOrderId: "ema_crossover-1" }
		);
		expect(confirmation).toEqual({
			id: "ex-1",
			symbol: "BTC/USDT",
			side: "buy",
			quantity: 0.25,
			orderKind: "MARKET",
			averagePrice: 107.6,
			status: "closed",
		});
	});

	it("refuses LIMIT orders without a price", async () => {
		const { fake, exchange } = buildFakeExchange();
		const client = new CcxtBrokerClient({ exchange });

		await expect(
			client.placeOrder({
				symbol: "BTC/USDT",
				side: "sell",
				quantity: 1,
				orderKind: "LIMIT",
			})
		).rejects.toThrow("LIMIT order for BTC/USDT needs a price");
		expect(fake.createOrder).not.toHaveBeenCalled();
	});

	it("wraps venue rejections as broker errors", async () => {
		const { fake, exchange } = buildFakeExchange();
		fake.createOrder.mockRejectedValueOnce(new InvalidOrder("min notional"));
		const client = new CcxtBrokerClient({ exchange });

		const error = await client
			.placeOrder({ symbol: "BTC/USDT", side: "buy", quantity: 1, orderKind: "MARKET" })
			.catch((err: unknown) => err);

		expect(error).toBeInstanceOf(BrokerError);
		expect(error).toMatchObject({
			kind: "rejected",
			message: "createOrder BTC/USDT failed: min notional",
		});
	});
});

describe("toBrokerError", () => {
	it.each([
		[new AuthenticationError("bad key"), "auth"],
		[new RateLimitExceeded("slow down"), "rate_limit"],
		[new NetworkError("socket hang up"), "network"],
		[new Error("boom"), "unknown"],
	])("maps %s to %s", (error, kind) => {
		expect(toBrokerError(error, "fetchTicker").kind).toBe(kind);
	});

	it("passes broker errors through untouched", () => {
		const original = new BrokerError("already mapped", "auth");
		expect(toBrokerError(original, "anything")).toBe(original);
	});
});

describe("createCcxtExchange", () => {
	it("rejects exchanges outside the supported list", () => {
		expect(() => createCcxtExchange({ exchangeId: "nowhere" })).toThrow(ConfigError);
	});

	it("builds a ccxt instance for a supported id", () => {
		const exchange = createCcxtExchange({ exchangeId: "kraken" });
		expect(exchange.id).toBe("kraken");
	});
});

import { describe, expect, it } from "vitest";
import { ConfigError, StrategyError } from "../errors";
import type { TradeSignal } from "../types";
import { builtInStrategies } from "./builtins";
import { createStrategyRegistry, evaluateSafely } from "./registry";
import { barsFromCloses, TEST_INSTRUMENT } from "./testing";
import type { Strategy, StrategyRegistryEntry } from "./types";

const fixedStrategy = (
	name: string,
	evaluate: Strategy["evaluate"]
): StrategyRegistryEntry => ({
	name,
	description: "fixture",
	defaultParameters: { period: 3 },
	create: (parameters) => ({ name, parameters, evaluate }),
});

const signal = (overrides: Partial<TradeSignal> = {}): TradeSignal => ({
	action: "BUY",
	orderKind: "MARKET",
	price: 100,
	stopLoss: 95,
	target: 110,
	reason: "fixture",
	...overrides,
});

describe("strategy registry", () => {
	it("registers the built-in strategies", () => {
		const registry = createStrategyRegistry(builtInStrategies);
		expect(registry.names()).toEqual(["ema_crossover", "sma_crossover"]);
		expect(registry.has("ema_crossover")).toBe(true);
		expect(registry.get("sma_crossover").defaultParameters).toMatchObject({
			shortPeriod: 10,
			longPeriod: 20,
		});
	});

	it("throws when duplicate strategy names are registered", () => {
		const entry = fixedStrategy("alpha", () => null);
		expect(() => createStrategyRegistry([entry, entry])).toThrow(
			"Duplicate strategy name detected: alpha. Strategy names must be unique."
		);
	});

	it("rejects non-scalar default parameters", () => {
		expect(() =>
			createStrategyRegistry([
				{
					...fixedStrategy("alpha", () => null),
					defaultParameters: JSON.parse('{"period": [1, 2]}'),
				},
			])
		).toThrow("Strategy alpha parameter period must be a number, string or boolean");
	});

	it("merges overrides over the defaults", () => {
		const registry = createStrategyRegistry(builtInStrategies);
		const strategy = registry.create("ema_crossover", { emaPeriod: 8 });
		expect(strategy.name).toBe("ema_crossover");
		expect(strategy.parameters.emaPeriod).toBe(8);
		expect(strategy.parameters.riskReward).toBe(1.5);
	});

	it("rejects unknown names and bad overrides with a ConfigError", () => {
		const registry = createStrategyRegistry(builtInStrategies);
		expect(() => registry.create("rsi")).toThrow(ConfigError);
		expect(() => registry.create("ema_crossover", { lookback: 3 })).toThrow(
			"Strategy ema_crossover has no parameter lookback"
		);
		expect(() => registry.create("ema_crossover", { emaPeriod: "5" })).toThrow(
			"Strategy ema_crossover parameter emaPeriod must be a number, got string"
		);
	});

	it("rejects a factory whose strategy reports another name", () => {
		const registry = createStrategyRegistry([
			{
				...fixedStrategy("alpha", () => null),
				create: (parameters) => ({ name: "beta", parameters, evaluate: () => null }),
			},
		]);
		expect(() => registry.create("alpha")).toThrow(
			"Strategy created by alpha reports name beta"
		);
	});
});

describe("evaluateSafely", () => {
	const series = barsFromCloses([100, 101]);

	it("passes a valid signal through", () => {
		const strategy: Strategy = {
			name: "alpha",
			parameters: {},
			evaluate: () => signal(),
		};
		expect(evaluateSafely(strategy, series, TEST_INSTRUMENT)).toEqual({
			ok: true,
			signal: signal(),
		});
	});

	it("turns a thrown exception into a StrategyError", () => {
		const strategy: Strategy = {
			name: "alpha",
			parameters: {},
			evaluate: () => {
				throw new Error("division by zero");
			},
		};
		const result = evaluateSafely(strategy, series, TEST_INSTRUMENT);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(StrategyError);
			expect(result.error.message).toBe(
				"[alpha/INFY] evaluation failed: division by zero"
			);
		}
	});

	it("rejects a stop-loss on the wrong side of the entry", () => {
		const strategy: Strategy = {
			name: "alpha",
			parameters: {},
			evaluate: () => signal({ stopLoss: 105 }),
		};
		const result = evaluateSafely(strategy, series, TEST_INSTRUMENT);
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.message).toBe(
				"[alpha/INFY] invalid signal: BUY requires stopLoss < price < target, got 105 / 100 / 110"
			);
		}
	});

	it("rejects a non-finite price", () => {
		const strategy: Strategy = {
			name: "alpha",
			parameters: {},
			evaluate: () => signal({ price: Number.NaN }),
		};
		const result = evaluateSafely(strategy, series, TEST_INSTRUMENT);
		expect(result.ok).toBe(false);
	});
});

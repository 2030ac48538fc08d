import { emaSeries } from "@algorunner/indicators";

import type { Candle, TradeSignal } from "../types";
import { booleanParam, numberParam, positiveIntegerParam } from "./parameters";
import type { Strategy, StrategyParameters, StrategyRegistryEntry } from "./types";

export const EMA_CROSSOVER = "ema_crossover";

export const EMA_CROSSOVER_DEFAULTS: Readonly<StrategyParameters> = Object.freeze({
	emaPeriod: 5,
	riskReward: 1.5,
	swingLookback: 5,
	minCandles: 20,
	useTrendFilter: true,
	trendEmaPeriod: 50,
	minRiskPct: 0.2,
});

const swingExtreme = (
	series: readonly Candle[],
	lookback: number,
	pick: "low" | "high"
): number | null => {
	if (series.length < lookback + 1) {
		return null;
	}
	const window = series.slice(series.length - lookback - 1, series.length - 1);
	const values = window.map((bar) => bar[pick]);
	return pick === "low" ? Math.min(...values) : Math.max(...values);
};

/**
 * Close crossing an EMA. Stops go behind the most recent swing, targets sit
 * at `riskReward` times the risk, and an optional slower EMA filters trades
 * against the trend.
 */
export const createEmaCrossover = (
	parameters: Readonly<StrategyParameters>
): Strategy => {
	const emaPeriod = positiveIntegerParam(parameters, "emaPeriod");
	const riskReward = numberParam(parameters, "riskReward");
	const swingLookback = positiveIntegerParam(parameters, "swingLookback");
	const minCandles = positiveIntegerParam(parameters, "minCandles");
	const useTrendFilter = booleanParam(parameters, "useTrendFilter");
	const trendEmaPeriod = positiveIntegerParam(parameters, "trendEmaPeriod");
	const minRiskPct = numberParam(parameters, "minRiskPct");

	return {
		name: EMA_CROSSOVER,
		parameters,
		evaluate(series): TradeSignal | null {
			if (series.length < Math.max(minCandles, 2)) {
				return null;
			}
			const closes = series.map((bar) => bar.close);
			const fast = emaSeries(closes, emaPeriod, "first");
			const last = series.length - 1;
			const current = closes[last];
			const previous = closes[last - 1];
			const currentEma = fast[last];
			const previousEma = fast[last - 1];
			if (currentEma === null || previousEma === null) {
				return null;
			}

			const crossedUp = previous <= previousEma && current > currentEma;
			const crossedDown = previous >= previousEma && current < currentEma;
			if (!crossedUp && !crossedDown) {
				return null;
			}

			if (useTrendFilter) {
				const trend = emaSeries(closes, trendEmaPeriod, "first")[last];
				if (trend === null) {
					return null;
				}
				if (crossedUp && current < trend) {
					return null;
				}
				if (crossedDown && current > trend) {
					return null;
				}
			}

			const stopLoss = swingExtreme(series, swingLookback, crossedUp ? "low" : "high");
			if (stopLoss === null) {
				return null;
			}
			const risk = crossedUp ? current - stopLoss : stopLoss - current;
			if (risk <= 0 || risk < (current * minRiskPct) / 100) {
				return null;
			}
			const target = crossedUp
				? current + risk * riskReward
				: current - risk * riskReward;
			const direction = crossedUp ? "above" : "below";
			return {
				action: crossedUp ? "BUY" : "SELL",
				orderKind: "MARKET",
				price: current,
				stopLoss,
				target,
				reason: `Price crossed ${direction} ${emaPeriod} EMA at ${current.toFixed(
					2
				)}, SL: ${stopLoss.toFixed(2)}, Target: ${target.toFixed(2)}`,
			};
		},
	};
};

export const emaCrossoverEntry: StrategyRegistryEntry = {
	name: EMA_CROSSOVER,
	description: "Close crosses a fast EMA; swing stop, risk-reward target, trend filter",
	defaultParameters: EMA_CROSSOVER_DEFAULTS,
	create: createEmaCrossover,
};

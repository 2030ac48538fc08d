import { smaSeries } from "@algorunner/indicators";

import type { TradeSignal } from "../types";
import { numberParam, positiveIntegerParam } from "./parameters";
import type { Strategy, StrategyParameters, StrategyRegistryEntry } from "./types";

export const SMA_CROSSOVER = "sma_crossover";

export const SMA_CROSSOVER_DEFAULTS: Readonly<StrategyParameters> = Object.freeze({
	shortPeriod: 10,
	longPeriod: 20,
	stopLossPct: 2,
	targetPct: 4,
});

export const createSmaCrossover = (
	parameters: Readonly<StrategyParameters>
): Strategy => {
	const shortPeriod = positiveIntegerParam(parameters, "shortPeriod");
	const longPeriod = positiveIntegerParam(parameters, "longPeriod");
	const stopLossPct = numberParam(parameters, "stopLossPct");
	const targetPct = numberParam(parameters, "targetPct");

	return {
		name: SMA_CROSSOVER,
		parameters,
		evaluate(series): TradeSignal | null {
			if (series.length < Math.max(longPeriod, 2)) {
				return null;
			}
			const closes = series.map((bar) => bar.close);
			const short = smaSeries(closes, shortPeriod);
			const long = smaSeries(closes, longPeriod);
			const last = closes.length - 1;
			const [prevShort, prevLong, curShort, curLong] = [
				short[last - 1],
				long[last - 1],
				short[last],
				long[last],
			];
			if (
				prevShort === null ||
				prevLong === null ||
				curShort === null ||
				curLong === null
			) {
				return null;
			}
			const close = closes[last];
			if (prevShort <= prevLong && curShort > curLong) {
				return {
					action: "BUY",
					orderKind: "MARKET",
					price: close,
					stopLoss: close * (1 - stopLossPct / 100),
					target: close * (1 + targetPct / 100),
					reason: `SMA bullish crossover: ${shortPeriod}/${longPeriod}`,
				};
			}
			if (prevShort >= prevLong && curShort < curLong) {
				return {
					action: "SELL",
					orderKind: "MARKET",
					price: close,
					stopLoss: close * (1 + stopLossPct / 100),
					target: close * (1 - targetPct / 100),
					reason: `SMA bearish crossover: ${shortPeriod}/${longPeriod}`,
				};
			}
			return null;
		},
	};
};

export const smaCrossoverEntry: StrategyRegistryEntry = {
	name: SMA_CROSSOVER,
	description: "Short SMA crosses long SMA; percent stop and target",
	defaultParameters: SMA_CROSSOVER_DEFAULTS,
	create: createSmaCrossover,
};

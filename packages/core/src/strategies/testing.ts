import type { Candle, Instrument } from "../types";

export const TEST_INSTRUMENT: Instrument = {
	symbol: "INFY",
	segment: "NSE_EQ",
	exchange: "NSE",
	lotSize: 1,
	tickSize: 0.05,
	token: "1594",
};

/**
 * Daily bars from closes, each with a high/low half a point either side.
 */
export const barsFromCloses = (
	closes: readonly number[],
	start = Date.UTC(2020, 0, 1),
	symbol = TEST_INSTRUMENT.symbol
): Candle[] =>
	closes.map((close, index) => ({
		symbol,
		timeframe: "1d",
		timestamp: start + index * 86_400_000,
		open: close,
		high: close + 0.5,
		low: close - 0.5,
		close,
		volume: 1_000,
	}));

import type { Candle, Instrument, TradeSignal } from "../types";

export type StrategyParameterValue = number | string | boolean;

/** Ordered parameter mapping; insertion order is the display order. */
export type StrategyParameters = Record<string, StrategyParameterValue>;

/**
 * A strategy is a pure function of the price window it is given: no I/O, no
 * state kept between calls, the same window always yields the same signal.
 */
export interface Strategy {
	readonly name: string;
	readonly parameters: Readonly<StrategyParameters>;
	/** `series` is oldest-first; the last bar is the one being evaluated. */
	evaluate(series: readonly Candle[], instrument: Instrument): TradeSignal | null;
}

export interface StrategyRegistryEntry {
	name: string;
	description: string;
	defaultParameters: Readonly<StrategyParameters>;
	create(parameters: Readonly<StrategyParameters>): Strategy;
}

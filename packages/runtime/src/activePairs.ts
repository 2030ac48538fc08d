import type {
	InstrumentCatalog,
	StrategyParameters,
	StrategyRegistry,
	TradingPair,
} from "@algorunner/core";

import type { ActivePair } from "./types";

/**
 * Resolve configured pairs to instruments and fresh strategy instances.
 * Unknown instruments or strategies surface as `ConfigError`.
 */
export const resolveActivePairs = (
	pairs: readonly TradingPair[],
	catalog: InstrumentCatalog,
	registry: StrategyRegistry,
	parameters: Readonly<Record<string, StrategyParameters>> = {}
): ActivePair[] =>
	pairs.map((pair) => {
		const instrument = catalog.get(pair.segment, pair.symbol);
		return {
			pair: { ...pair, symbol: instrument.symbol },
			instrument,
			strategy: registry.create(pair.strategy, parameters[pair.strategy]),
		};
	});

import {
	InstrumentCatalog,
	builtInStrategies,
	createLogger,
	createStrategyRegistry,
	loadRunnerConfig,
	type ConfigLoadOptions,
	type RunnerConfig,
	type StrategyRegistry,
	type StrategyRegistryEntry,
} from "@algorunner/core";
import { resolveActivePairs, type ActivePair } from "@algorunner/runtime";

const diLogger = createLogger("app-di");

export interface RuntimeContext {
	config: RunnerConfig;
	catalog: InstrumentCatalog;
	registry: StrategyRegistry;
	pairs: ActivePair[];
}

export interface LoadRuntimeOptions extends ConfigLoadOptions {
	strategies?: readonly StrategyRegistryEntry[];
	catalog?: InstrumentCatalog;
}

/**
 * Configuration, master lists, the strategy registry and the resolved pairs:
 * everything both entry points need before any collaborator is built.
 */
export const loadRuntime = (options: LoadRuntimeOptions = {}): RuntimeContext => {
	const config = loadRunnerConfig(options);
	const catalog =
		options.catalog ??
		InstrumentCatalog.fromDirectory(
			config.instrumentsDir,
			config.pairs.map((pair) => pair.segment)
		);
	const registry = createStrategyRegistry(options.strategies ?? builtInStrategies);
	const pairs = resolveActivePairs(
		config.pairs,
		catalog,
		registry,
		config.strategyParameters
	);
	diLogger.info("runtime_loaded", {
		mode: config.mode,
		timeframe: config.timeframe,
		pairs: pairs.map(({ pair }) => `${pair.symbol}::${pair.strategy}`),
		strategies: registry.names(),
	});
	return { config, catalog, registry, pairs };
};

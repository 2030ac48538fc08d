import { emaCrossoverEntry } from "./emaCrossover";
import { smaCrossoverEntry } from "./smaCrossover";
import type { StrategyRegistryEntry } from "./types";

export const builtInStrategies: readonly StrategyRegistryEntry[] = [
	emaCrossoverEntry,
	smaCrossoverEntry,
];

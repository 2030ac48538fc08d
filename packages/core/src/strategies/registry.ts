import { ConfigError, StrategyError } from "../errors";
import type { Candle, Instrument, TradeSignal } from "../types";
import type {
	Strategy,
	StrategyParameters,
	StrategyParameterValue,
	StrategyRegistryEntry,
} from "./types";
import { findSignalProblem } from "./validateSignal";

export type StrategyEvaluation =
	| { ok: true; signal: TradeSignal | null }
	| { ok: false; error: StrategyError };

const isScalar = (value: unknown): value is StrategyParameterValue =>
	typeof value === "number" ||
	typeof value === "string" ||
	typeof value === "boolean";

const validateParameterMapping = (
	owner: string,
	parameters: unknown
): void => {
	if (typeof parameters !== "object" || parameters === null || Array.isArray(parameters)) {
		throw new ConfigError(`Strategy ${owner} must declare a parameter mapping`);
	}
	for (const [key, value] of Object.entries(parameters)) {
		if (!isScalar(value)) {
			throw new ConfigError(
				`Strategy ${owner} parameter ${key} must be a number, string or boolean`
			);
		}
	}
};

const validateStrategyShape = (entryName: string, strategy: Strategy): void => {
	if (typeof strategy.name !== "string" || strategy.name.trim() === "") {
		throw new ConfigError(`Strategy created by ${entryName} has no name`);
	}
	if (strategy.name !== entryName) {
		throw new ConfigError(
			`Strategy created by ${entryName} reports name ${strategy.name}`
		);
	}
	if (typeof strategy.evaluate !== "function") {
		throw new ConfigError(`Strategy ${entryName} does not implement evaluate`);
	}
	validateParameterMapping(entryName, strategy.parameters);
};

export function validateUniqueStrategyNames(
	entries: readonly StrategyRegistryEntry[]
): void {
	const seen = new Set<string>();
	for (const entry of entries) {
		if (typeof entry.name !== "string" || entry.name.trim() === "") {
			throw new ConfigError("Strategy registry entries must declare a name");
		}
		if (seen.has(entry.name)) {
			throw new ConfigError(
				`Duplicate strategy name detected: ${entry.name}. Strategy names must be unique.`
			);
		}
		seen.add(entry.name);
	}
}

/**
 * Name → strategy factory lookup, built once at startup from a static list.
 */
export class StrategyRegistry {
	private readonly entries: ReadonlyMap<string, StrategyRegistryEntry>;

	constructor(entries: readonly StrategyRegistryEntry[]) {
		validateUniqueStrategyNames(entries);
		for (const entry of entries) {
			validateParameterMapping(entry.name, entry.defaultParameters);
		}
		this.entries = new Map(entries.map((entry) => [entry.name, entry]));
	}

	has(name: string): boolean {
		return this.entries.has(name);
	}

	get(name: string): StrategyRegistryEntry {
		const entry = this.entries.get(name);
		if (!entry) {
			throw new ConfigError(
				`Unknown strategy ${name}. Registered: ${this.names().join(", ")}`
			);
		}
		return entry;
	}

	list(): StrategyRegistryEntry[] {
		return Array.from(this.entries.values());
	}

	names(): string[] {
		return Array.from(this.entries.keys());
	}

	/**
	 * Instantiate `name` with its defaults merged with `overrides`. Overrides
	 * must name known parameters and keep the default's value type.
	 */
	create(name: string, overrides: Readonly<StrategyParameters> = {}): Strategy {
		const entry = this.get(name);
		const merged: StrategyParameters = { ...entry.defaultParameters };
		for (const [key, value] of Object.entries(overrides)) {
			if (!(key in entry.defaultParameters)) {
				throw new ConfigError(`Strategy ${name} has no parameter ${key}`);
			}
			const expected = typeof entry.defaultParameters[key];
			if (typeof value !== expected) {
				throw new ConfigError(
					`Strategy ${name} parameter ${key} must be a ${expected}, got ${typeof value}`
				);
			}
			merged[key] = value;
		}
		const strategy = entry.create(Object.freeze(merged));
		validateStrategyShape(name, strategy);
		return strategy;
	}
}

export const createStrategyRegistry = (
	entries: readonly StrategyRegistryEntry[]
): StrategyRegistry => new StrategyRegistry(entries);

/**
 * Run a strategy and convert a thrown exception or an unusable signal into a
 * `StrategyError` result.
 */
export const evaluateSafely = (
	strategy: Strategy,
	series: readonly Candle[],
	instrument: Instrument
): StrategyEvaluation => {
	let signal: TradeSignal | null;
	try {
		signal = strategy.evaluate(series, instrument);
	} catch (error) {
		return {
			ok: false,
			error: new StrategyError(
				strategy.name,
				instrument.symbol,
				`evaluation failed: ${error instanceof Error ? error.message : String(error)}`,
				{ cause: error }
			),
		};
	}
	if (signal === null || signal === undefined) {
		return { ok: true, signal: null };
	}
	const problem = findSignalProblem(signal);
	if (problem) {
		return {
			ok: false,
			error: new StrategyError(
				strategy.name,
				instrument.symbol,
				`invalid signal: ${problem}`
			),
		};
	}
	return { ok: true, signal };
};

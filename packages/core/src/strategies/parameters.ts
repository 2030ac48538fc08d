import { ConfigError } from "../errors";
import type { StrategyParameters } from "./types";

export const numberParam = (
	parameters: Readonly<StrategyParameters>,
	key: string
): number => {
	const value = parameters[key];
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigError(`Strategy parameter ${key} must be a number`);
	}
	return value;
};

export const positiveIntegerParam = (
	parameters: Readonly<StrategyParameters>,
	key: string
): number => {
	const value = numberParam(parameters, key);
	if (!Number.isInteger(value) || value <= 0) {
		throw new ConfigError(
			`Strategy parameter ${key} must be a positive integer, got ${value}`
		);
	}
	return value;
};

export const booleanParam = (
	parameters: Readonly<StrategyParameters>,
	key: string
): boolean => {
	const value = parameters[key];
	if (typeof value !== "boolean") {
		throw new ConfigError(`Strategy parameter ${key} must be a boolean`);
	}
	return value;
};

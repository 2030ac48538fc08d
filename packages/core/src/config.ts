import fs from "node:fs";
import path from "node:path";

import { readEnvString } from "./env";
import { ConfigError } from "./errors";
import type { StrategyParameters } from "./strategies/types";
import { parseUtcDate } from "./time/time";
import { validateTradingHours, type TradingHours } from "./time/tradingHours";
import type { ExecutionMode, RiskPolicy, TradingPair } from "./types";

export interface BacktestSettings {
	/** UTC epoch ms of the first bar any pair replays. */
	startDate: number;
	chunkMonths: number;
	chunksPerRun: number;
	historyWindowBars: number;
	stateDir: string;
	dataDir: string;
	/** Daily window the backtest CLI is allowed to run in. */
	schedule?: TradingHours;
}

export interface RealtimeSettings {
	pollIntervalMs: number;
	lookbackBars: number;
	tradingHours: TradingHours;
}

export interface BrokerSettings {
	exchangeId: string;
	apiKey: string;
	apiSecret: string;
	sandbox: boolean;
}

export interface RunnerConfig {
	mode: ExecutionMode;
	timeframe: string;
	risk: RiskPolicy;
	backtest: BacktestSettings;
	realtime: RealtimeSettings;
	pairs: TradingPair[];
	strategyParameters: Record<string, StrategyParameters>;
	instrumentsDir: string;
	broker: BrokerSettings;
}

export interface ConfigLoadOptions {
	configDir?: string;
	env?: NodeJS.ProcessEnv;
}

export const DEFAULT_TRADING_HOURS: TradingHours = {
	start: "08:55",
	end: "16:05",
	timezone: "Asia/Kolkata",
	weekdaysOnly: true,
};

const WORKSPACE_SENTINELS = [path.join("config", "runner.json"), ".git"];

let cachedWorkspaceRoot: string | undefined;

export const getWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}
	let current = process.cwd();
	while (
		!WORKSPACE_SENTINELS.some((file) => fs.existsSync(path.join(current, file)))
	) {
		const parent = path.dirname(current);
		if (parent === current) {
			break;
		}
		current = parent;
	}
	cachedWorkspaceRoot = current;
	return current;
};

export const getDefaultConfigDir = (): string =>
	path.join(getWorkspaceRoot(), "config");

type JsonRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is JsonRecord =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const readJsonFile = (filePath: string): unknown => {
	let contents: string;
	try {
		contents = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Unable to read config file ${filePath}`, {
			cause: error,
		});
	}
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new ConfigError(`Config file ${filePath} is not valid JSON`, {
			cause: error,
		});
	}
};

const section = (source: JsonRecord, key: string, field: string): JsonRecord => {
	const value = source[key];
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new ConfigError(`${field} must be an object`);
	}
	return value;
};

export const ensureNumber = (
	value: unknown,
	field: string,
	fallback?: number
): number => {
	if (value === undefined && fallback !== undefined) {
		return fallback;
	}
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new ConfigError(`Required numeric field missing in ${field}`);
	}
	return value;
};

const ensurePositive = (value: unknown, field: string, fallback?: number): number => {
	const result = ensureNumber(value, field, fallback);
	if (result <= 0) {
		throw new ConfigError(`${field} must be greater than zero, got ${result}`);
	}
	return result;
};

const ensurePositiveInteger = (
	value: unknown,
	field: string,
	fallback?: number
): number => {
	const result = ensurePositive(value, field, fallback);
	if (!Number.isInteger(result)) {
		throw new ConfigError(`${field} must be an integer, got ${result}`);
	}
	return result;
};

export const ensureString = (
	value: unknown,
	field: string,
	fallback?: string
): string => {
	if (value === undefined && fallback !== undefined) {
		return fallback;
	}
	if (typeof value !== "string" || value.trim() === "") {
		throw new ConfigError(`Required string field missing in ${field}`);
	}
	return value.trim();
};

const ensureBoolean = (value: unknown, field: string, fallback: boolean): boolean => {
	if (value === undefined) {
		return fallback;
	}
	if (typeof value !== "boolean") {
		throw new ConfigError(`${field} must be a boolean`);
	}
	return value;
};

const parseMode = (value: unknown, field: string): ExecutionMode => {
	if (value === "paper" || value === "live") {
		return value;
	}
	throw new ConfigError(`${field} must be "paper" or "live", got ${String(value)}`);
};

const parseTradingHours = (
	value: unknown,
	field: string,
	fallback: TradingHours
): TradingHours => {
	if (value === undefined) {
		return fallback;
	}
	if (!isRecord(value)) {
		throw new ConfigError(`${field} must be an object`);
	}
	const hours: TradingHours = {
		start: ensureString(value.start, `${field}.start`, fallback.start),
		end: ensureString(value.end, `${field}.end`, fallback.end),
		timezone: ensureString(value.timezone, `${field}.timezone`, fallback.timezone),
		weekdaysOnly: ensureBoolean(
			value.weekdaysOnly,
			`${field}.weekdaysOnly`,
			fallback.weekdaysOnly
		),
	};
	try {
		validateTradingHours(hours);
	} catch (error) {
		throw new ConfigError(`${field} is invalid`, { cause: error });
	}
	return hours;
};

const parseDate = (value: unknown, field: string, fallback: string): number => {
	const raw = ensureString(value, field, fallback);
	try {
		return parseUtcDate(raw);
	} catch (error) {
		throw new ConfigError(`${field} must be a date, got "${raw}"`, {
			cause: error,
		});
	}
};

const parsePairs = (value: unknown): TradingPair[] => {
	if (!Array.isArray(value) || value.length === 0) {
		throw new ConfigError("pairs must be a non-empty array");
	}
	const seen = new Set<string>();
	return value.map((entry, index) => {
		const field = `pairs[${index}]`;
		if (!isRecord(entry)) {
			throw new ConfigError(`${field} must be an object`);
		}
		const pair: TradingPair = {
			segment: ensureString(entry.segment, `${field}.segment`),
			symbol: ensureString(entry.symbol, `${field}.symbol`),
			strategy: ensureString(entry.strategy, `${field}.strategy`),
		};
		const key = `${pair.symbol}::${pair.strategy}`;
		if (seen.has(key)) {
			throw new ConfigError(`Duplicate pair ${key} in ${field}`);
		}
		seen.add(key);
		return pair;
	});
};

const parseStrategyParameters = (
	value: unknown
): Record<string, StrategyParameters> => {
	if (value === undefined) {
		return {};
	}
	if (!isRecord(value)) {
		throw new ConfigError("strategies must be an object");
	}
	const result: Record<string, StrategyParameters> = {};
	for (const [name, params] of Object.entries(value)) {
		if (!isRecord(params)) {
			throw new ConfigError(`strategies.${name} must be an object`);
		}
		const parsed: StrategyParameters = {};
		for (const [key, param] of Object.entries(params)) {
			if (
				typeof param !== "number" &&
				typeof param !== "string" &&
				typeof param !== "boolean"
			) {
				throw new ConfigError(
					`strategies.${name}.${key} must be a number, string or boolean`
				);
			}
			parsed[key] = param;
		}
		result[name] = parsed;
	}
	return result;
};

const readEnvNumber = (env: NodeJS.ProcessEnv, key: string): number | undefined => {
	const raw = env[key]?.trim();
	if (!raw) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ConfigError(`Environment variable ${key} must be numeric, got "${raw}"`);
	}
	return value;
};

/**
 * Build the immutable runner configuration from `config/runner.json` with
 * environment overrides for mode, capital and broker credentials. Relative
 * directories resolve against the workspace root.
 */
export const loadRunnerConfig = (options: ConfigLoadOptions = {}): RunnerConfig => {
	const configDir = options.configDir ?? getDefaultConfigDir();
	const env = options.env ?? process.env;
	const root = path.dirname(configDir);
	const file = readJsonFile(path.join(configDir, "runner.json"));
	if (!isRecord(file)) {
		throw new ConfigError("runner.json must contain an object");
	}

	const resolveDir = (value: string): string =>
		path.isAbsolute(value) ? value : path.join(root, value);

	const risk = section(file, "risk", "risk");
	const backtest = section(file, "backtest", "backtest");
	const realtime = section(file, "realtime", "realtime");
	const broker = section(file, "broker", "broker");

	const capital = ensurePositive(
		readEnvNumber(env, "ALGORUNNER_CAPITAL") ?? risk.capital,
		"risk.capital",
		100_000
	);
	const riskPerTradePct = ensurePositive(
		risk.riskPerTradePct,
		"risk.riskPerTradePct",
		2
	);
	if (riskPerTradePct > 100) {
		throw new ConfigError(
			`risk.riskPerTradePct must be at most 100, got ${riskPerTradePct}`
		);
	}

	const config: RunnerConfig = {
		mode: parseMode(readEnvString(env, "ALGORUNNER_MODE") ?? file.mode ?? "paper", "mode"),
		timeframe: ensureString(file.timeframe, "timeframe", "15m"),
		risk: {
			capital,
			riskPerTradePct,
			maxConcurrentPositions: ensurePositiveInteger(
				risk.maxConcurrentPositions,
				"risk.maxConcurrentPositions",
				5
			),
		},
		backtest: {
			startDate: parseDate(backtest.startDate, "backtest.startDate", "2010-01-01"),
			chunkMonths: ensurePositiveInteger(
				backtest.chunkMonths,
				"backtest.chunkMonths",
				4
			),
			chunksPerRun: ensurePositiveInteger(
				backtest.chunksPerRun,
				"backtest.chunksPerRun",
				1
			),
			historyWindowBars: ensurePositiveInteger(
				backtest.historyWindowBars,
				"backtest.historyWindowBars",
				200
			),
			stateDir: resolveDir(
				ensureString(backtest.stateDir, "backtest.stateDir", "data/backtest_state")
			),
			dataDir: resolveDir(
				ensureString(backtest.dataDir, "backtest.dataDir", "data/prices")
			),
			schedule:
				backtest.schedule === undefined
					? undefined
					: parseTradingHours(backtest.schedule, "backtest.schedule", {
							start: "06:00",
							end: "12:00",
							timezone: DEFAULT_TRADING_HOURS.timezone,
							weekdaysOnly: false,
						}),
		},
		realtime: {
			pollIntervalMs: ensurePositiveInteger(
				realtime.pollIntervalMs,
				"realtime.pollIntervalMs",
				60_000
			),
			lookbackBars: ensurePositiveInteger(
				realtime.lookbackBars,
				"realtime.lookbackBars",
				100
			),
			tradingHours: parseTradingHours(
				realtime.tradingHours,
				"realtime.tradingHours",
				DEFAULT_TRADING_HOURS
			),
		},
		pairs: parsePairs(file.pairs),
		strategyParameters: parseStrategyParameters(file.strategies),
		instrumentsDir: resolveDir(
			ensureString(file.instrumentsDir, "instrumentsDir", "config/instruments")
		),
		broker: {
			exchangeId: ensureString(
				readEnvString(env, "BROKER_EXCHANGE_ID") ?? broker.exchangeId,
				"broker.exchangeId",
				"binance"
			),
			apiKey: readEnvString(env, "BROKER_API_KEY") ?? "",
			apiSecret: readEnvString(env, "BROKER_API_SECRET") ?? "",
			sandbox: ensureBoolean(broker.sandbox, "broker.sandbox", false),
		},
	};

	return Object.freeze(config);
};

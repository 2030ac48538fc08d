import {
	getFlag,
	getPositiveIntArg,
	getStringArg,
	isWithinTradingHours,
	parseCliArgs,
	type TradingHours,
	type TradingPair,
} from "@algorunner/core";

export const USAGE = `Usage:
  npm run backtest -- [options]

Runs one replay pass: every configured pair advances by up to
backtest.chunksPerRun chunks from its checkpoint.

Options:
  --configDir <path>         Config directory (defaults to ./config)
  --chunks <n>               Override backtest.chunksPerRun for this pass
  --reset <symbol::strategy> Drop the pair's checkpoint before the pass
  --ignoreSchedule           Run outside the configured backtest window
  --json                     Print per-pair progress as JSON
  --help                     Show this message
`;

export interface BacktestCliOptions {
	configDir?: string;
	chunks?: number;
	reset?: Pick<TradingPair, "symbol" | "strategy">;
	ignoreSchedule: boolean;
	json: boolean;
	help: boolean;
}

export const parsePairKey = (value: string): Pick<TradingPair, "symbol" | "strategy"> => {
	const separator = value.lastIndexOf("::");
	const symbol = separator === -1 ? "" : value.slice(0, separator).trim();
	const strategy = separator === -1 ? "" : value.slice(separator + 2).trim();
	if (!symbol || !strategy) {
		throw new Error(`Expected <symbol>::<strategy>, got "${value}"`);
	}
	return { symbol, strategy };
};

export const parseBacktestOptions = (argv: readonly string[]): BacktestCliOptions => {
	const { args } = parseCliArgs(argv);
	const reset = getStringArg(args, "reset");
	return {
		configDir: getStringArg(args, "configDir"),
		chunks: getPositiveIntArg(args, "chunks"),
		reset: reset ? parsePairKey(reset) : undefined,
		ignoreSchedule: getFlag(args, "ignoreSchedule"),
		json: getFlag(args, "json"),
		help: getFlag(args, "help"),
	};
};

/** True when no schedule is configured or `now` falls inside it. */
export const isBacktestWindowOpen = (
	schedule: TradingHours | undefined,
	now: number
): boolean => !schedule || isWithinTradingHours(now, schedule);

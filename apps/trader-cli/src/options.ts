import {
	getFlag,
	getStringArg,
	parseCliArgs,
	type ExecutionMode,
} from "@algorunner/core";

export const USAGE = `Usage:
  npm run realtime -- [options]

Options:
  --configDir <path>   Config directory (defaults to ./config)
  --mode <paper|live>  Override the configured execution mode
  --once               Run a single tick and exit
  --help               Show this message

Send SIGUSR2 to close every open position.
`;

export interface TraderCliOptions {
	configDir?: string;
	mode?: ExecutionMode;
	once: boolean;
	help: boolean;
}

export const parseTraderOptions = (argv: readonly string[]): TraderCliOptions => {
	const { args } = parseCliArgs(argv);
	const mode = getStringArg(args, "mode");
	if (mode !== undefined && mode !== "paper" && mode !== "live") {
		throw new Error(`--mode must be paper or live, got "${mode}"`);
	}
	return {
		configDir: getStringArg(args, "configDir"),
		mode,
		once: getFlag(args, "once"),
		help: getFlag(args, "help"),
	};
};

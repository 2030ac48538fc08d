#!/usr/bin/env node

import {
	createLogger,
	getWorkspaceRoot,
	loadEnvFiles,
	type RunnerConfig,
} from "@algorunner/core";
import { createBacktestEngine, loadRuntime } from "@algorunner/app-di";

import { USAGE, isBacktestWindowOpen, parseBacktestOptions } from "./options";

const logger = createLogger("backtest-cli");

const withChunkOverride = (config: RunnerConfig, chunks?: number): RunnerConfig =>
	chunks === undefined
		? config
		: { ...config, backtest: { ...config.backtest, chunksPerRun: chunks } };

const main = async (): Promise<void> => {
	const options = parseBacktestOptions(process.argv.slice(2));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const envFiles = loadEnvFiles(getWorkspaceRoot());
	const runtime = loadRuntime({ configDir: options.configDir });
	const config = withChunkOverride(runtime.config, options.chunks);

	if (!options.ignoreSchedule && !isBacktestWindowOpen(config.backtest.schedule, Date.now())) {
		logger.info("backtest_outside_schedule", { schedule: config.backtest.schedule });
		return;
	}

	logger.info("backtest_starting", {
		envFiles,
		pairs: runtime.pairs.length,
		chunkMonths: config.backtest.chunkMonths,
		chunksPerRun: config.backtest.chunksPerRun,
		stateDir: config.backtest.stateDir,
		dataDir: config.backtest.dataDir,
	});

	const { engine } = createBacktestEngine({ ...runtime, config });
	const scheduler = engine.backtest;
	if (!scheduler) {
		throw new Error("Backtest engine was built without a replay scheduler");
	}

	const controller = new AbortController();
	const stop = (signal: NodeJS.Signals): void => {
		logger.warn("backtest_abort_requested", { signal });
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);

	if (options.reset) {
		await scheduler.resetPair(options.reset);
	}

	const report = await scheduler.runOnce(controller.signal);
	logger.info("backtest_pass_complete", {
		chunksProcessed: report.chunksProcessed,
		tradesRecorded: report.tradesRecorded,
		aborted: report.aborted,
	});

	const progress = engine.getBacktestProgress();
	if (options.json) {
		console.log(JSON.stringify(progress, null, 2));
	} else {
		console.table(Object.values(progress));
	}
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});

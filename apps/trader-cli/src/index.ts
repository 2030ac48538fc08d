#!/usr/bin/env node

import {
	createLogger,
	getWorkspaceRoot,
	loadEnvFiles,
} from "@algorunner/core";
import { createRealtimeEngine, loadRuntime } from "@algorunner/app-di";

import { USAGE, parseTraderOptions } from "./options";

const logger = createLogger("trader-cli");

const main = async (): Promise<void> => {
	const options = parseTraderOptions(process.argv.slice(2));
	if (options.help) {
		console.log(USAGE);
		return;
	}

	const envFiles = loadEnvFiles(getWorkspaceRoot());
	const runtime = loadRuntime({
		configDir: options.configDir,
		env: options.mode ? { ...process.env, ALGORUNNER_MODE: options.mode } : process.env,
	});
	const { engine } = createRealtimeEngine(runtime);
	const scheduler = engine.realtime;
	if (!scheduler) {
		throw new Error("Realtime engine was built without a scheduler");
	}

	logger.info("cli_starting", {
		envFiles,
		mode: engine.getMode(),
		timeframe: runtime.config.timeframe,
		exchange: runtime.config.broker.exchangeId,
		tradingHours: runtime.config.realtime.tradingHours,
	});

	if (options.once) {
		await scheduler.tick();
		engine.logSummary();
		return;
	}

	const controller = new AbortController();
	const stop = (signal: NodeJS.Signals): void => {
		logger.warn("shutdown_requested", { signal });
		controller.abort();
	};
	process.once("SIGINT", stop);
	process.once("SIGTERM", stop);
	process.on("SIGUSR2", () => {
		engine
			.closeAllPositions("SIGUSR2")
			.then((closed) => logger.info("close_all_served", { closed }))
			.catch((error: unknown) =>
				logger.error("close_all_failed", {
					message: error instanceof Error ? error.message : String(error),
				})
			);
	});

	await scheduler.start(controller.signal);
	engine.logSummary();
};

main().catch((error) => {
	logger.error("cli_unhandled_error", {
		message: error instanceof Error ? error.message : String(error),
		stack: error instanceof Error ? error.stack : undefined,
	});
	process.exit(1);
});

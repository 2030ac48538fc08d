import { describe, expect, it } from "vitest";

import { isBacktestWindowOpen, parseBacktestOptions, parsePairKey } from "./options";

describe("backtest CLI options", () => {
	it("defaults every flag to off", () => {
		expect(parseBacktestOptions([])).toEqual({
			configDir: undefined,
			chunks: undefined,
			reset: undefined,
			ignoreSchedule: false,
			json: false,
			help: false,
		});
	});

	it("reads chunk override, reset pair and flags", () => {
		expect(
			parseBacktestOptions([
				"--chunks",
				"3",
				"--reset=BTC/USDT::ema_crossover",
				"--ignoreSchedule",
				"--json",
			])
		).toMatchObject({
			chunks: 3,
			reset: { symbol: "BTC/USDT", strategy: "ema_crossover" },
			ignoreSchedule: true,
			json: true,
		});
	});

	it("rejects a reset target without a strategy", () => {
		expect(() => parsePairKey("INFY")).toThrow(
			'Expected <symbol>::<strategy>, got "INFY"'
		);
	});
});

describe("isBacktestWindowOpen", () => {
	const schedule = {
		start: "06:00",
		end: "12:00",
		timezone: "UTC",
		weekdaysOnly: false,
	};

	it("is always open without a schedule", () => {
		expect(isBacktestWindowOpen(undefined, Date.UTC(2024, 0, 6, 23, 0))).toBe(true);
	});

	it("follows the configured daily window", () => {
		expect(isBacktestWindowOpen(schedule, Date.UTC(2024, 0, 6, 7, 30))).toBe(true);
		expect(isBacktestWindowOpen(schedule, Date.UTC(2024, 0, 6, 13, 0))).toBe(false);
	});
});

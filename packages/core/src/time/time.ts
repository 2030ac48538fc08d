/**
 * Pure time utilities for deterministic timestamp handling.
 * All functions operate on UTC epoch milliseconds unless stated otherwise.
 */

export interface ParsedTimeframe {
	unit: "m" | "h" | "d";
	n: number;
	ms: number;
}

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

const TIMEFRAME_PATTERN = /^(\d+)([mhd])$/;

/**
 * Parse timeframe string into structured format.
 * @param timeframe - Format: "1m", "5m", "15m", "1h", "4h", "1d"
 * @throws Error if timeframe format is invalid
 */
export const parseTimeframe = (timeframe: string): ParsedTimeframe => {
	if (!timeframe || typeof timeframe !== "string") {
		throw new Error(
			`Invalid timeframe: expected string, got ${typeof timeframe}`
		);
	}

	const match = timeframe.trim().toLowerCase().match(TIMEFRAME_PATTERN);
	if (!match) {
		throw new Error(
			`Invalid timeframe format: "${timeframe}". Expected format like "1m", "5m", "1h", "1d"`
		);
	}

	const n = parseInt(match[1], 10);
	if (n <= 0) {
		throw new Error(
			`Invalid timeframe: period must be positive, got ${n} in "${timeframe}"`
		);
	}

	switch (match[2]) {
		case "m":
			return { unit: "m", n, ms: n * MINUTE_MS };
		case "h":
			return { unit: "h", n, ms: n * HOUR_MS };
		default:
			return { unit: "d", n, ms: n * DAY_MS };
	}
};

export const timeframeToMs = (timeframe: string): number =>
	parseTimeframe(timeframe).ms;

/**
 * Bucket a timestamp to the start of its timeframe period
 * @example bucketTimestamp(1735690261234, 60000) => 1735690260000
 */
export const bucketTimestamp = (ts: number, tfMs: number): number => {
	if (!Number.isFinite(ts) || ts < 0) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isFinite(tfMs) || tfMs <= 0) {
		throw new Error(`Invalid timeframe ms: ${tfMs}`);
	}
	return Math.floor(ts / tfMs) * tfMs;
};

/**
 * Add calendar months in UTC. The day of month is clamped to the length of
 * the target month, so Jan 31 + 1 month is Feb 28 (or 29).
 */
export const addUtcMonths = (ts: number, months: number): number => {
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid timestamp: ${ts}`);
	}
	if (!Number.isInteger(months)) {
		throw new Error(`Month offset must be an integer, got ${months}`);
	}
	const date = new Date(ts);
	const year = date.getUTCFullYear();
	const month = date.getUTCMonth() + months;
	const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
	const day = Math.min(date.getUTCDate(), lastDay);
	return Date.UTC(
		year,
		month,
		day,
		date.getUTCHours(),
		date.getUTCMinutes(),
		date.getUTCSeconds(),
		date.getUTCMilliseconds()
	);
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse "YYYY-MM-DD" (taken as UTC midnight) or a full ISO-8601 timestamp.
 */
export const parseUtcDate = (value: string): number => {
	const trimmed = value.trim();
	const ts = DATE_ONLY.test(trimmed)
		? Date.parse(`${trimmed}T00:00:00.000Z`)
		: Date.parse(trimmed);
	if (!Number.isFinite(ts)) {
		throw new Error(`Invalid date: "${value}"`);
	}
	return ts;
};

export const toIsoUtc = (ts: number): string => new Date(ts).toISOString();

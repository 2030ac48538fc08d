import { timeframeToMs, type Candle, type MarketDataClient } from "@algorunner/core";

import type { DataProviderLogger, HistoricalRange } from "./types";

const DEFAULT_BATCH_SIZE = 500;
const DEFAULT_MAX_ITERATIONS = 10_000;

export interface HistoricalFetchOptions {
	client: MarketDataClient;
	range: HistoricalRange;
	batchSize?: number;
	maxIterations?: number;
	logger?: DataProviderLogger;
	signal?: AbortSignal;
}

/**
 * Page through `client.fetchOHLCV` from the range start until a batch comes
 * back empty or passes the range end. Returns deduplicated candles inside
 * `[startTimestamp, endTimestamp)` in chronological order.
 */
export const fetchHistoricalCandles = async (
	options: HistoricalFetchOptions
): Promise<Candle[]> => {
	const { client, range } = options;
	const batchSize = Math.max(options.batchSize ?? DEFAULT_BATCH_SIZE, 1);
	const maxIterations = Math.max(
		options.maxIterations ?? DEFAULT_MAX_ITERATIONS,
		1
	);
	const timeframeMs = timeframeToMs(range.timeframe);

	const result: Candle[] = [];
	const seenTimestamps = new Set<number>();
	let since = Math.max(0, range.startTimestamp);
	let iterations = 0;

	while (since < range.endTimestamp && iterations < maxIterations) {
		options.signal?.throwIfAborted();
		const batch = await client.fetchOHLCV(
			range.symbol,
			range.timeframe,
			batchSize,
			since
		);
		iterations += 1;

		if (!batch.length) {
			break;
		}

		for (const candle of batch) {
			if (candle.timestamp >= range.endTimestamp) {
				return result;
			}
			if (
				candle.timestamp >= range.startTimestamp &&
				!seenTimestamps.has(candle.timestamp)
			) {
				result.push(candle);
				seenTimestamps.add(candle.timestamp);
			}
		}

		const last = batch[batch.length - 1];
		since = Math.max(last.timestamp + timeframeMs, since + timeframeMs);
	}

	if (iterations >= maxIterations) {
		options.logger?.warn("historical_fetch_iterations_exceeded", {
			symbol: range.symbol,
			timeframe: range.timeframe,
			startTimestamp: range.startTimestamp,
			endTimestamp: range.endTimestamp,
			iterations,
			maxIterations,
		});
	}

	return result.sort((a, b) => a.timestamp - b.timestamp);
};

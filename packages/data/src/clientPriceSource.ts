import {
	DataUnavailableError,
	isTradingError,
	type Candle,
	type Instrument,
	type MarketDataClient,
	type PriceDataSource,
} from "@algorunner/core";

import { fetchHistoricalCandles } from "./historical";
import type { DataProviderLogger } from "./types";

export interface ClientPriceSourceOptions {
	client: MarketDataClient;
	batchSize?: number;
	maxIterations?: number;
	logger?: DataProviderLogger;
}

/**
 * Price data source backed by a venue's paged OHLCV endpoint.
 */
export class ClientPriceSource implements PriceDataSource {
	constructor(private readonly options: ClientPriceSourceOptions) {}

	async fetchSeries(
		instrument: Instrument,
		from: number,
		to: number,
		interval: string,
		signal?: AbortSignal
	): Promise<Candle[]> {
		try {
			return await fetchHistoricalCandles({
				client: this.options.client,
				range: {
					symbol: instrument.symbol,
					timeframe: interval,
					startTimestamp: from,
					endTimestamp: to,
				},
				batchSize: this.options.batchSize,
				maxIterations: this.options.maxIterations,
				logger: this.options.logger,
				signal,
			});
		} catch (error) {
			if (signal?.aborted || isTradingError(error)) {
				throw error;
			}
			throw new DataUnavailableError(instrument.symbol, from, to, {
				cause: error,
			});
		}
	}
}

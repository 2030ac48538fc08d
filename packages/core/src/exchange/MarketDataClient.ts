import type { Candle } from "../types";

/**
 * Market data client interface for fetching historical and recent candles.
 * Kept separate from order placement so a read-only venue can feed signals.
 */
export interface MarketDataClient {
	/**
	 * Fetch OHLCV candle data for a symbol and timeframe.
	 * @param symbol - Venue symbol (e.g., "BTC/USDT")
	 * @param timeframe - Timeframe string (e.g., "1m", "5m", "1h")
	 * @param limit - Maximum number of candles to fetch
	 * @param since - Optional timestamp to fetch candles from
	 * @returns Candles in chronological order
	 */
	fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit?: number,
		since?: number
	): Promise<Candle[]>;
}

export interface QuoteSource {
	/** Last traded price. Throws `BrokerError` when the venue cannot answer. */
	fetchLastPrice(symbol: string): Promise<number>;
}

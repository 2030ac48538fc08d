import type { Candle, Instrument } from "../types";

/**
 * Historical price series provider.
 */
export interface PriceDataSource {
	/**
	 * Bars for `instrument` with `from <= timestamp < to`, oldest first.
	 * Throws `DataUnavailableError` when the range cannot be served at all; an
	 * empty array means the range is served but has no bars.
	 */
	fetchSeries(
		instrument: Instrument,
		from: number,
		to: number,
		interval: string,
		signal?: AbortSignal
	): Promise<Candle[]>;

	/** Exclusive upper bound of the data this source holds, when known. */
	coverageEnd?(instrument: Instrument, interval: string): Promise<number | null>;
}

export const inHalfOpenRange = (bar: Candle, from: number, to: number): boolean =>
	bar.timestamp >= from && bar.timestamp < to;

/** Drop out-of-range bars, sort oldest first and keep the last bar per timestamp. */
export const normalizeSeries = (
	bars: readonly Candle[],
	from: number,
	to: number
): Candle[] => {
	const byTimestamp = new Map<number, Candle>();
	for (const bar of bars) {
		if (inHalfOpenRange(bar, from, to)) {
			byTimestamp.set(bar.timestamp, bar);
		}
	}
	return Array.from(byTimestamp.values()).sort((a, b) => a.timestamp - b.timestamp);
};

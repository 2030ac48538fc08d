import {
	inHalfOpenRange,
	type Candle,
	type Instrument,
	type PriceDataSource,
	type QuoteSource,
	type Strategy,
	type TradeSignal,
	type TradingPair,
} from "@algorunner/core";

import type { ActivePair, EngineEvent, EngineNotifier } from "./types";

export const ACME: Instrument = {
	symbol: "ACME",
	segment: "NSE_EQ",
	exchange: "NSE",
	lotSize: 1,
	tickSize: 0.05,
	token: "101",
};

export const SCRIPTED = "scripted";

export const bar = (
	timestamp: number,
	close: number,
	timeframe = "1d",
	symbol = ACME.symbol
): Candle => ({
	symbol,
	timeframe,
	timestamp,
	open: close,
	high: close + 1,
	low: close - 1,
	close,
	volume: 1_000,
});

export const dailyBars = (
	start: number,
	closes: readonly number[]
): Candle[] => closes.map((close, index) => bar(start + index * 86_400_000, close));

/** Emits the signal stored for the timestamp of the last bar, if any. */
export const scriptedStrategy = (
	script: ReadonlyMap<number, Omit<TradeSignal, "reason" | "orderKind">>
): Strategy => ({
	name: SCRIPTED,
	parameters: {},
	evaluate(series) {
		const last = series[series.length - 1];
		const entry = last ? script.get(last.timestamp) : undefined;
		return entry ? { ...entry, orderKind: "MARKET", reason: "scripted" } : null;
	},
});

export const activePair = (
	strategy: Strategy,
	instrument: Instrument = ACME
): ActivePair => {
	const pair: TradingPair = {
		segment: instrument.segment,
		symbol: instrument.symbol,
		strategy: strategy.name,
	};
	return { pair, instrument, strategy };
};

export class FakePriceSource implements PriceDataSource {
	readonly calls: Array<{ from: number; to: number }> = [];
	failure: Error | null = null;
	readonly failuresBySymbol = new Map<string, Error>();

	constructor(readonly bars: Candle[] = []) {}

	async fetchSeries(
		instrument: Instrument,
		from: number,
		to: number
	): Promise<Candle[]> {
		this.calls.push({ from, to });
		const failure = this.failuresBySymbol.get(instrument.symbol) ?? this.failure;
		if (failure) {
			throw failure;
		}
		return this.bars.filter((candle) => inHalfOpenRange(candle, from, to));
	}
}

export class FakeQuotes implements QuoteSource {
	readonly requested: string[] = [];

	constructor(public next: () => number) {}

	async fetchLastPrice(symbol: string): Promise<number> {
		this.requested.push(symbol);
		return this.next();
	}
}

export class RecordingNotifier implements EngineNotifier {
	readonly events: EngineEvent[] = [];

	notify(event: EngineEvent): void {
		this.events.push(event);
	}
}

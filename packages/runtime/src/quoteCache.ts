export interface Quote {
	price: number;
	at: number;
}

/**
 * Last traded prices seen by the realtime loop, keyed by symbol.
 */
export class QuoteCache {
	private readonly quotes = new Map<string, Quote>();

	set(symbol: string, price: number, at: number): void {
		this.quotes.set(symbol, { price, at });
	}

	get(symbol: string): Quote | undefined {
		return this.quotes.get(symbol);
	}

	prices(): Map<string, number> {
		return new Map(
			Array.from(this.quotes.entries(), ([symbol, quote]) => [symbol, quote.price])
		);
	}
}

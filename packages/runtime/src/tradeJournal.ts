import type { TradeRecord } from "@algorunner/core";

export interface TradeJournal {
	append(records: readonly TradeRecord[]): void;
	list(): readonly TradeRecord[];
}

/** Append-only in-process journal. */
export class MemoryTradeJournal implements TradeJournal {
	private readonly records: TradeRecord[] = [];

	append(records: readonly TradeRecord[]): void {
		this.records.push(...records);
	}

	list(): readonly TradeRecord[] {
		return this.records;
	}

	forPair(symbol: string, strategy: string): TradeRecord[] {
		return this.records.filter(
			(record) => record.symbol === symbol && record.strategy === strategy
		);
	}
}

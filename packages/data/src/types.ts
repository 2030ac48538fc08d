import type { ModuleLogger } from "@algorunner/core";

export type DataProviderLogger = Pick<ModuleLogger, "info" | "warn" | "debug">;

export interface HistoricalRange {
	symbol: string;
	timeframe: string;
	/** Inclusive. */
	startTimestamp: number;
	/** Exclusive. */
	endTimestamp: number;
}

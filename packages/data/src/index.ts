export * from "./types";
export { fetchHistoricalCandles } from "./historical";
export type { HistoricalFetchOptions } from "./historical";
export {
	CsvPriceSource,
	parseCsvCandles,
	parseTimestamp,
	slugify,
} from "./csvPriceSource";
export type { CsvPriceSourceOptions } from "./csvPriceSource";
export { ClientPriceSource } from "./clientPriceSource";
export type { ClientPriceSourceOptions } from "./clientPriceSource";
export { mapCcxtCandleToCandle } from "./utils/ccxtMapper";

/**
 * Core package centralizes shared contracts, configuration and the strategy
 * registry. Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./time";
export * from "./env";
export * from "./config";
export * from "./symbols/InstrumentCatalog";
export * from "./strategies";
export * from "./utils/logger";
export * from "./cli/args";
export * from "./data/PriceDataSource";
export type {
	MarketDataClient,
	OrderConfirmation,
	OrderGateway,
	OrderRequest,
	QuoteSource,
} from "./exchange";
export type { CheckpointPair, CheckpointStore } from "./state/CheckpointStore";

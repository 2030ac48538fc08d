export type { MarketDataClient, QuoteSource } from "./MarketDataClient";
export type {
	OrderConfirmation,
	OrderGateway,
	OrderRequest,
} from "./ExecutionClient";

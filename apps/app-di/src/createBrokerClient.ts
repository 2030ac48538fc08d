import type {
	BrokerSettings,
	MarketDataClient,
	OrderGateway,
	QuoteSource,
} from "@algorunner/core";
import { CcxtBrokerClient } from "@algorunner/exchange-ccxt";

export type BrokerClient = MarketDataClient & QuoteSource & OrderGateway;

export const hasBrokerCredentials = (settings: BrokerSettings): boolean =>
	settings.apiKey.length > 0 && settings.apiSecret.length > 0;

export const createBrokerClient = (settings: BrokerSettings): CcxtBrokerClient =>
	new CcxtBrokerClient({
		exchangeId: settings.exchangeId,
		apiKey: settings.apiKey || undefined,
		secret: settings.apiSecret || undefined,
		sandbox: settings.sandbox,
	});

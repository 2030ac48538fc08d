import ccxt, {
	AuthenticationError,
	InsufficientFunds,
	InvalidOrder,
	NetworkError,
	RateLimitExceeded,
	type Exchange,
	type OHLCV,
	type Order,
} from "ccxt";
import {
	BrokerError,
	ConfigError,
	createLogger,
	type Candle,
	type MarketDataClient,
	type OrderConfirmation,
	type OrderGateway,
	type OrderRequest,
	type QuoteSource,
} from "@algorunner/core";
import { mapCcxtCandleToCandle } from "@algorunner/data";

const brokerLogger = createLogger("exchange:ccxt");

type ExchangeConstructor = new (config?: Record<string, unknown>) => Exchange;

const SUPPORTED_EXCHANGES: Record<string, ExchangeConstructor> = {
	binance: ccxt.binance,
	bybit: ccxt.bybit,
	kraken: ccxt.kraken,
	mexc: ccxt.mexc,
	okx: ccxt.okx,
};

export interface CcxtBrokerClientOptions {
	exchangeId?: string;
	apiKey?: string;
	secret?: string;
	sandbox?: boolean;
	/** Pre-built exchange instance; takes precedence over `exchangeId`. */
	exchange?: Exchange;
}

export const createCcxtExchange = (
	options: Omit<CcxtBrokerClientOptions, "exchange">
): Exchange => {
	const exchangeId = options.exchangeId ?? "binance";
	const ExchangeClass = SUPPORTED_EXCHANGES[exchangeId];
	if (!ExchangeClass) {
		throw new ConfigError(
			`Unsupported exchange ${exchangeId}. Supported: ${Object.keys(
				SUPPORTED_EXCHANGES
			).join(", ")}`
		);
	}
	const exchange = new ExchangeClass({
		apiKey: options.apiKey,
		secret: options.secret,
		enableRateLimit: true,
	});
	if (options.sandbox) {
		exchange.setSandboxMode(true);
	}
	return exchange;
};

/**
 * Translate ccxt's exception hierarchy into `BrokerError` kinds.
 */
export const toBrokerError = (error: unknown, action: string): BrokerError => {
	if (error instanceof BrokerError) {
		return error;
	}
	const message = `${action} failed: ${
		error instanceof Error ? error.message : String(error)
	}`;
	if (error instanceof AuthenticationError) {
		return new BrokerError(message, "auth", { cause: error });
	}
	if (error instanceof RateLimitExceeded) {
		return new BrokerError(message, "rate_limit", { cause: error });
	}
	if (error instanceof InvalidOrder || error instanceof InsufficientFunds) {
		return new BrokerError(message, "rejected", { cause: error });
	}
	if (error instanceof NetworkError) {
		return new BrokerError(message, "network", { cause: error });
	}
	return new BrokerError(message, "unknown", { cause: error });
};

const toConfirmationStatus = (status: string | undefined): OrderConfirmation["status"] => {
	switch (status) {
		case "open":
		case "closed":
		case "canceled":
			return status;
		default:
			return "unknown";
	}
};

/**
 * ccxt-backed market data, quotes and order placement for one venue.
 */
export class CcxtBrokerClient implements MarketDataClient, QuoteSource, OrderGateway {
	private readonly exchange: Exchange;
	private marketsLoaded = false;

	constructor(options: CcxtBrokerClientOptions = {}) {
		this.exchange = options.exchange ?? createCcxtExchange(options);
	}

	get exchangeId(): string {
		return this.exchange.id;
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		limit = 500,
		since?: number
	): Promise<Candle[]> {
		try {
			const marketSymbol = await this.resolveMarketSymbol(symbol);
			const ohlcv = await this.exchange.fetchOHLCV(
				marketSymbol,
				timeframe,
				since,
				limit
			);
			return ohlcv.map((row: OHLCV) => mapCcxtCandleToCandle(row, symbol, timeframe));
		} catch (error) {
			throw toBrokerError(error, `fetchOHLCV ${symbol} ${timeframe}`);
		}
	}

	async fetchLastPrice(symbol: string): Promise<number> {
		let last: number | undefined;
		try {
			const marketSymbol = await this.resolveMarketSymbol(symbol);
			const ticker = await this.exchange.fetchTicker(marketSymbol);
			last = ticker.last ?? ticker.close;
		} catch (error) {
			throw toBrokerError(error, `fetchTicker ${symbol}`);
		}
		if (typeof last !== "number" || !Number.isFinite(last) || last <= 0) {
			throw new BrokerError(`No last price available for ${symbol}`, "unknown");
		}
		return last;
	}

	async placeOrder(request: OrderRequest): Promise<OrderConfirmation> {
		if (request.orderKind === "LIMIT" && request.price === undefined) {
			throw new BrokerError(`LIMIT order for ${request.symbol} needs a price`, "rejected");
		}
		let order: Order;
		try {
			const marketSymbol = await this.resolveMarketSymbol(request.symbol);
			order = await this.exchange.createOrder(
				marketSymbol,
				request.orderKind === "LIMIT" ? "limit" : "market",
				request.side,
				request.quantity,
				request.orderKind === "LIMIT" ? request.price : undefined,
				request.clientOrderId ? { clientOrderId: request.clientOrderId } : {}
			);
		} catch (error) {
			const brokerError = toBrokerError(error, `createOrder ${request.symbol}`);
			brokerLogger.error("order_rejected", {
				symbol: request.symbol,
				side: request.side,
				quantity: request.quantity,
				kind: brokerError.kind,
				error: brokerError.message,
			});
			throw brokerError;
		}

		return {
			id: order.id,
			symbol: request.symbol,
			side: request.side,
			quantity: request.quantity,
			orderKind: request.orderKind,
			averagePrice:
				typeof order.average === "number" && Number.isFinite(order.average)
					? order.average
					: undefined,
			status: toConfirmationStatus(order.status),
		};
	}

	private async resolveMarketSymbol(symbol: string): Promise<string> {
		await this.ensureMarketsLoaded();
		try {
			return this.exchange.market(symbol).symbol;
		} catch (error) {
			const linearSymbol = `${symbol}:USDT`;
			const market = this.exchange.markets?.[linearSymbol];
			if (market?.symbol) {
				return market.symbol;
			}
			throw new BrokerError(
				`Unknown ${this.exchange.id} market symbol for ${symbol}`,
				"rejected",
				{ cause: error }
			);
		}
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.exchange.loadMarkets();
		this.marketsLoaded = true;
	}
}

import type { OrderKind, OrderSide } from "../types";

export interface OrderRequest {
	symbol: string;
	side: OrderSide;
	quantity: number;
	orderKind: OrderKind;
	/** Required for LIMIT orders. */
	price?: number;
	/** Client-side tag echoed back by venues that support it. */
	clientOrderId?: string;
}

/**
 * Minimal confirmation returned after an order is accepted.
 * This mirrors the CCXT Order subset we actually use.
 */
export interface OrderConfirmation {
	id: string;
	symbol: string;
	side: OrderSide;
	quantity: number;
	orderKind: OrderKind;
	/** Average fill price when the venue reports one. */
	averagePrice?: number;
	status: "open" | "closed" | "canceled" | "unknown";
	raw?: Record<string, unknown>;
}

/**
 * Order placement. Implementations throw `BrokerError` on rejection, auth
 * failure, rate limits or transport errors; nothing is assumed filled unless
 * this resolves.
 */
export interface OrderGateway {
	placeOrder(request: OrderRequest): Promise<OrderConfirmation>;
}

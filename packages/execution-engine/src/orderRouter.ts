import {
	BrokerError,
	createLogger,
	type ExecutionMode,
	type OrderConfirmation,
	type OrderGateway,
	type OrderRequest,
} from "@algorunner/core";

const routerLogger = createLogger("execution-engine:router");

export interface OrderRouterOptions {
	mode?: ExecutionMode;
	/** Required before switching to live. */
	gateway?: OrderGateway;
}

export interface RoutedOrder {
	confirmation: OrderConfirmation;
	mode: ExecutionMode;
	/** Price the ledger should book: the venue's average fill when reported. */
	fillPrice: number;
}

/**
 * Sends orders to the broker in live mode and fills them synthetically at
 * the reference price in paper mode.
 */
export class OrderRouter {
	private mode: ExecutionMode;
	private paperSequence = 0;

	constructor(private readonly options: OrderRouterOptions = {}) {
		this.mode = options.mode ?? "paper";
		if (this.mode === "live" && !options.gateway) {
			throw new BrokerError("Live mode requires an order gateway", "auth");
		}
	}

	getMode(): ExecutionMode {
		return this.mode;
	}

	switchMode(mode: ExecutionMode): void {
		if (mode === "live" && !this.options.gateway) {
			throw new BrokerError("Live mode requires an order gateway", "auth");
		}
		if (mode !== this.mode) {
			routerLogger.info("execution_mode_switched", { from: this.mode, to: mode });
		}
		this.mode = mode;
	}

	async route(request: OrderRequest, referencePrice: number): Promise<RoutedOrder> {
		if (this.mode === "paper" || !this.options.gateway) {
			this.paperSequence += 1;
			return {
				mode: "paper",
				fillPrice: referencePrice,
				confirmation: {
					id: `paper-${this.paperSequence}`,
					symbol: request.symbol,
					side: request.side,
					quantity: request.quantity,
					orderKind: request.orderKind,
					averagePrice: referencePrice,
					status: "closed",
				},
			};
		}

		let confirmation: OrderConfirmation;
		try {
			confirmation = await this.options.gateway.placeOrder(request);
		} catch (error) {
			routerLogger.error("order_failed", {
				symbol: request.symbol,
				side: request.side,
				quantity: request.quantity,
				error,
			});
			if (error instanceof BrokerError) {
				throw error;
			}
			throw new BrokerError(
				`Order for ${request.symbol} failed: ${
					error instanceof Error ? error.message : String(error)
				}`,
				"unknown",
				{ cause: error }
			);
		}

		routerLogger.info("order_submitted", {
			symbol: request.symbol,
			side: request.side,
			quantity: request.quantity,
			orderId: confirmation.id,
			status: confirmation.status,
		});
		return {
			mode: "live",
			confirmation,
			fillPrice: confirmation.averagePrice ?? request.price ?? referencePrice,
		};
	}
}

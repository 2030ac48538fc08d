import type { TradeSignal } from "../types";

const isPositive = (value: unknown): value is number =>
	typeof value === "number" && Number.isFinite(value) && value > 0;

/**
 * Returns a description of the first problem with `signal`, or `null` when
 * it can be sized and opened.
 */
export const findSignalProblem = (signal: TradeSignal): string | null => {
	if (signal.action !== "BUY" && signal.action !== "SELL") {
		return `unknown action ${String(signal.action)}`;
	}
	if (signal.orderKind !== "MARKET" && signal.orderKind !== "LIMIT") {
		return `unknown order kind ${String(signal.orderKind)}`;
	}
	if (!isPositive(signal.price)) {
		return `price must be a positive number, got ${signal.price}`;
	}
	if (!isPositive(signal.stopLoss)) {
		return `stop-loss must be a positive number, got ${signal.stopLoss}`;
	}
	if (!isPositive(signal.target)) {
		return `target must be a positive number, got ${signal.target}`;
	}
	if (signal.action === "BUY") {
		if (!(signal.stopLoss < signal.price && signal.price < signal.target)) {
			return `BUY requires stopLoss < price < target, got ${signal.stopLoss} / ${signal.price} / ${signal.target}`;
		}
	} else if (!(signal.target < signal.price && signal.price < signal.stopLoss)) {
		return `SELL requires target < price < stopLoss, got ${signal.target} / ${signal.price} / ${signal.stopLoss}`;
	}
	return null;
};

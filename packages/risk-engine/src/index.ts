import {
	InsufficientSizingError,
	type Instrument,
	type RiskPolicy,
	type TradeSignal,
} from "@algorunner/core";

export interface SizingRequest {
	signal: TradeSignal;
	instrument: Instrument;
	/** Currently open positions across every pair. */
	openPositions: number;
	/** Σ quantity × |entry − stop| over the open positions. */
	deployedRisk: number;
}

export interface SizingDecision {
	quantity: number;
	lots: number;
	riskAmount: number;
	perUnitRisk: number;
	/** quantity × perUnitRisk for the new position. */
	capitalAtRisk: number;
}

const LOT_EPSILON = 1e-9;

const decimalsOf = (value: number): number => {
	const text = value.toString();
	if (text.includes("e-")) {
		return parseInt(text.split("e-")[1], 10);
	}
	const dot = text.indexOf(".");
	return dot === -1 ? 0 : text.length - dot - 1;
};

/** Whole lots contained in `units`, tolerant of binary rounding. */
export const wholeLots = (units: number, lotSize: number): number =>
	Math.max(0, Math.floor(units / lotSize + LOT_EPSILON));

export const lotsToQuantity = (lots: number, lotSize: number): number =>
	Number((lots * lotSize).toFixed(decimalsOf(lotSize)));

/**
 * Fixed-fractional position sizing: risk `riskPerTradePct` of capital per
 * trade, floored to whole lots, with total capital at risk across open
 * positions capped at the configured capital.
 */
export class RiskSizer {
	constructor(private readonly policy: RiskPolicy) {}

	get maxConcurrentPositions(): number {
		return this.policy.maxConcurrentPositions;
	}

	size(request: SizingRequest): SizingDecision {
		const { signal, instrument, openPositions, deployedRisk } = request;
		const { capital, riskPerTradePct, maxConcurrentPositions } = this.policy;

		if (openPositions >= maxConcurrentPositions) {
			throw new InsufficientSizingError(
				"max_positions",
				`${openPositions} positions already open (max ${maxConcurrentPositions})`
			);
		}

		const perUnitRisk = Math.abs(signal.price - signal.stopLoss);
		if (!Number.isFinite(perUnitRisk) || perUnitRisk <= 0) {
			throw new InsufficientSizingError(
				"zero_quantity",
				`Per-unit risk must be positive, got ${perUnitRisk}`
			);
		}

		const riskAmount = (capital * riskPerTradePct) / 100;
		const rawQuantity = riskAmount / perUnitRisk;
		const lotsByRisk = wholeLots(rawQuantity, instrument.lotSize);
		if (lotsByRisk === 0) {
			throw new InsufficientSizingError(
				"zero_quantity",
				`Raw quantity ${rawQuantity} for ${instrument.symbol} is below one lot of ${instrument.lotSize}`
			);
		}

		const remainingBudget = capital - deployedRisk;
		const lotsByCapital = wholeLots(
			remainingBudget / perUnitRisk,
			instrument.lotSize
		);
		const lots = Math.min(lotsByRisk, lotsByCapital);
		if (lots === 0) {
			throw new InsufficientSizingError(
				"capital_exhausted",
				`Capital at risk ${deployedRisk} leaves no room for ${instrument.symbol}`
			);
		}

		const quantity = lotsToQuantity(lots, instrument.lotSize);
		return {
			quantity,
			lots,
			riskAmount,
			perUnitRisk,
			capitalAtRisk: quantity * perUnitRisk,
		};
	}
}

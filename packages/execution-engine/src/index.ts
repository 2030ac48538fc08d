export { PositionLedger, exitForBar, realizedPnlFor } from "./positionLedger";
export type {
	BarRange,
	LedgerSummary,
	OpenPositionRequest,
	PositionLedgerOptions,
	PriceLookup,
} from "./positionLedger";
export { OrderRouter } from "./orderRouter";
export type { OrderRouterOptions, RoutedOrder } from "./orderRouter";
export { KeyedLock } from "./keyedLock";
export { PaperAccount } from "./paperAccount";
export type { AccountSnapshot } from "./paperAccount";

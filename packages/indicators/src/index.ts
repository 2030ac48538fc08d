export { ema, emaSeries } from "./ema";
export type { EmaSeed } from "./ema";
export { sma, smaSeries } from "./sma";

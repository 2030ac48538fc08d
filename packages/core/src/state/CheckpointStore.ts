import type { BacktestCheckpoint, TradingPair } from "../types";

export type CheckpointPair = Pick<TradingPair, "symbol" | "strategy">;

/**
 * Durable per-pair replay progress. `read` returns `null` when the pair has
 * never been checkpointed and throws `StateError` when the stored state
 * cannot be trusted. `write` replaces the stored value atomically.
 */
export interface CheckpointStore {
	read(pair: CheckpointPair): Promise<BacktestCheckpoint | null>;
	write(pair: CheckpointPair, checkpoint: BacktestCheckpoint): Promise<void>;
	reset(pair: CheckpointPair): Promise<void>;
}

import fs from "node:fs/promises";
import path from "node:path";

import {
	createLogger,
	isRecord,
	StateError,
	type BacktestCheckpoint,
	type CheckpointPair,
	type CheckpointStore,
} from "@algorunner/core";

const storeLogger = createLogger("persistence:checkpoints");

const UNSAFE_CHARS = /[^A-Za-z0-9._-]+/g;

export const checkpointFileName = (pair: CheckpointPair): string =>
	`${pair.symbol.replace(UNSAFE_CHARS, "_")}__${pair.strategy.replace(
		UNSAFE_CHARS,
		"_"
	)}.json`;

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
	error instanceof Error && "code" in error;

/**
 * Parse and validate a stored checkpoint. Anything that does not match the
 * expected shape, or belongs to another pair, is a `StateError`.
 */
export const parseCheckpoint = (
	pair: CheckpointPair,
	contents: string,
	source: string
): BacktestCheckpoint => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch (error) {
		throw new StateError(pair, `Checkpoint ${source} is not valid JSON`, {
			cause: error,
		});
	}
	if (!isRecord(parsed)) {
		throw new StateError(pair, `Checkpoint ${source} must contain an object`);
	}
	const { version, symbol, strategy, cursor, tradeCount, realizedPnl, updatedAt } =
		parsed;
	if (version !== 1) {
		throw new StateError(
			pair,
			`Checkpoint ${source} has unsupported version ${String(version)}`
		);
	}
	if (symbol !== pair.symbol || strategy !== pair.strategy) {
		throw new StateError(
			pair,
			`Checkpoint ${source} belongs to ${String(symbol)}/${String(strategy)}`
		);
	}
	if (typeof cursor !== "string" || !Number.isFinite(Date.parse(cursor))) {
		throw new StateError(pair, `Checkpoint ${source} has an invalid cursor`);
	}
	if (
		typeof tradeCount !== "number" ||
		!Number.isInteger(tradeCount) ||
		tradeCount < 0
	) {
		throw new StateError(pair, `Checkpoint ${source} has an invalid tradeCount`);
	}
	if (typeof realizedPnl !== "number" || !Number.isFinite(realizedPnl)) {
		throw new StateError(pair, `Checkpoint ${source} has an invalid realizedPnl`);
	}
	return {
		version: 1,
		symbol: pair.symbol,
		strategy: pair.strategy,
		cursor,
		tradeCount,
		realizedPnl,
		updatedAt: typeof updatedAt === "string" ? updatedAt : cursor,
	};
};

/**
 * One JSON file per pair under `dir`. Writes go to a temporary file that is
 * renamed over the target, so a reader sees either the old or the new
 * checkpoint.
 */
export class FileCheckpointStore implements CheckpointStore {
	private tempSequence = 0;

	constructor(private readonly dir: string) {}

	pathFor(pair: CheckpointPair): string {
		return path.join(this.dir, checkpointFileName(pair));
	}

	async read(pair: CheckpointPair): Promise<BacktestCheckpoint | null> {
		const filePath = this.pathFor(pair);
		let contents: string;
		try {
			contents = await fs.readFile(filePath, "utf-8");
		} catch (error) {
			if (isErrnoException(error) && error.code === "ENOENT") {
				return null;
			}
			throw new StateError(pair, `Unable to read checkpoint ${filePath}`, {
				cause: error,
			});
		}
		return parseCheckpoint(pair, contents, filePath);
	}

	async write(pair: CheckpointPair, checkpoint: BacktestCheckpoint): Promise<void> {
		const filePath = this.pathFor(pair);
		this.tempSequence += 1;
		const tempPath = `${filePath}.${process.pid}.${this.tempSequence}.tmp`;
		try {
			await fs.mkdir(this.dir, { recursive: true });
			await fs.writeFile(tempPath, `${JSON.stringify(checkpoint, null, 2)}\n`, "utf-8");
			await fs.rename(tempPath, filePath);
		} catch (error) {
			await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
				storeLogger.warn("checkpoint_temp_cleanup_failed", {
					path: tempPath,
					error: cleanupError,
				});
			});
			throw new StateError(pair, `Unable to write checkpoint ${filePath}`, {
				cause: error,
			});
		}
		storeLogger.debug("checkpoint_written", {
			symbol: pair.symbol,
			strategy: pair.strategy,
			cursor: checkpoint.cursor,
		});
	}

	async reset(pair: CheckpointPair): Promise<void> {
		const filePath = this.pathFor(pair);
		try {
			await fs.rm(filePath, { force: true });
		} catch (error) {
			throw new StateError(pair, `Unable to reset checkpoint ${filePath}`, {
				cause: error,
			});
		}
		storeLogger.info("checkpoint_reset", {
			symbol: pair.symbol,
			strategy: pair.strategy,
		});
	}
}

/**
 * Map-backed store for tests and dry runs.
 */
export class MemoryCheckpointStore implements CheckpointStore {
	private readonly entries = new Map<string, string>();

	async read(pair: CheckpointPair): Promise<BacktestCheckpoint | null> {
		const stored = this.entries.get(checkpointFileName(pair));
		return stored === undefined ? null : parseCheckpoint(pair, stored, "memory");
	}

	async write(pair: CheckpointPair, checkpoint: BacktestCheckpoint): Promise<void> {
		this.entries.set(checkpointFileName(pair), JSON.stringify(checkpoint));
	}

	async reset(pair: CheckpointPair): Promise<void> {
		this.entries.delete(checkpointFileName(pair));
	}

	/** Overwrite the raw stored text, e.g. to simulate corruption. */
	setRaw(pair: CheckpointPair, contents: string): void {
		this.entries.set(checkpointFileName(pair), contents);
	}
}

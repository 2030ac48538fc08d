import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StateError, type BacktestCheckpoint } from "@algorunner/core";
import { checkpointFileName, FileCheckpointStore } from "./fileCheckpointStore";

const pair = { symbol: "BTC/USDT", strategy: "ema_crossover" };

const checkpoint: BacktestCheckpoint = {
	version: 1,
	symbol: "BTC/USDT",
	strategy: "ema_crossover",
	cursor: "2010-05-01T00:00:00.000Z",
	tradeCount: 3,
	realizedPnl: 1250.5,
	updatedAt: "2024-03-04T06:00:00.000Z",
};

describe("FileCheckpointStore", () => {
	let dir: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "checkpoints-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("returns null when no checkpoint exists", async () => {
		const store = new FileCheckpointStore(dir);
		await expect(store.read(pair)).resolves.toBeNull();
	});

	it("writes and reads back a checkpoint", async () => {
		const store = new FileCheckpointStore(path.join(dir, "nested"));
		await store.write(pair, checkpoint);
		await expect(store.read(pair)).resolves.toEqual(checkpoint);
		expect(checkpointFileName(pair)).toBe("BTC_USDT__ema_crossover.json");
	});

	it("leaves no temporary files behind", async () => {
		const store = new FileCheckpointStore(dir);
		await store.write(pair, checkpoint);
		await store.write(pair, { ...checkpoint, cursor: "2010-09-01T00:00:00.000Z" });
		expect(fs.readdirSync(dir)).toEqual(["BTC_USDT__ema_crossover.json"]);
	});

	it("raises a StateError for corrupt content", async () => {
		const store = new FileCheckpointStore(dir);
		fs.writeFileSync(store.pathFor(pair), "{ \"version\": 1, \"cursor\": ");
		await expect(store.read(pair)).rejects.toBeInstanceOf(StateError);
	});

	it("raises a StateError for a checkpoint of another pair", async () => {
		const store = new FileCheckpointStore(dir);
		fs.writeFileSync(
			store.pathFor(pair),
			JSON.stringify({ ...checkpoint, strategy: "sma_crossover" })
		);
		await expect(store.read(pair)).rejects.toThrow(
			/belongs to BTC\/USDT\/sma_crossover/
		);
	});

	it("reset removes the checkpoint", async () => {
		const store = new FileCheckpointStore(dir);
		await store.write(pair, checkpoint);
		await store.reset(pair);
		await expect(store.read(pair)).resolves.toBeNull();
	});
});

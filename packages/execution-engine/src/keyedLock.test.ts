import { describe, expect, it } from "vitest";
import { KeyedLock } from "./keyedLock";

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

describe("KeyedLock", () => {
	it("runs work for the same key one at a time in order", async () => {
		const lock = new KeyedLock();
		const events: string[] = [];

		const slow = lock.run("INFY", async () => {
			events.push("slow:start");
			await tick();
			await tick();
			events.push("slow:end");
		});
		const fast = lock.run("INFY", async () => {
			events.push("fast:start");
			events.push("fast:end");
		});

		await Promise.all([slow, fast]);
		expect(events).toEqual(["slow:start", "slow:end", "fast:start", "fast:end"]);
		expect(lock.isLocked("INFY")).toBe(false);
	});

	it("does not block other keys", async () => {
		const lock = new KeyedLock();
		const events: string[] = [];
		let release: () => void = () => undefined;
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});

		const held = lock.run("INFY", async () => {
			await gate;
			events.push("INFY");
		});
		await lock.run("TCS", () => {
			events.push("TCS");
		});
		release();
		await held;

		expect(events).toEqual(["TCS", "INFY"]);
	});

	it("releases the key when the work throws", async () => {
		const lock = new KeyedLock();
		await expect(
			lock.run("INFY", () => {
				throw new Error("boom");
			})
		).rejects.toThrow("boom");
		await expect(lock.run("INFY", () => 42)).resolves.toBe(42);
	});
});

/**
 * Serializes async work per key. Work queued under the same key runs in
 * submission order; different keys run independently.
 */
export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	async run<T>(key: string, work: () => Promise<T> | T): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		let release: () => void = () => undefined;
		const current = new Promise<void>((resolve) => {
			release = resolve;
		});
		const tail = previous.then(() => current);
		this.tails.set(key, tail);

		await previous;
		try {
			return await work();
		} finally {
			release();
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	isLocked(key: string): boolean {
		return this.tails.has(key);
	}
}

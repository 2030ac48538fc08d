export interface Clock {
	now(): number;
	/** Resolves after `ms`, or rejects with the signal's reason once aborted. */
	sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

const abortReason = (signal: AbortSignal): Error =>
	signal.reason instanceof Error ? signal.reason : new Error("Aborted");

export class SystemClock implements Clock {
	now(): number {
		return Date.now();
	}

	sleep(ms: number, signal?: AbortSignal): Promise<void> {
		return new Promise((resolve, reject) => {
			if (signal?.aborted) {
				reject(abortReason(signal));
				return;
			}
			const onAbort = (): void => {
				clearTimeout(timer);
				reject(signal ? abortReason(signal) : new Error("Aborted"));
			};
			const timer = setTimeout(() => {
				signal?.removeEventListener("abort", onAbort);
				resolve();
			}, ms);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}
}

/**
 * Deterministic clock for tests and replays. `sleep` advances time instead of
 * waiting.
 */
export class ManualClock implements Clock {
	private current: number;

	constructor(start: number) {
		this.current = start;
	}

	now(): number {
		return this.current;
	}

	set(ts: number): void {
		this.current = ts;
	}

	advance(ms: number): void {
		this.current += ms;
	}

	async sleep(ms: number, signal?: AbortSignal): Promise<void> {
		if (signal?.aborted) {
			throw abortReason(signal);
		}
		this.current += ms;
	}
}

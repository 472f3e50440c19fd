export type RaceOutcome<T> = { settled: true; value: T } | { settled: false };

/**
 * Wall-clock budget for one cycle. The signal aborts when the budget runs
 * out; `dispose` must be called once the cycle ends.
 */
export class CycleDeadline {
	readonly timeoutMs: number;
	readonly expiresAt: number;
	private readonly controller = new AbortController();
	private readonly timer: ReturnType<typeof setTimeout>;

	constructor(timeoutMs: number, private readonly now: () => number = Date.now) {
		this.timeoutMs = timeoutMs;
		this.expiresAt = now() + timeoutMs;
		this.timer = setTimeout(() => this.controller.abort(), timeoutMs);
	}

	get signal(): AbortSignal {
		return this.controller.signal;
	}

	get expired(): boolean {
		return this.controller.signal.aborted || this.now() >= this.expiresAt;
	}

	/** Resolves with the work's value, or unsettled if the budget runs out first. */
	race<T>(work: Promise<T>): Promise<RaceOutcome<T>> {
		if (this.expired) {
			return Promise.resolve({ settled: false });
		}
		const signal = this.controller.signal;
		return new Promise<RaceOutcome<T>>((resolve, reject) => {
			const onAbort = (): void => resolve({ settled: false });
			signal.addEventListener("abort", onAbort, { once: true });
			work.then(
				(value) => {
					signal.removeEventListener("abort", onAbort);
					resolve({ settled: true, value });
				},
				(error: unknown) => {
					signal.removeEventListener("abort", onAbort);
					reject(error);
				}
			);
		});
	}

	dispose(): void {
		clearTimeout(this.timer);
	}
}

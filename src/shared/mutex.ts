/**
 * Mutex — FIFO async mutual exclusion built on a promise chain.
 *
 * One instance guards one critical region (a rate limiter's bucket, an
 * engine's ladder and balance state). Waiters run in arrival order.
 */
export class Mutex {
	private tail: Promise<void> = Promise.resolve();
	private held = 0;

	/** True while a holder or a waiter is queued. */
	get isLocked(): boolean {
		return this.held > 0;
	}

	/**
	 * Runs `fn` once every earlier holder has released. The lock is released
	 * whether `fn` resolves or rejects; its outcome is passed through.
	 */
	async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
		const previous = this.tail;
		let release: () => void = () => {};
		this.tail = new Promise<void>((resolve) => {
			release = resolve;
		});
		this.held++;
		try {
			await previous;
			return await fn();
		} finally {
			this.held--;
			release();
		}
	}
}

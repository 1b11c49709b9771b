interface Waiter<T> {
	resolve(item: T | null): void;
}

/**
 * Unbounded FIFO whose consumer can await the next item.
 *
 * next() resolves with null once the given signal aborts; items already
 * queued stay queued for the next consumer.
 */
export class AsyncQueue<T> {
	private readonly items: T[] = [];
	private readonly waiters: Waiter<T>[] = [];

	get size(): number {
		return this.items.length;
	}

	push(item: T): void {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve(item);
			return;
		}
		this.items.push(item);
	}

	next(signal?: AbortSignal): Promise<T | null> {
		if (signal?.aborted) return Promise.resolve(null);
		if (this.items.length > 0) {
			return Promise.resolve(this.items.shift() ?? null);
		}

		return new Promise<T | null>((resolve) => {
			const onAbort = (): void => {
				const idx = this.waiters.indexOf(waiter);
				if (idx !== -1) this.waiters.splice(idx, 1);
				resolve(null);
			};
			const waiter: Waiter<T> = {
				resolve: (item) => {
					signal?.removeEventListener("abort", onAbort);
					resolve(item);
				},
			};
			this.waiters.push(waiter);
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}
}

/**
 * KeyedLock: serializes async work per key.
 *
 * Tasks for the same key run one after another in submission order; tasks
 * for different keys run independently. A failed task does not block the
 * next one.
 */
export class KeyedLock {
	private readonly tails = new Map<string, Promise<void>>();

	async run<T>(key: string, task: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const result = previous.then(task);
		const tail = result.then(
			() => undefined,
			() => undefined,
		);
		this.tails.set(key, tail);
		try {
			return await result;
		} finally {
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	/** Keys with queued or running work. */
	get size(): number {
		return this.tails.size;
	}
}

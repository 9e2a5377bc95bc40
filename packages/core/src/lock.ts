/**
 * Per-key serialization of async work.
 */

export interface KeyedLock {
	/**
	 * Run `task` once every task queued earlier for the same key has settled.
	 * Tasks for different keys do not wait on each other.
	 */
	run<T>(key: string, task: () => T | Promise<T>): Promise<T>;
	/** Number of keys with queued or running work. */
	readonly pending: number;
}

const settle = () => undefined;

export function createKeyedLock(): KeyedLock {
	const tails = new Map<string, Promise<void>>();

	function run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
		const previous = tails.get(key) ?? Promise.resolve();
		const current = previous.then(task);

		// The tail never rejects, so the next task for this key always starts.
		const tail: Promise<void> = current.then(settle, settle).then(() => {
			if (tails.get(key) === tail) tails.delete(key);
		});
		tails.set(key, tail);

		return current;
	}

	return {
		run,
		get pending() {
			return tails.size;
		},
	};
}

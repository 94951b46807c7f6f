/**
 * Keyed Mutex
 *
 * Serializes async work per key. Work on different keys runs concurrently.
 */

import { ExclusiveLock } from "../protocol/types.js";

/**
 * In-process per-key mutual exclusion.
 *
 * @example
 * ```typescript
 * const mutex = new KeyedMutex();
 * await Promise.all([
 *   mutex.runExclusive("item-1", () => first()),
 *   mutex.runExclusive("item-1", () => second()), // starts after first() settles
 * ]);
 * ```
 */
export class KeyedMutex implements ExclusiveLock {
	private readonly tails = new Map<string, Promise<void>>();

	async runExclusive<T>(key: string, work: () => Promise<T>): Promise<T> {
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

	/**
	 * Check whether work is running or queued for a key.
	 */
	isLocked(key: string): boolean {
		return this.tails.has(key);
	}
}

/**
 * @module Concurrency
 * @description Bounded concurrency for sibling translations and queue draining.
 */

/**
 * Counting semaphore. `acquire` waits while every permit is held; waiters are
 * released in arrival order.
 *
 * @example
 * ```ts
 * const permits = new Semaphore(4)
 * const bytes = await permits.run(() => graph.get_blob(file_id))
 * ```
 */
export class Semaphore {
	private permits: number;
	private waiting: Array<() => void> = [];

	constructor(permits: number) {
		if (!Number.isInteger(permits) || permits < 1) throw new RangeError(`permits must be a positive integer, got ${permits}`);
		this.permits = permits;
	}

	async acquire(): Promise<void> {
		if (this.permits > 0) {
			this.permits--;
			return;
		}
		return new Promise<void>(resolve => {
			this.waiting.push(resolve);
		});
	}

	/** Hands the permit straight to the oldest waiter, if any. */
	release(): void {
		const next = this.waiting.shift();
		if (next) {
			next();
		} else {
			this.permits++;
		}
	}

	/** Runs `task` while holding a permit, releasing it however the task settles. */
	async run<T>(task: () => Promise<T>): Promise<T> {
		await this.acquire();
		try {
			return await task();
		} finally {
			this.release();
		}
	}
}

/**
 * Maps with at most `concurrency` mappers in flight. Results keep input order.
 *
 * @example
 * ```ts
 * // translate the matched metadata files of one directory, four at a time
 * const documents = await parallel_map(matches, entry => translate_file(entry), 4)
 * ```
 */
export const parallel_map = async <T, R>(items: readonly T[], mapper: (item: T, index: number) => Promise<R>, concurrency: number): Promise<R[]> => {
	const semaphore = new Semaphore(concurrency);
	const results: R[] = new Array(items.length);

	await Promise.all(
		items.map(async (item, index) => {
			results[index] = await semaphore.run(() => mapper(item, index));
		})
	);

	return results;
};

/**
 * @module Queue
 * @description An in-process, at-least-once task transport for development and tests.
 */

import type { IndexerError, Result, Scheduler, Task } from "./types";
import { ok } from "./types";
import { parallel_map } from "./concurrency";

export type MemoryQueueOpts = {
	/** Deliver every scheduled task twice. */
	duplicate_delivery?: boolean;
	/** Tasks handled at once by `drain`. */
	concurrency?: number;
	/** Deliveries of a task before a `storage_error` is treated as final. */
	max_attempts?: number;
};

export type TaskHandler = (task: Task) => Promise<Result<unknown>>;

export type DrainReport = {
	handled: number;
	retried: number;
	failed: Array<{ task: Task; error: IndexerError }>;
};

export type MemoryQueue = Scheduler & {
	/** Delivers tasks, including ones scheduled while draining, until none are left. */
	drain: (handler: TaskHandler) => Promise<DrainReport>;
	pending: () => number;
	/** Every task delivered so far, in delivery order. */
	readonly delivered: readonly Task[];
};

type Envelope = { task: Task; attempt: number };

/**
 * Creates an in-memory queue. Only `storage_error` is retried, up to
 * `max_attempts` deliveries; any other error is reported as failed.
 *
 * @example
 * ```ts
 * const queue = create_memory_queue({ duplicate_delivery: true })
 * const dispatcher = create_dispatcher({ storage, graph, scheduler: queue, tools })
 * await dispatcher.start('https://example.org/foo')
 * const report = await queue.drain(dispatcher.handle)
 * ```
 */
export function create_memory_queue(opts: MemoryQueueOpts = {}): MemoryQueue {
	const copies = opts.duplicate_delivery ? 2 : 1;
	const concurrency = opts.concurrency ?? 1;
	const max_attempts = opts.max_attempts ?? 3;

	const queued: Envelope[] = [];
	const delivered: Task[] = [];

	return {
		async schedule(task) {
			for (let i = 0; i < copies; i++) queued.push({ task, attempt: 1 });
			return ok(undefined);
		},

		async drain(handler) {
			const report: DrainReport = { handled: 0, retried: 0, failed: [] };

			while (queued.length > 0) {
				const batch = queued.splice(0, queued.length);
				await parallel_map(
					batch,
					async envelope => {
						delivered.push(envelope.task);
						const result = await handler(envelope.task);
						if (result.ok) {
							report.handled++;
							return;
						}
						if (result.error.kind === "storage_error" && envelope.attempt < max_attempts) {
							report.retried++;
							queued.push({ task: envelope.task, attempt: envelope.attempt + 1 });
							return;
						}
						report.failed.push({ task: envelope.task, error: result.error });
					},
					concurrency
				);
			}

			return report;
		},

		pending: () => queued.length,

		delivered,
	};
}

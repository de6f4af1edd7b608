import { describe, test, expect } from "vitest";
import { Semaphore, parallel_map } from "../../concurrency";

const tick = (ms = 5) => new Promise(r => setTimeout(r, ms));

describe("Concurrency Utilities", () => {
	describe("Semaphore", () => {
		test("rejects a non-positive permit count", () => {
			expect(() => new Semaphore(0)).toThrow(RangeError);
			expect(() => new Semaphore(1.5)).toThrow("permits must be a positive integer, got 1.5");
		});

		test("blocks when no permits available", async () => {
			const semaphore = new Semaphore(1);
			await semaphore.acquire();

			let acquired = false;
			const pending = semaphore.acquire().then(() => {
				acquired = true;
			});

			await tick(10);
			expect(acquired).toBe(false);

			semaphore.release();
			await pending;
			expect(acquired).toBe(true);
		});

		test("multiple waiters are processed in order", async () => {
			const semaphore = new Semaphore(1);
			await semaphore.acquire();

			const order: number[] = [];
			const waiters = [1, 2, 3].map(n =>
				semaphore.acquire().then(() => {
					order.push(n);
					semaphore.release();
				})
			);

			semaphore.release();
			await Promise.all(waiters);

			expect(order).toEqual([1, 2, 3]);
		});

		test("run releases the permit when the task throws", async () => {
			const semaphore = new Semaphore(1);

			await expect(
				semaphore.run(async () => {
					throw new Error("translation failed");
				})
			).rejects.toThrow("translation failed");

			const value = await semaphore.run(async () => "next");
			expect(value).toBe("next");
		});

		test("run never exceeds its permits", async () => {
			const semaphore = new Semaphore(3);
			let active = 0;
			let peak = 0;

			await Promise.all(
				Array.from({ length: 10 }, () =>
					semaphore.run(async () => {
						active++;
						peak = Math.max(peak, active);
						await tick();
						active--;
					})
				)
			);

			expect(peak).toBe(3);
		});
	});

	describe("parallel_map", () => {
		test("processes all items", async () => {
			const results = await parallel_map([1, 2, 3, 4, 5], async x => x * 2, 2);
			expect(results).toEqual([2, 4, 6, 8, 10]);
		});

		test("respects concurrency limit", async () => {
			let active = 0;
			let peak = 0;

			await parallel_map(
				Array.from({ length: 10 }, (_, i) => i),
				async x => {
					active++;
					peak = Math.max(peak, active);
					await tick(10);
					active--;
					return x;
				},
				3
			);

			expect(peak).toBeLessThanOrEqual(3);
		});

		test("returns results in original order", async () => {
			const results = await parallel_map(
				[5, 1, 3, 2, 4],
				async x => {
					await tick(x * 5);
					return x * 10;
				},
				2
			);
			expect(results).toEqual([50, 10, 30, 20, 40]);
		});

		test("propagates errors from individual mappers", async () => {
			await expect(
				parallel_map(
					[1, 2, 3],
					async x => {
						if (x === 2) throw new Error("failed on 2");
						return x;
					},
					2
				)
			).rejects.toThrow("failed on 2");
		});

		test("works with empty array", async () => {
			const results = await parallel_map([] as number[], async x => x * 2, 3);
			expect(results).toEqual([]);
		});

		test("passes index to mapper function", async () => {
			const results = await parallel_map(["a", "b", "c"], async (item, index) => `${item}-${index}`, 2);
			expect(results).toEqual(["a-0", "b-1", "c-2"]);
		});

		test("works with concurrency of 1 (sequential)", async () => {
			const order: number[] = [];

			await parallel_map(
				[1, 2, 3],
				async x => {
					order.push(x);
					await tick(10);
					return x;
				},
				1
			);

			expect(order).toEqual([1, 2, 3]);
		});
	});
});

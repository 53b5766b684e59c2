import { describe, expect, it } from "vitest";
import { Mutex } from "./mutex.js";
import { sleep } from "./time.js";

describe("Mutex", () => {
	it("never lets two holders overlap", async () => {
		const mutex = new Mutex();
		let active = 0;
		let maxActive = 0;
		const task = async (): Promise<void> => {
			active++;
			maxActive = Math.max(maxActive, active);
			await sleep(2);
			active--;
		};
		await Promise.all(Array.from({ length: 10 }, () => mutex.runExclusive(task)));
		expect(maxActive).toBe(1);
		expect(mutex.isLocked).toBe(false);
	});

	it("serves waiters in arrival order", async () => {
		const mutex = new Mutex();
		const order: number[] = [];
		await Promise.all(
			[3, 1, 2].map((delay, i) =>
				mutex.runExclusive(async () => {
					await sleep(delay);
					order.push(i);
				}),
			),
		);
		expect(order).toEqual([0, 1, 2]);
	});

	it("releases the lock when the holder throws", async () => {
		const mutex = new Mutex();
		await expect(
			mutex.runExclusive(() => {
				throw new Error("holder failed");
			}),
		).rejects.toThrow("holder failed");
		await expect(mutex.runExclusive(() => "next")).resolves.toBe("next");
	});
});

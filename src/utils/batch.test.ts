import { describe, test, expect } from "vitest";
import { processInBatches } from "./batch.js";
import { sleep } from "./index.js";

describe("processInBatches", () => {
	test("keeps result order", async () => {
		const results = await processInBatches([30, 10, 20], 3, async (ms) => {
			await sleep(ms);
			return ms * 2;
		});
		expect(results).toEqual([60, 20, 40]);
	});

	test("never exceeds the concurrency limit", async () => {
		let inFlight = 0;
		let maxInFlight = 0;

		await processInBatches([1, 2, 3, 4, 5, 6, 7], 2, async () => {
			inFlight++;
			maxInFlight = Math.max(maxInFlight, inFlight);
			await sleep(5);
			inFlight--;
		});

		expect(maxInFlight).toBe(2);
	});

	test("handles an empty list", async () => {
		expect(await processInBatches([], 4, async (x: number) => x)).toEqual([]);
	});
});

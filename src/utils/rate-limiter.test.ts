import { describe, test, expect } from "vitest";
import { RateLimiter } from "./rate-limiter.js";

describe("RateLimiter", () => {
	test("spaces consecutive calls", async () => {
		const limiter = new RateLimiter(40);
		const starts: number[] = [];

		await Promise.all(
			[1, 2, 3].map(() =>
				limiter.schedule(async () => {
					starts.push(Date.now());
				})
			)
		);

		expect(starts).toHaveLength(3);
		// Allow a couple of milliseconds of timer jitter.
		expect(starts[1] - starts[0]).toBeGreaterThanOrEqual(38);
		expect(starts[2] - starts[1]).toBeGreaterThanOrEqual(38);
	});

	test("passes through results and errors", async () => {
		const limiter = new RateLimiter(0);
		await expect(limiter.schedule(async () => 42)).resolves.toBe(42);
		await expect(
			limiter.schedule(async () => {
				throw new Error("boom");
			})
		).rejects.toThrow("boom");
	});

	test("rejects a negative interval", () => {
		expect(() => new RateLimiter(-1)).toThrow();
	});
});

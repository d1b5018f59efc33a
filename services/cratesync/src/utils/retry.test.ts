import { describe, test, expect } from "vitest";
import { retryWithBackoff } from "./retry.js";

describe("retryWithBackoff", () => {
	test("returns the first successful result", async () => {
		let calls = 0;
		const result = await retryWithBackoff(async () => {
			calls++;
			return "ok";
		});
		expect(result).toBe("ok");
		expect(calls).toBe(1);
	});

	test("retries until maxAttempts and reports each retry", async () => {
		let calls = 0;
		const retries: number[] = [];
		const result = await retryWithBackoff(
			async () => {
				calls++;
				if (calls < 3) throw new Error("flaky");
				return calls;
			},
			{ maxAttempts: 3, initialDelay: 1, onRetry: (_e, attempt) => retries.push(attempt) }
		);
		expect(result).toBe(3);
		expect(retries).toEqual([1, 2]);
	});

	test("rethrows once attempts are exhausted", async () => {
		let calls = 0;
		await expect(
			retryWithBackoff(
				async () => {
					calls++;
					throw new Error(`fail ${calls}`);
				},
				{ maxAttempts: 2, initialDelay: 1 }
			)
		).rejects.toThrow("fail 2");
		expect(calls).toBe(2);
	});

	test("does not retry when shouldRetry refuses", async () => {
		let calls = 0;
		await expect(
			retryWithBackoff(
				async () => {
					calls++;
					throw new Error("fatal");
				},
				{ maxAttempts: 5, initialDelay: 1, shouldRetry: () => false }
			)
		).rejects.toThrow("fatal");
		expect(calls).toBe(1);
	});
});

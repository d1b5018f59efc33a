import { describe, test, expect, beforeEach } from "vitest";
import { BusyError, NotFoundError, SessionExpiredError, TransientBackendError } from "../errors.js";
import { JobController, runItems, type JobProgress } from "./controller.js";

describe("JobController", () => {
	let jobs: JobController;

	beforeEach(() => {
		jobs = new JobController({ retryDelayMs: 0 });
	});

	test("runs a job to completion and returns to idle", async () => {
		const handle = jobs.start("crawl", 1, async (ctx) => {
			ctx.report({ current: 1, message: "page 1" });
			return 12;
		});
		expect(jobs.snapshot().state).toBe("running");

		const result = await handle.done;
		expect(result).toEqual({ outcome: "completed", value: 12 });
		const progress = jobs.snapshot();
		expect(progress.state).toBe("idle");
		expect(progress.lastOutcome).toBe("completed");
		expect(progress.job).toBe("crawl");
		expect(progress.current).toBe(1);
	});

	test("a second job is rejected while one runs", async () => {
		let release = () => {};
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});
		const first = jobs.start("sync", 1, () => gate);

		expect(() => jobs.start("search", 1, async () => undefined)).toThrow(BusyError);
		release();
		await first.done;
		expect(() => jobs.start("search", 1, async () => undefined)).not.toThrow();
	});

	test("a failing job records the error", async () => {
		const result = await jobs.start("rescan", 0, async () => {
			throw new Error("disk gone");
		}).done;
		expect(result.outcome).toBe("failed");
		expect(jobs.snapshot().lastOutcome).toBe("failed");
		expect(jobs.snapshot().lastError).toBe("disk gone");
	});

	test("whenIdle waits for the running job", async () => {
		let release = () => {};
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});
		jobs.start("crawl", 1, () => gate);

		const idle = jobs.whenIdle().then(() => jobs.snapshot().state);
		release();
		expect(await idle).toBe("idle");
	});

	test("stop is a no-op when idle", () => {
		expect(jobs.stop()).toBe(false);
	});

	test("stopping mid-batch finishes the current item and skips the rest", async () => {
		const items = Array.from({ length: 10 }, (_, i) => `Artist - Track ${i + 1}`);
		const finished: string[] = [];

		const handle = jobs.start("sync", items.length, (ctx) =>
			runItems(
				items,
				ctx,
				async (item, index) => {
					if (index === 2) {
						expect(jobs.stop()).toBe(true);
					}
					await Promise.resolve();
					finished.push(item);
				},
				async () => {}
			)
		);

		const result = await handle.done;
		expect(result).toEqual({ outcome: "stopped" });
		expect(finished).toEqual(["Artist - Track 1", "Artist - Track 2", "Artist - Track 3"]);
		const progress = jobs.snapshot();
		expect(progress.lastOutcome).toBe("stopped");
		expect(progress.current).toBe(3);
		expect(progress.stopRequested).toBe(true);
	});

	test("subscribers see every progress report", async () => {
		const seen: JobProgress[] = [];
		const unsubscribe = jobs.subscribe((p) => seen.push(p));
		await jobs.start("crawl", 2, async (ctx) => {
			ctx.report({ current: 1 });
			ctx.report({ current: 2, lastUrl: "https://remote.test/account/favorites?page=2" });
		}).done;
		unsubscribe();

		expect(seen.map((p) => p.current)).toEqual([0, 1, 2, 2]);
		expect(seen[2].lastUrl).toBe("https://remote.test/account/favorites?page=2");
		expect(seen[3].state).toBe("idle");
	});
});

describe("runItems", () => {
	test("retries a transient failure once", async () => {
		const jobs = new JobController({ retryDelayMs: 0 });
		let attempts = 0;
		const errors: unknown[] = [];

		const result = await jobs.start("search", 1, (ctx) =>
			runItems(
				["Artist - Song"],
				ctx,
				async () => {
					attempts++;
					if (attempts === 1) throw new TransientBackendError("timeout");
				},
				async (_, error) => {
					errors.push(error);
				}
			)
		).done;

		expect(attempts).toBe(2);
		expect(errors).toEqual([]);
		expect(result).toEqual({ outcome: "completed", value: { processed: 1, failed: 0 } });
	});

	test("terminal item errors are recorded and the batch moves on", async () => {
		const jobs = new JobController({ retryDelayMs: 0 });
		const recorded: Array<[string, string]> = [];
		const attempts: Record<string, number> = {};
		const failures: Record<string, Error> = {
			"A - 1": new NotFoundError(),
			"A - 2": new SessionExpiredError(),
			"A - 3": new TransientBackendError("still down"),
		};

		const result = await jobs.start("sync", 4, (ctx) =>
			runItems(
				["A - 1", "A - 2", "A - 3", "A - 4"],
				ctx,
				async (item) => {
					attempts[item] = (attempts[item] ?? 0) + 1;
					const failure = failures[item];
					if (failure) throw failure;
				},
				async (item, error) => {
					recorded.push([item, error instanceof Error ? error.name : "?"]);
				}
			)
		).done;

		expect(recorded).toEqual([
			["A - 1", "NotFoundError"],
			["A - 2", "SessionExpiredError"],
			["A - 3", "TransientBackendError"],
		]);
		expect(attempts).toEqual({ "A - 1": 1, "A - 2": 1, "A - 3": 2, "A - 4": 1 });
		expect(result).toEqual({ outcome: "completed", value: { processed: 4, failed: 3 } });
	});
});

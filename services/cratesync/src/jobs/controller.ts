/**
 * Job controller
 *
 * Runs at most one background job at a time and publishes its progress.
 * Stops are cooperative: the token is checked between items only, so an item
 * that has started always finishes or fails on its own.
 */

import { BusyError, CancelledError, TransientBackendError, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { retryWithBackoff } from "../utils/retry.js";
import { CancellationToken } from "./cancellation.js";

const log = createLogger("jobs");

export type JobState = "idle" | "running";
export type JobOutcome = "completed" | "failed" | "stopped";

export interface JobProgress {
	state: JobState;
	job: string | null;
	current: number;
	total: number;
	message: string;
	currentKey: string | null;
	lastUrl: string | null;
	startedAt: string | null;
	finishedAt: string | null;
	stopRequested: boolean;
	lastOutcome: JobOutcome | null;
	lastError: string | null;
}

export type ProgressUpdate = Partial<Pick<JobProgress, "current" | "total" | "message" | "currentKey" | "lastUrl">>;

export interface JobContext {
	readonly token: CancellationToken;
	readonly retryDelayMs: number;
	report(update: ProgressUpdate): void;
}

export type JobResult<T> =
	| { outcome: "completed"; value: T }
	| { outcome: "stopped" }
	| { outcome: "failed"; error: Error };

export interface JobHandle<T> {
	name: string;
	/** Settles once the job ends; never rejects. */
	done: Promise<JobResult<T>>;
}

export type ProgressListener = (progress: JobProgress) => void;

export interface JobControllerOptions {
	/** delay before the single retry of a transient item failure */
	retryDelayMs?: number;
}

function idleProgress(): JobProgress {
	return {
		state: "idle",
		job: null,
		current: 0,
		total: 0,
		message: "",
		currentKey: null,
		lastUrl: null,
		startedAt: null,
		finishedAt: null,
		stopRequested: false,
		lastOutcome: null,
		lastError: null,
	};
}

export class JobController {
	private progress: JobProgress = idleProgress();
	private token: CancellationToken | null = null;
	private running: Promise<unknown> = Promise.resolve();
	private readonly listeners = new Set<ProgressListener>();
	private readonly retryDelayMs: number;

	constructor(options: JobControllerOptions = {}) {
		this.retryDelayMs = options.retryDelayMs ?? 2000;
	}

	get busy(): boolean {
		return this.progress.state === "running";
	}

	snapshot(): JobProgress {
		return { ...this.progress };
	}

	subscribe(listener: ProgressListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/** Throws BusyError while a job runs */
	assertIdle(): void {
		if (this.busy) {
			throw new BusyError(this.progress.job ?? "unknown");
		}
	}

	start<T>(name: string, total: number, run: (ctx: JobContext) => Promise<T>): JobHandle<T> {
		this.assertIdle();

		const token = new CancellationToken();
		this.token = token;
		this.progress = {
			...idleProgress(),
			state: "running",
			job: name,
			total,
			message: `Starting ${name}`,
			startedAt: new Date().toISOString(),
			lastOutcome: this.progress.lastOutcome,
		};
		this.publish();
		log.info({ job: name, total }, "job started");

		const ctx: JobContext = {
			token,
			retryDelayMs: this.retryDelayMs,
			report: (update) => {
				if (this.token !== token) return;
				this.progress = { ...this.progress, ...update };
				this.publish();
			},
		};

		const done = Promise.resolve()
			.then(() => run(ctx))
			.then(
				(value): JobResult<T> => ({ outcome: "completed", value }),
				(error: unknown): JobResult<T> =>
					error instanceof CancelledError
						? { outcome: "stopped" }
						: { outcome: "failed", error: error instanceof Error ? error : new Error(String(error)) }
			)
			.then((result) => {
				this.finish(name, result);
				return result;
			});

		this.running = done;
		return { name, done };
	}

	/** Resolves once the current job, if any, has ended */
	async whenIdle(): Promise<void> {
		await this.running;
	}

	/** Request a stop; false when nothing is running */
	stop(): boolean {
		if (!this.busy || !this.token) {
			return false;
		}
		this.token.cancel();
		this.progress = { ...this.progress, stopRequested: true, message: "Stopping after the current track" };
		this.publish();
		log.info({ job: this.progress.job }, "stop requested");
		return true;
	}

	private finish<T>(name: string, result: JobResult<T>): void {
		const lastError = result.outcome === "failed" ? result.error.message : null;
		if (result.outcome === "failed") {
			log.error({ job: name, err: result.error }, "job failed");
		} else {
			log.info({ job: name, outcome: result.outcome }, "job finished");
		}

		this.token = null;
		this.progress = {
			...this.progress,
			state: "idle",
			finishedAt: new Date().toISOString(),
			lastOutcome: result.outcome,
			lastError,
			message: result.outcome === "stopped" ? "Stopped by user" : lastError ?? `Finished ${name}`,
		};
		this.publish();
	}

	private publish(): void {
		const copy = this.snapshot();
		for (const listener of this.listeners) {
			try {
				listener(copy);
			} catch (error) {
				log.warn({ err: error }, "progress listener threw");
			}
		}
	}
}

export interface ItemRunSummary {
	processed: number;
	failed: number;
}

/**
 * Run a handler over items, checking the stop token before each one.
 * A transient failure is retried once; any other failure ends that item only
 * and is handed to onItemError before moving on.
 */
export async function runItems<T>(
	items: readonly T[],
	ctx: JobContext,
	handler: (item: T, index: number) => Promise<void>,
	onItemError: (item: T, error: unknown) => Promise<void>,
	describe: (item: T) => string = String
): Promise<ItemRunSummary> {
	const summary: ItemRunSummary = { processed: 0, failed: 0 };

	for (const [index, item] of items.entries()) {
		ctx.token.throwIfCancelled();
		const label = describe(item);
		ctx.report({ current: index, currentKey: label, message: `${index + 1}/${items.length} ${label}` });

		try {
			await retryWithBackoff(() => handler(item, index), {
				maxAttempts: 2,
				initialDelay: ctx.retryDelayMs,
				shouldRetry: (error) => error instanceof TransientBackendError,
				onRetry: (error, attempt, nextDelay) =>
					log.warn({ item: label, attempt, nextDelay, error: errorMessage(error) }, "transient failure, retrying"),
			});
		} catch (error) {
			summary.failed++;
			log.warn({ item: label, error: errorMessage(error) }, "item failed");
			await onItemError(item, error);
		}

		summary.processed++;
		ctx.report({ current: index + 1 });
	}

	return summary;
}

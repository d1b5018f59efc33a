import ora from "ora";
import pc from "picocolors";
import type { JobHandle, JobResult } from "../jobs/controller.js";
import type { SyncService } from "../sync/service.js";

/**
 * Show a job's progress with a spinner until it ends. Ctrl+C asks the job to
 * stop after the current track instead of killing the process.
 */
export async function followJob<T>(service: SyncService, handle: JobHandle<T>): Promise<JobResult<T>> {
	const spinner = ora({ text: `Running ${handle.name}...`, prefixText: " ", color: "magenta" }).start();

	const unsubscribe = service.jobs.subscribe((progress) => {
		const counter = progress.total > 0 ? pc.dim(`[${progress.current}/${progress.total}] `) : "";
		spinner.text = `${counter}${progress.message}`;
	});

	const onInterrupt = () => {
		if (service.stop()) {
			spinner.text = pc.yellow("Stopping after the current track...");
		}
	};
	process.once("SIGINT", onInterrupt);

	try {
		const result = await handle.done;
		switch (result.outcome) {
			case "completed":
				spinner.succeed(pc.green(`${handle.name} finished`));
				break;
			case "stopped":
				spinner.warn(pc.yellow(`${handle.name} stopped`));
				break;
			case "failed":
				spinner.fail(pc.red(`${handle.name} failed: ${result.error.message}`));
				process.exitCode = 1;
				break;
		}
		return result;
	} finally {
		unsubscribe();
		process.removeListener("SIGINT", onInterrupt);
	}
}

import fs from "fs";
import ora from "ora";
import pc from "picocolors";
import { z } from "zod";
import { getEngineConfig } from "../adapters/config.js";
import type { ItemRunSummary, JobHandle } from "../jobs/controller.js";
import { captureSession } from "../remote/browser-backend.js";
import { CatalogueUrls } from "../remote/catalogue.js";
import type { SyncService } from "../sync/service.js";
import { followJob } from "./follow.js";
import { logBanner, logItemSummary, logMutation, logStatus } from "./output.js";

const rangeSchema = z.enum(["1_month", "2_months", "3_months", "all"]).default("all");
const modeSchema = z.enum(["unfound", "retry_not_found"]).default("unfound");
const captureFileSchema = z.union([z.array(z.unknown()), z.object({ tracks: z.array(z.unknown()) })]);

async function runItemJob(service: SyncService, label: string, handle: JobHandle<ItemRunSummary>): Promise<void> {
	const started = Date.now();
	const result = await followJob(service, handle);
	if (result.outcome === "completed") {
		logItemSummary(label, result.value.processed, result.value.failed, Date.now() - started);
		if (result.value.failed > 0) {
			process.exitCode = 1;
		}
	}
}

export function statusCommand(service: SyncService, opts: { mutations?: string }): void {
	logStatus(service.status());
	const limit = opts.mutations ? parseInt(opts.mutations, 10) : 0;
	if (limit > 0) {
		console.log(pc.bold("  Recent favorite changes"));
		for (const entry of service.mutationLog(limit)) {
			logMutation(entry);
		}
		console.log();
	}
}

export async function crawlCommand(service: SyncService, opts: { range?: string }): Promise<void> {
	const range = rangeSchema.parse(opts.range);
	const result = await followJob(service, service.crawl(range));
	if (result.outcome === "completed") {
		logBanner("Crawl Complete", [
			["Range", range],
			["Pages", result.value.pages],
			["Favorites", result.value.favorites],
			["Full Listing", result.value.complete ? "yes" : "no"],
			["Cross-checked", result.value.crossChecked],
		]);
	}
}

export async function searchCommand(service: SyncService, key: string | undefined, opts: { mode?: string }): Promise<void> {
	const request = key ? { key } : { all: true as const, mode: modeSchema.parse(opts.mode) };
	await runItemJob(service, "Search", service.search(request));
}

export async function syncCommand(service: SyncService, keys: string[]): Promise<void> {
	await runItemJob(service, "Sync", service.sync(keys.length > 0 ? keys : undefined));
}

export async function starCommand(service: SyncService, key: string): Promise<void> {
	await runItemJob(service, "Star", service.star(key));
}

export async function unstarCommand(service: SyncService, key: string): Promise<void> {
	await runItemJob(service, "Unstar", service.unstar(key));
}

export async function undismissCommand(service: SyncService, key: string): Promise<void> {
	await runItemJob(service, "Undismiss", service.undismiss(key));
}

export async function skipCommand(service: SyncService, keys: string[]): Promise<void> {
	const skipped = await service.skip(keys);
	console.log(pc.green(`  ✓ Skipped ${skipped} track(s)`));
}

export async function unskipCommand(service: SyncService, keys: string[]): Promise<void> {
	const unskipped = await service.unskip(keys);
	console.log(pc.green(`  ✓ Unskipped ${unskipped} track(s)`));
}

export async function cleanupMatchesCommand(service: SyncService): Promise<void> {
	const { kept, removed, threshold } = await service.cleanupMatches();
	logBanner("Match Cleanup", [
		["Kept", kept],
		["Removed", removed],
		["Threshold", threshold],
	]);
}

export async function checkSessionCommand(service: SyncService): Promise<void> {
	const { loggedIn } = await service.checkSession();
	if (loggedIn) {
		console.log(pc.green("  ✓ Signed in"));
	} else {
		console.log(pc.yellow("  ⚠ Session expired, run `cratesync login`"));
		process.exitCode = 1;
	}
}

export async function rescanCommand(service: SyncService): Promise<void> {
	const result = await followJob(service, service.rescan());
	if (result.outcome === "completed") {
		logBanner("Rescan Complete", [
			["Captured", result.value.captures],
			["Audio Files", result.value.files],
			["To Download", result.value.toDownload],
			["Have Locally", result.value.haveLocally],
			["Unreadable", result.value.scanErrors],
		]);
	}
}

export async function resetNotFoundCommand(service: SyncService): Promise<void> {
	const cleared = await service.resetNotFound();
	console.log(pc.green(`  ✓ Cleared ${cleared} not-found mark(s)`));
}

export async function importCapturesCommand(service: SyncService, file: string): Promise<void> {
	const parsed = captureFileSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
	const tracks = Array.isArray(parsed) ? parsed : parsed.tracks;
	const { total, added } = await service.importCaptures(tracks);
	console.log(pc.green(`  ✓ Imported ${added} new capture(s), ${total} in total`));
}

export async function downloadLinkCommand(service: SyncService, key: string, opts: { format?: string }): Promise<void> {
	const link = await service.downloadLink(key, opts.format);
	console.log(link);
}

export async function loginCommand(service: SyncService): Promise<void> {
	const settings = service.settings();
	const urls = new CatalogueUrls(getEngineConfig().remoteBaseUrl);
	const spinner = ora({ text: "Log in using the browser window...", prefixText: " ", color: "magenta" }).start();
	try {
		const saved = await captureSession(
			{ profileDir: settings.browserProfileDir, cookiesPath: settings.cookiesPath, headed: true },
			urls
		);
		spinner.succeed(pc.green(`Session saved (${saved} cookies) to ${settings.cookiesPath}`));
	} catch (error) {
		spinner.fail(pc.red("Login was not completed"));
		throw error;
	}
}

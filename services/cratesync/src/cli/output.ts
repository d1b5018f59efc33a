import pc from "picocolors";
import type { StatusSnapshot } from "../reconcile/engine.js";
import type { MutationEntry } from "../state/types.js";

const RULE = "═══════════════════════════════════════════════════════════";

/**
 * Boxed heading followed by aligned key/value rows
 */
export function logBanner(title: string, rows: Array<[string, string | number]> = []): void {
	console.log();
	console.log(RULE);
	console.log(`  ${title}`);
	console.log(RULE);
	for (const [label, value] of rows) {
		console.log(`  ${label}: ${value}`);
	}
	if (rows.length > 0) {
		console.log(RULE);
	}
	console.log();
}

function count(flags: Record<string, boolean>): number {
	return Object.values(flags).filter(Boolean).length;
}

export function logStatus(status: StatusSnapshot): void {
	const pending = status.to_download.filter((t) => !status.dismissed[t.key]);
	const starredPending = pending.filter((t) => status.starred[t.key]).length;

	logBanner("Library Status", [
		["To Download", status.to_download.length],
		["Have Locally", status.have_locally.length],
		["Skipped", status.skipped.length],
		["Starred Remotely", count(status.starred)],
		["Pending (starred)", `${pending.length} (${starredPending})`],
		["Not Found", count(status.not_found)],
		["Dismissed", count(status.dismissed)],
		["Last Crawl", status.last_crawl_at ?? "never"],
		["Last Full Crawl", status.last_full_crawl_at ?? "never"],
		["Last Rescan", status.last_reconcile_at ?? "never"],
	]);

	if (status.alternate_versions.length > 0) {
		console.log(pc.yellow(`  ⚠ ${status.alternate_versions.length} match(es) point at a short or radio version:`));
		for (const key of status.alternate_versions) {
			console.log(pc.dim(`    ${key} → ${status.remote_titles[key] ?? "?"}`));
		}
		console.log();
	}
}

export function logMutation(entry: MutationEntry): void {
	const mark = entry.action === "starred" ? pc.green("★") : pc.red("☆");
	console.log(`  ${mark}  ${entry.key} ${pc.dim(`(${entry.source}, ${entry.timestamp})`)}`);
}

export function logItemSummary(label: string, processed: number, failed: number, durationMs: number): void {
	logBanner(`${label} Complete`, [
		["Processed", processed],
		["Failed", failed],
		["Duration", `${(durationMs / 1000).toFixed(1)}s`],
	]);
}

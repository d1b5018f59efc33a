/**
 * Replay of the outcome log.
 *
 * urls and notFound are derived from the log rather than patched in place:
 * the newest decisive entry per key wins.
 */

import { indexFromRecord, lookup } from "../identity/track-key.js";
import type { OutcomeAction, OutcomeEntry } from "./types.js";

export const RESET_MARKER_KEY = "*";

export interface ReplayResult {
	urls: Record<string, string>;
	remoteTitles: Record<string, string>;
	remoteIds: Record<string, string>;
	notFound: Record<string, boolean>;
}

const URL_ACTIONS: ReadonlySet<OutcomeAction> = new Set(["found", "starred", "unstarred"]);

function isDecisive(entry: OutcomeEntry): boolean {
	// a retired match settles its key with no url
	if (entry.action === "not_found" || entry.action === "match_removed") return true;
	return URL_ACTIONS.has(entry.action) && Boolean(entry.url);
}

/** Indices of the log, newest first; equal timestamps keep append order reversed. */
function newestFirst(log: readonly OutcomeEntry[]): number[] {
	return log
		.map((_, i) => i)
		.sort((a, b) => {
			const ta = log[a].timestamp;
			const tb = log[b].timestamp;
			if (ta !== tb) return ta < tb ? 1 : -1;
			return b - a;
		});
}

export function replayOutcomes(
	log: readonly OutcomeEntry[],
	knownUrls: Record<string, string> = {}
): ReplayResult {
	const result: ReplayResult = { urls: {}, remoteTitles: {}, remoteIds: {}, notFound: {} };
	const settled = new Set<string>();
	let pastReset = false;

	for (const i of newestFirst(log)) {
		const entry = log[i];
		if (entry.action === "reset_not_found") {
			pastReset = true;
			continue;
		}
		if (settled.has(entry.key) || !isDecisive(entry)) {
			continue;
		}
		if (entry.action === "not_found") {
			if (pastReset) continue;
			result.notFound[entry.key] = true;
		} else if (entry.url) {
			result.urls[entry.key] = entry.url;
			if (entry.title) result.remoteTitles[entry.key] = entry.title;
			if (entry.remoteId) result.remoteIds[entry.key] = entry.remoteId;
		}
		settled.add(entry.key);
	}

	const withUrl = indexFromRecord({ ...knownUrls, ...result.urls });
	for (const key of Object.keys(result.notFound)) {
		if (lookup(withUrl, key, { maxTier: "lower" })) {
			delete result.notFound[key];
		}
	}
	return result;
}

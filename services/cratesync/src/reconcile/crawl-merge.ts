/**
 * Merge of a favorites crawl into the stored state.
 *
 * The crawl is the authority on starred. A complete crawl demotes every
 * starred key it no longer lists; a bounded one demotes only the keys a
 * cross-check read as no longer favorited. urls are never cleared.
 */

import type { CrawlEntry, CrawlResult } from "../crawl/paginator.js";
import { buildIndex, lookup } from "../identity/track-key.js";
import type { MutationEntry, StatePatch, SyncState } from "../state/types.js";

export function applyCrawl(
	state: SyncState,
	crawl: CrawlResult,
	now: Date = new Date(),
	verified: Record<string, boolean> = {}
): StatePatch {
	const patch: Required<Pick<StatePatch, "urls" | "remoteTitles" | "remoteIds" | "starred">> = {
		urls: {},
		remoteTitles: {},
		remoteIds: {},
		starred: {},
	};

	const store = (key: string, entry: CrawlEntry) => {
		patch.starred[key] = true;
		patch.urls[key] = entry.url;
		patch.remoteTitles[key] = entry.title;
		if (entry.remoteId) patch.remoteIds[key] = entry.remoteId;
	};

	const crawlIndex = buildIndex(Object.entries(crawl.entries).map(([key, value]) => ({ key, value })));
	for (const [key, entry] of Object.entries(crawl.entries)) {
		store(key, entry);
	}

	for (const track of [...state.toDownload, ...state.haveLocally]) {
		const hit = lookup(crawlIndex, track.key);
		if (hit) store(track.key, hit.value);
	}

	for (const [key, favorited] of Object.entries(verified)) {
		if (!favorited && state.starred[key] && !(key in patch.starred)) {
			patch.starred[key] = false;
		}
	}

	if (crawl.complete) {
		for (const [key, starred] of Object.entries(state.starred)) {
			if (starred && !(key in patch.starred) && !lookup(crawlIndex, key)) {
				patch.starred[key] = false;
			}
		}
	}

	const timestamp = now.toISOString();
	const mutations: MutationEntry[] = [];
	for (const [key, starred] of Object.entries(patch.starred)) {
		if (state.starred[key] === starred) continue;
		// a key seen for the first time as unstarred is not a change
		if (!starred && state.starred[key] === undefined) continue;
		mutations.push({ timestamp, action: starred ? "starred" : "unstarred", key, source: "crawl" });
	}

	return {
		...patch,
		mutations,
		lastCrawlAt: timestamp,
		...(crawl.complete ? { lastFullCrawlAt: timestamp } : {}),
	};
}

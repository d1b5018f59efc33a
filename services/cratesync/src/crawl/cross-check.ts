/**
 * Cross-check after a bounded crawl.
 *
 * A recency window does not list older favorites, so previously starred
 * tracks missing from the crawl are read from their own track page instead.
 */

import { SessionExpiredError, errorMessage } from "../errors.js";
import { deepKey, indexFromRecord, lookup } from "../identity/track-key.js";
import type { CancellationToken } from "../jobs/cancellation.js";
import type { FavoriteTarget, RemoteBackend } from "../remote/types.js";
import type { SyncState } from "../state/types.js";
import { createLogger } from "../utils/logger.js";
import type { CrawlResult } from "./paginator.js";

const log = createLogger("cross-check");

export const MAX_CROSS_CHECK = 30;

/**
 * Starred keys with a url that the crawl did not list. Captured tracks come
 * first; keys that are the same track under another spelling are read once.
 */
export function buildVerifyList(state: SyncState, crawl: CrawlResult, max = MAX_CROSS_CHECK): FavoriteTarget[] {
	const crawlIndex = indexFromRecord(crawl.entries);
	const seen = new Set<string>();
	const targets: FavoriteTarget[] = [];
	const keys = [...state.toDownload.map((t) => t.key), ...state.haveLocally.map((t) => t.key), ...Object.keys(state.starred)];

	for (const key of keys) {
		if (targets.length >= max) break;
		const deep = deepKey(key);
		if (seen.has(deep)) continue;
		seen.add(deep);

		const url = state.urls[key];
		if (!state.starred[key] || !url || lookup(crawlIndex, key)) continue;
		const remoteId = state.remoteIds[key];
		targets.push({ key, url, ...(remoteId ? { remoteId } : {}) });
	}
	return targets;
}

export interface CrossCheckResult {
	/** key → still favorited */
	verified: Record<string, boolean>;
	stopped: boolean;
	sessionExpired: boolean;
}

export interface CrossCheckOptions {
	token?: CancellationToken;
	onCheck?: (checked: number, total: number) => void;
}

export async function crossCheckFavorites(
	backend: Pick<RemoteBackend, "readFavoriteState">,
	targets: readonly FavoriteTarget[],
	options: CrossCheckOptions = {}
): Promise<CrossCheckResult> {
	const result: CrossCheckResult = { verified: {}, stopped: false, sessionExpired: false };

	for (const [index, target] of targets.entries()) {
		if (options.token?.cancelled) {
			result.stopped = true;
			break;
		}
		try {
			result.verified[target.key] = await backend.readFavoriteState(target);
		} catch (error) {
			if (error instanceof SessionExpiredError) {
				log.warn({ key: target.key }, "session expired during cross-check");
				result.sessionExpired = true;
				break;
			}
			// the track keeps its stored state
			log.warn({ key: target.key, error: errorMessage(error) }, "cross-check read failed");
		}
		options.onCheck?.(index + 1, targets.length);
	}
	return result;
}

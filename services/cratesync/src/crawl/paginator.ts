/**
 * Walks the account's favorites listing page by page.
 */

import { SessionExpiredError } from "../errors.js";
import type { CancellationToken } from "../jobs/cancellation.js";
import type { FavoritesPage, RemoteBackend } from "../remote/types.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("crawl");

export type TimeRange = "1_month" | "2_months" | "3_months" | "all";

export const TIME_RANGES: readonly TimeRange[] = ["1_month", "2_months", "3_months", "all"];

const PAGES_PER_RANGE: Record<TimeRange, number | undefined> = {
	"1_month": 3,
	"2_months": 6,
	"3_months": 10,
	all: undefined,
};

/** Favorites are listed newest first, so a recency window is a page cap. */
export function maxPagesForRange(range: TimeRange): number | undefined {
	return PAGES_PER_RANGE[range];
}

export interface CrawlEntry {
	url: string;
	title: string;
	remoteId?: string;
}

export interface CrawlResult {
	entries: Record<string, CrawlEntry>;
	pages: number;
	/** Unbounded walk that reached the last page uninterrupted. */
	complete: boolean;
	bounded: boolean;
	stopped: boolean;
	sessionExpired: boolean;
}

export interface CrawlOptions {
	maxPages?: number;
	token?: CancellationToken;
	onPage?: (page: number, found: number) => void;
}

export async function crawlFavorites(
	backend: Pick<RemoteBackend, "readFavoritesPage">,
	options: CrawlOptions = {}
): Promise<CrawlResult> {
	const entries: Record<string, CrawlEntry> = {};
	const result: CrawlResult = {
		entries,
		pages: 0,
		complete: false,
		bounded: false,
		stopped: false,
		sessionExpired: false,
	};

	for (let page = 1; ; page++) {
		if (options.maxPages !== undefined && page > options.maxPages) {
			result.bounded = true;
			break;
		}
		if (options.token?.cancelled) {
			result.stopped = true;
			break;
		}

		let listing: FavoritesPage;
		try {
			listing = await backend.readFavoritesPage(page);
		} catch (error) {
			// page 1 must surface the redirect; an empty crawl means something else
			if (error instanceof SessionExpiredError && page > 1) {
				log.warn({ page }, "session expired mid-crawl");
				result.sessionExpired = true;
				break;
			}
			throw error;
		}
		result.pages = page;

		let fresh = 0;
		for (const entry of listing.entries) {
			if (entry.key in entries) continue;
			entries[entry.key] = { url: entry.url, title: entry.title, remoteId: entry.remoteId };
			fresh++;
		}
		options.onPage?.(page, Object.keys(entries).length);
		log.debug({ page, listed: listing.entries.length, fresh }, "favorites page read");

		if (listing.entries.length === 0 || fresh === 0 || !listing.hasNext) {
			result.complete = true;
			break;
		}
	}

	// only an unbounded walk can prove that a favorite was removed
	result.complete = result.complete && options.maxPages === undefined;
	return result;
}

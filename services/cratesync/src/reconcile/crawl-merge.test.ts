import { describe, test, expect } from "vitest";
import { applyCrawl } from "./crawl-merge.js";
import { emptyState, mergeInto } from "../state/merge.js";
import type { CrawlEntry, CrawlResult } from "../crawl/paginator.js";

const NOW = new Date("2024-03-01T12:00:00.000Z");

function crawlOf(entries: Record<string, CrawlEntry>, complete = true): CrawlResult {
	return { entries, pages: 1, complete, bounded: !complete, stopped: false, sessionExpired: false };
}

describe("applyCrawl", () => {
	test("stores crawled favorites under the crawl key", () => {
		const patch = applyCrawl(
			emptyState(),
			crawlOf({ "Artist - Song": { url: "https://x/song-1.html", title: "Artist - Song (Extended Mix)", remoteId: "1" } }),
			NOW
		);
		expect(patch.starred).toEqual({ "Artist - Song": true });
		expect(patch.urls).toEqual({ "Artist - Song": "https://x/song-1.html" });
		expect(patch.remoteTitles).toEqual({ "Artist - Song": "Artist - Song (Extended Mix)" });
		expect(patch.remoteIds).toEqual({ "Artist - Song": "1" });
		expect(patch.lastCrawlAt).toBe("2024-03-01T12:00:00.000Z");
		expect(patch.lastFullCrawlAt).toBe("2024-03-01T12:00:00.000Z");
	});

	test("maps app keys onto crawl keys through the lookup tiers", () => {
		const state = {
			...emptyState(),
			toDownload: [{ key: "DvirNuns & Dox - Track", artist: "DvirNuns & Dox", title: "Track" }],
		};
		const patch = applyCrawl(state, crawlOf({ "Dox, DvirNuns - Track (Original Mix)": { url: "https://x/t", title: "t" } }), NOW);
		expect(patch.starred).toEqual({
			"Dox, DvirNuns - Track (Original Mix)": true,
			"DvirNuns & Dox - Track": true,
		});
		expect(patch.urls?.["DvirNuns & Dox - Track"]).toBe("https://x/t");
	});

	test("a complete crawl demotes starred keys it no longer lists but keeps their url", () => {
		const state = {
			...emptyState(),
			starred: { "Gone - Track": true, "Kept - Track": true },
			urls: { "Gone - Track": "https://x/gone" },
		};
		const patch = applyCrawl(state, crawlOf({ "Kept - Track": { url: "https://x/kept", title: "Kept - Track" } }), NOW);
		expect(patch.starred).toEqual({ "Kept - Track": true, "Gone - Track": false });

		const next = mergeInto(state, patch, NOW);
		expect(next.urls["Gone - Track"]).toBe("https://x/gone");
		expect(next.mutations).toEqual([
			{ timestamp: "2024-03-01T12:00:00.000Z", action: "unstarred", key: "Gone - Track", source: "crawl" },
		]);
	});

	test("a bounded crawl never demotes", () => {
		const state = { ...emptyState(), starred: { "Old - Track": true } };
		const patch = applyCrawl(state, crawlOf({}, false), NOW);
		expect(patch.starred).toEqual({});
		expect(patch.lastFullCrawlAt).toBeUndefined();
	});

	test("keys matched by a looser tier are not demoted", () => {
		const state = { ...emptyState(), starred: { "artist - song": true } };
		const patch = applyCrawl(state, crawlOf({ "Artist - Song (Radio Edit)": { url: "u", title: "t" } }), NOW);
		expect(patch.starred?.["artist - song"]).toBeUndefined();
	});

	test("logs newly starred keys", () => {
		const patch = applyCrawl(emptyState(), crawlOf({ "A - B": { url: "u", title: "A - B" } }), NOW);
		expect(patch.mutations).toEqual([
			{ timestamp: "2024-03-01T12:00:00.000Z", action: "starred", key: "A - B", source: "crawl" },
		]);
	});
});

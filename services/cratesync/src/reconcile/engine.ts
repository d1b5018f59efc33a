/**
 * Reconciliation engine
 *
 * Combines the capture list, the local scan and the stored remote facts into
 * one view. Replay of the outcome log always runs first.
 */

import type { CaptureEntry } from "../capture/reader.js";
import { buildIndex, lookup, trackKey } from "../identity/track-key.js";
import type { LocalTrack } from "../library/types.js";
import { replayOutcomes } from "../state/outcome-log.js";
import { mergeInto } from "../state/merge.js";
import type { StateStore } from "../state/store.js";
import type { StatePatch, SyncState, TrackRef } from "../state/types.js";

export interface Classification {
	toDownload: TrackRef[];
	haveLocally: TrackRef[];
	localPaths: Record<string, string>;
}

export interface StatusSnapshot {
	/** captured, not local and not skipped */
	to_download: TrackRef[];
	skipped: TrackRef[];
	have_locally: TrackRef[];
	urls: Record<string, string>;
	starred: Record<string, boolean>;
	not_found: Record<string, boolean>;
	dismissed: Record<string, boolean>;
	dismissed_manual_check: Record<string, boolean>;
	remote_titles: Record<string, string>;
	remote_ids: Record<string, string>;
	match_scores: Record<string, number>;
	local_paths: Record<string, string>;
	alternate_versions: string[];
	last_crawl_at: string | null;
	last_full_crawl_at: string | null;
	last_reconcile_at: string | null;
}

const ALTERNATE_VERSION = /\((original\s+mix|radio\s+edit|radio\s+version|short\s+version)\)/i;

/**
 * Patch carrying the fields derived from the outcome log. Replayed urls only
 * fill keys the state has no url for; notFound is always replaced.
 */
export function replayPatch(state: SyncState): StatePatch {
	const replay = replayOutcomes(state.outcomes, state.urls);
	const missing = <T>(derived: Record<string, T>, stored: Record<string, T>): Record<string, T> =>
		Object.fromEntries(Object.entries(derived).filter(([key]) => !(key in stored)));

	return {
		urls: missing(replay.urls, state.urls),
		remoteTitles: missing(replay.remoteTitles, state.remoteTitles),
		remoteIds: missing(replay.remoteIds, state.remoteIds),
		notFound: replay.notFound,
	};
}

export function withReplay(state: SyncState): SyncState {
	return mergeInto(state, replayPatch(state));
}

export function classify(captures: readonly CaptureEntry[], scans: readonly LocalTrack[]): Classification {
	const localIndex = buildIndex(
		scans.map((track) => ({ key: trackKey(track.artist, track.title), value: track })),
		(existing, incoming) => (incoming.value.scannedAt > existing.value.scannedAt ? incoming : existing)
	);

	const result: Classification = { toDownload: [], haveLocally: [], localPaths: {} };
	const seen = new Set<string>();

	for (const capture of captures) {
		const key = trackKey(capture.artist, capture.title);
		if (seen.has(key)) continue;
		seen.add(key);

		const ref: TrackRef = { key, artist: capture.artist.trim(), title: capture.title.trim() };
		if (capture.capturedAt) ref.capturedAt = capture.capturedAt;

		const hit = lookup(localIndex, key);
		if (hit) {
			result.haveLocally.push(ref);
			result.localPaths[key] = hit.value.filepath;
		} else {
			result.toDownload.push(ref);
		}
	}
	return result;
}

/**
 * Replay, classify and persist in one commit
 */
export function reconcile(
	store: StateStore,
	captures: readonly CaptureEntry[],
	scans: readonly LocalTrack[],
	now: Date = new Date()
): Promise<SyncState> {
	const classification = classify(captures, scans);
	return store.commit((state) => ({
		...replayPatch(state),
		...classification,
		lastReconcileAt: now.toISOString(),
	}));
}

/** Keys whose remote match is a short/radio cut the user has not acknowledged. */
export function alternateVersionKeys(state: SyncState): string[] {
	return Object.entries(state.remoteTitles)
		.filter(([key, title]) => ALTERNATE_VERSION.test(title) && !/extended/i.test(title) && !state.dismissedManualCheck[key])
		.map(([key]) => key)
		.sort();
}

function onlyTrue(flags: Record<string, boolean>): Record<string, boolean> {
	return Object.fromEntries(Object.entries(flags).filter(([, value]) => value));
}

export function statusSnapshot(stored: SyncState): StatusSnapshot {
	const state = withReplay(stored);
	const localKeys = new Set(state.haveLocally.map((t) => t.key));

	return {
		to_download: state.toDownload.filter((t) => !state.skipped[t.key]),
		skipped: state.toDownload.filter((t) => state.skipped[t.key]),
		have_locally: state.haveLocally,
		urls: state.urls,
		starred: state.starred,
		not_found: state.notFound,
		dismissed: onlyTrue(state.dismissed),
		dismissed_manual_check: onlyTrue(state.dismissedManualCheck),
		remote_titles: state.remoteTitles,
		remote_ids: state.remoteIds,
		match_scores: state.matchScores,
		local_paths: Object.fromEntries(Object.entries(state.localPaths).filter(([key]) => localKeys.has(key))),
		alternate_versions: alternateVersionKeys(state),
		last_crawl_at: state.lastCrawlAt ?? null,
		last_full_crawl_at: state.lastFullCrawlAt ?? null,
		last_reconcile_at: state.lastReconcileAt ?? null,
	};
}

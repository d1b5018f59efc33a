import { STATE_VERSION } from "./schema.js";
import type { MapField, StatePatch, SyncState, TimestampField } from "./types.js";

export const MAX_OUTCOMES = 100_000;
export const MAX_MUTATIONS = 2_000;

const UNION_FIELDS = [
	"urls",
	"remoteIds",
	"remoteTitles",
	"matchScores",
	"starred",
	"dismissed",
	"dismissedManualCheck",
	"skipped",
	"localPaths",
] as const satisfies readonly MapField[];

const TIMESTAMP_FIELDS: readonly TimestampField[] = ["lastCrawlAt", "lastFullCrawlAt", "lastReconcileAt"];

export function emptyState(): SyncState {
	return {
		version: STATE_VERSION,
		urls: {},
		remoteIds: {},
		remoteTitles: {},
		matchScores: {},
		starred: {},
		notFound: {},
		dismissed: {},
		dismissedManualCheck: {},
		skipped: {},
		localPaths: {},
		toDownload: [],
		haveLocally: [],
		outcomes: [],
		mutations: [],
	};
}

function latest(a: string | undefined, b: string | undefined): string | undefined {
	if (!a) return b;
	if (!b) return a;
	return b > a ? b : a;
}

/**
 * Merge a patch into a state without mutating either.
 *
 * Maps are unioned key-wise with the patch winning. notFound is replaced
 * wholesale when the patch carries it, so stale flags cannot come back.
 */
export function mergeInto(state: SyncState, patch: StatePatch, now: Date = new Date()): SyncState {
	const next: SyncState = { ...state };

	for (const field of UNION_FIELDS) {
		const incoming = patch[field];
		if (incoming) {
			Object.assign(next, { [field]: { ...state[field], ...incoming } });
		}
	}

	if (patch.notFound) {
		next.notFound = { ...patch.notFound };
	}
	for (const field of UNION_FIELDS) {
		const drop = new Set(patch.unset?.[field] ?? []);
		if (drop.size > 0) {
			Object.assign(next, { [field]: Object.fromEntries(Object.entries(next[field]).filter(([key]) => !drop.has(key))) });
		}
	}
	if (patch.toDownload) {
		next.toDownload = [...patch.toDownload];
	}
	if (patch.haveLocally) {
		next.haveLocally = [...patch.haveLocally];
	}
	if (patch.outcomes?.length) {
		next.outcomes = [...state.outcomes, ...patch.outcomes].slice(-MAX_OUTCOMES);
	}
	if (patch.mutations?.length) {
		next.mutations = [...state.mutations, ...patch.mutations].slice(-MAX_MUTATIONS);
	}
	for (const field of TIMESTAMP_FIELDS) {
		next[field] = latest(state[field], patch[field]);
	}

	next.updatedAt = now.toISOString();
	return next;
}

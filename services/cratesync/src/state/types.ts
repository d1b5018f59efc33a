import type { z } from "zod";
import type { mutationEntrySchema, outcomeEntrySchema, syncStateSchema, trackRefSchema } from "./schema.js";

export type SyncState = z.infer<typeof syncStateSchema>;
export type OutcomeEntry = z.infer<typeof outcomeEntrySchema>;
export type OutcomeAction = OutcomeEntry["action"];
export type MutationEntry = z.infer<typeof mutationEntrySchema>;
export type TrackRef = z.infer<typeof trackRefSchema>;

export type MapField =
	| "urls"
	| "remoteIds"
	| "remoteTitles"
	| "matchScores"
	| "starred"
	| "notFound"
	| "dismissed"
	| "dismissedManualCheck"
	| "skipped"
	| "localPaths";

export type TimestampField = "lastCrawlAt" | "lastFullCrawlAt" | "lastReconcileAt";

/**
 * Partial update applied with mergeInto. Logs are appended, maps unioned,
 * except notFound which replaces the stored map. Keys listed in unset are
 * dropped from their map after the union.
 */
export interface StatePatch {
	urls?: Record<string, string>;
	remoteIds?: Record<string, string>;
	remoteTitles?: Record<string, string>;
	matchScores?: Record<string, number>;
	starred?: Record<string, boolean>;
	notFound?: Record<string, boolean>;
	dismissed?: Record<string, boolean>;
	dismissedManualCheck?: Record<string, boolean>;
	skipped?: Record<string, boolean>;
	localPaths?: Record<string, string>;
	toDownload?: TrackRef[];
	haveLocally?: TrackRef[];
	outcomes?: OutcomeEntry[];
	mutations?: MutationEntry[];
	lastCrawlAt?: string;
	lastFullCrawlAt?: string;
	lastReconcileAt?: string;
	unset?: { [F in MapField]?: readonly string[] };
}

export type SaveResult = { ok: true } | { ok: false; error: Error };

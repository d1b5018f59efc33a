import { z } from "zod";

export const STATE_VERSION = 1;

export const OUTCOME_ACTIONS = [
	"found",
	"not_found",
	"starred",
	"unstarred",
	"failed",
	"session_expired",
	"premium_required",
	"reset_not_found",
	"match_removed",
] as const;

export const outcomeEntrySchema = z.object({
	timestamp: z.string(),
	key: z.string(),
	action: z.enum(OUTCOME_ACTIONS),
	url: z.string().optional(),
	title: z.string().optional(),
	remoteId: z.string().optional(),
	score: z.number().optional(),
	error: z.string().optional(),
});

export const mutationEntrySchema = z.object({
	timestamp: z.string(),
	action: z.enum(["starred", "unstarred"]),
	key: z.string(),
	source: z.enum(["crawl", "star", "unstar", "sync", "undismiss"]),
});

export const trackRefSchema = z.object({
	key: z.string(),
	artist: z.string(),
	title: z.string(),
	capturedAt: z.string().optional(),
});

const stringMap = z.record(z.string(), z.string()).default({});
const flagMap = z.record(z.string(), z.boolean()).default({});

export const syncStateSchema = z.object({
	version: z.number().int().default(STATE_VERSION),
	urls: stringMap,
	remoteIds: stringMap,
	remoteTitles: stringMap,
	matchScores: z.record(z.string(), z.number()).default({}),
	starred: flagMap,
	notFound: flagMap,
	dismissed: flagMap,
	dismissedManualCheck: flagMap,
	skipped: flagMap,
	localPaths: stringMap,
	toDownload: z.array(trackRefSchema).default([]),
	haveLocally: z.array(trackRefSchema).default([]),
	outcomes: z.array(outcomeEntrySchema).default([]),
	mutations: z.array(mutationEntrySchema).default([]),
	lastCrawlAt: z.string().optional(),
	lastFullCrawlAt: z.string().optional(),
	lastReconcileAt: z.string().optional(),
	updatedAt: z.string().optional(),
});

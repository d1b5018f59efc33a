/**
 * Sync service
 *
 * The single entry point used by the HTTP API and the CLI. Remote work runs
 * as background jobs on the controller; direct commands refuse to write while
 * a job holds the store.
 */

import { z } from "zod";
import { captureEntrySchema, type CaptureEntry, type CaptureStore } from "../capture/reader.js";
import { buildVerifyList, crossCheckFavorites, type CrossCheckResult } from "../crawl/cross-check.js";
import { crawlFavorites, maxPagesForRange, type TimeRange } from "../crawl/paginator.js";
import { CancelledError, NotFoundError, PremiumRequiredError, SessionExpiredError, errorMessage } from "../errors.js";
import { splitKey } from "../identity/track-key.js";
import { JobController, runItems, type ItemRunSummary, type JobContext, type JobHandle, type JobProgress } from "../jobs/controller.js";
import type { LibraryScanner } from "../library/scanner.js";
import { applyCrawl } from "../reconcile/crawl-merge.js";
import { reconcile, replayPatch, statusSnapshot, withReplay, type StatusSnapshot } from "../reconcile/engine.js";
import type { OrchestratorFactory } from "../remote/factory.js";
import type { RemoteOrchestrator, SearchMatch } from "../remote/orchestrator.js";
import { MIN_MATCH_SCORE, scoreCandidate } from "../remote/scoring.js";
import type { FavoriteTarget } from "../remote/types.js";
import { loadSettings, saveSettings, type Settings } from "../settings.js";
import { mergeInto } from "../state/merge.js";
import { RESET_MARKER_KEY } from "../state/outcome-log.js";
import type { StateStore } from "../state/store.js";
import type { MutationEntry, OutcomeAction, StatePatch, SyncState, TrackRef } from "../state/types.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("sync-service");

export const DEFAULT_DOWNLOAD_FORMAT = "3";

export type SearchMode = "unfound" | "retry_not_found";
export type SearchRequest = { key: string } | { all: true; mode: SearchMode };

export interface CrawlSummary {
	pages: number;
	favorites: number;
	complete: boolean;
	/** starred tracks read one by one after a bounded crawl */
	crossChecked: number;
}

export interface RescanSummary {
	captures: number;
	files: number;
	toDownload: number;
	haveLocally: number;
	scanErrors: number;
}

export interface CleanupSummary {
	kept: number;
	removed: number;
	threshold: number;
}

export interface SyncServiceOptions {
	store: StateStore;
	scanner: LibraryScanner;
	orchestrators: OrchestratorFactory;
	captureStore: (settings: Settings) => CaptureStore;
	settingsPath: string;
	jobs?: JobController;
	now?: () => Date;
}

export function failureAction(error: unknown): OutcomeAction {
	if (error instanceof NotFoundError) return "not_found";
	if (error instanceof SessionExpiredError) return "session_expired";
	if (error instanceof PremiumRequiredError) return "premium_required";
	return "failed";
}

function foundPatch(ref: TrackRef, match: SearchMatch, timestamp: string): StatePatch {
	return {
		urls: { [ref.key]: match.url },
		remoteTitles: { [ref.key]: match.remoteTitle },
		matchScores: { [ref.key]: match.score },
		...(match.remoteId ? { remoteIds: { [ref.key]: match.remoteId } } : {}),
		outcomes: [
			{
				timestamp,
				key: ref.key,
				action: "found",
				url: match.url,
				title: match.remoteTitle,
				remoteId: match.remoteId,
				score: match.score,
			},
		],
	};
}

const describeRef = (ref: TrackRef): string => ref.key;

export class SyncService {
	readonly jobs: JobController;
	private readonly store: StateStore;
	private readonly scanner: LibraryScanner;
	private readonly orchestrators: OrchestratorFactory;
	private readonly captureStore: (settings: Settings) => CaptureStore;
	private readonly settingsPath: string;
	private readonly now: () => Date;

	constructor(options: SyncServiceOptions) {
		this.store = options.store;
		this.scanner = options.scanner;
		this.orchestrators = options.orchestrators;
		this.captureStore = options.captureStore;
		this.settingsPath = options.settingsPath;
		this.jobs = options.jobs ?? new JobController();
		this.now = options.now ?? (() => new Date());
	}

	// reads

	status(): StatusSnapshot {
		return statusSnapshot(this.store.snapshot());
	}

	progress(): JobProgress {
		return this.jobs.snapshot();
	}

	/** Newest first */
	mutationLog(limit = 100): MutationEntry[] {
		return this.store.snapshot().mutations.slice(-limit).reverse();
	}

	settings(): Settings {
		return loadSettings(this.settingsPath);
	}

	updateSettings(input: unknown): Promise<Settings> {
		return saveSettings(input, this.settingsPath);
	}

	// background jobs

	crawl(range: TimeRange = "all"): JobHandle<CrawlSummary> {
		const maxPages = maxPagesForRange(range);
		return this.jobs.start("crawl", maxPages ?? 0, (ctx) =>
			this.withOrchestrator(async (orchestrator) => {
				const backend = await orchestrator.crawlBackend();
				const result = await crawlFavorites(backend, {
					maxPages,
					token: ctx.token,
					onPage: (page, found) => ctx.report({ current: page, message: `Page ${page}: ${found} favorites` }),
				});

				let check: CrossCheckResult = { verified: {}, stopped: false, sessionExpired: false };
				if (!result.complete && !result.stopped && !result.sessionExpired) {
					const targets = buildVerifyList(withReplay(this.store.snapshot()), result);
					check = await crossCheckFavorites(backend, targets, {
						token: ctx.token,
						onCheck: (checked, total) => ctx.report({ message: `Cross-checked ${checked}/${total} starred tracks` }),
					});
				}

				// partial results are kept even when the walk was cut short
				await this.store.commit((state) => applyCrawl(state, result, this.now(), check.verified));
				if (result.sessionExpired || check.sessionExpired) {
					throw new SessionExpiredError(`Session expired after page ${result.pages}, partial crawl saved`);
				}
				if (result.stopped || check.stopped) {
					throw new CancelledError();
				}
				return {
					pages: result.pages,
					favorites: Object.keys(result.entries).length,
					complete: result.complete,
					crossChecked: Object.keys(check.verified).length,
				};
			})
		);
	}

	search(request: SearchRequest): JobHandle<ItemRunSummary> {
		const refs = this.searchTargets(request);
		return this.jobs.start("search", refs.length, (ctx) =>
			this.withOrchestrator((orchestrator) =>
				runItems(
					refs,
					ctx,
					async (ref) => {
						const match = await orchestrator.search(ref.artist, ref.title);
						ctx.report({ lastUrl: match.url });
						const timestamp = this.now().toISOString();
						await this.commitWithReplay(() => foundPatch(ref, match, timestamp));
					},
					(ref, error) => this.recordFailure(ref, error),
					describeRef
				)
			)
		);
	}

	sync(keys?: readonly string[]): JobHandle<ItemRunSummary> {
		const state = withReplay(this.store.snapshot());
		const refs = keys
			? keys.map((key) => this.refFor(state, key))
			: state.toDownload.filter((ref) => !state.dismissed[ref.key] && !state.starred[ref.key] && !state.skipped[ref.key]);

		return this.jobs.start("sync", refs.length, (ctx) =>
			this.withOrchestrator((orchestrator) =>
				runItems(
					refs,
					ctx,
					(ref) => this.starOne(orchestrator, ref, ctx, "sync"),
					(ref, error) => this.recordFailure(ref, error),
					describeRef
				)
			)
		);
	}

	star(key: string): JobHandle<ItemRunSummary> {
		const ref = this.refFor(withReplay(this.store.snapshot()), key);
		return this.jobs.start("star", 1, (ctx) =>
			this.withOrchestrator((orchestrator) =>
				runItems(
					[ref],
					ctx,
					(item) => this.starOne(orchestrator, item, ctx, "star"),
					(item, error) => this.recordFailureAndThrow(item, error),
					describeRef
				)
			)
		);
	}

	unstar(key: string): JobHandle<ItemRunSummary> {
		const ref = this.refFor(withReplay(this.store.snapshot()), key);
		return this.jobs.start("unstar", 1, (ctx) =>
			this.withOrchestrator((orchestrator) =>
				runItems(
					[ref],
					ctx,
					(item) => this.unstarOne(orchestrator, item, ctx),
					(item, error) => this.recordFailureAndThrow(item, error),
					describeRef
				)
			)
		);
	}

	/** Clear the dismissal and star the track again on the remote */
	undismiss(key: string): JobHandle<ItemRunSummary> {
		const ref = this.refFor(withReplay(this.store.snapshot()), key);
		return this.jobs.start("undismiss", 1, (ctx) =>
			this.withOrchestrator((orchestrator) =>
				runItems(
					[ref],
					ctx,
					(item) => this.starOne(orchestrator, item, ctx, "undismiss"),
					(item, error) => this.recordFailureAndThrow(item, error),
					describeRef
				)
			)
		);
	}

	rescan(): JobHandle<RescanSummary> {
		return this.jobs.start("rescan", 0, async (ctx) => {
			const settings = this.settings();
			ctx.report({ message: "Reading capture list" });
			const captures = await this.captureStore(settings).read();

			const scan = await this.scanner.scan(settings.destinationFolders, {
				onProgress: (files) => ctx.report({ current: files, message: `Scanned ${files} files` }),
			});
			ctx.token.throwIfCancelled();

			const state = await reconcile(this.store, captures, scan.tracks, this.now());
			return {
				captures: captures.length,
				files: scan.tracks.length,
				toDownload: state.toDownload.filter((t) => !state.skipped[t.key]).length,
				haveLocally: state.haveLocally.length,
				scanErrors: scan.errors.length,
			};
		});
	}

	// direct commands

	stop(): boolean {
		return this.jobs.stop();
	}

	/** Asks the remote whether the saved session is still signed in */
	async checkSession(): Promise<{ loggedIn: boolean }> {
		const expired = await this.withOrchestrator((orchestrator) => orchestrator.detectSessionExpiry());
		return { loggedIn: !expired };
	}

	/** Hide tracks from to_download; the remote is not touched. Returns how many were newly skipped. */
	async skip(keys: readonly string[]): Promise<number> {
		this.jobs.assertIdle();
		const state = this.store.snapshot();
		const fresh = [...new Set(keys)].filter((key) => !state.skipped[key]);
		await this.store.commit({ skipped: Object.fromEntries(fresh.map((key) => [key, true])) });
		return fresh.length;
	}

	async unskip(keys: readonly string[]): Promise<number> {
		this.jobs.assertIdle();
		const state = this.store.snapshot();
		const held = [...new Set(keys)].filter((key) => state.skipped[key]);
		await this.store.commit({ skipped: Object.fromEntries(held.map((key) => [key, false])) });
		return held.length;
	}

	/**
	 * Re-score every stored match and drop those now under the threshold.
	 * Kept matches get their score refreshed.
	 */
	async cleanupMatches(): Promise<CleanupSummary> {
		this.jobs.assertIdle();
		const summary: CleanupSummary = { kept: 0, removed: 0, threshold: MIN_MATCH_SCORE };
		const timestamp = this.now().toISOString();

		await this.commitWithReplay((stored) => {
			const state = withReplay(stored);
			const scores: Record<string, number> = {};
			const removed: string[] = [];

			for (const [key, title] of Object.entries(state.remoteTitles)) {
				if (!state.urls[key] || !key.includes(" - ")) continue;
				const { artist, title: wanted } = splitKey(key);
				const score = scoreCandidate(title, artist, wanted);
				if (score < MIN_MATCH_SCORE) {
					removed.push(key);
				} else {
					scores[key] = Math.round(score * 1000) / 1000;
				}
			}

			summary.kept = Object.keys(scores).length;
			summary.removed = removed.length;
			return {
				matchScores: scores,
				unset: { urls: removed, remoteIds: removed, remoteTitles: removed, matchScores: removed },
				outcomes: removed.map((key) => ({ timestamp, key, action: "match_removed" as const })),
			};
		});

		log.info(summary, "stored matches re-scored");
		return summary;
	}

	async dismissManualCheck(key: string): Promise<void> {
		this.jobs.assertIdle();
		await this.store.commit({ dismissedManualCheck: { [key]: true } });
	}

	async resetNotFound(): Promise<number> {
		this.jobs.assertIdle();
		const cleared = Object.keys(withReplay(this.store.snapshot()).notFound).length;
		await this.store.commit({
			notFound: {},
			outcomes: [{ timestamp: this.now().toISOString(), key: RESET_MARKER_KEY, action: "reset_not_found" }],
		});
		log.info({ cleared }, "not-found marks reset");
		return cleared;
	}

	async importCaptures(input: unknown): Promise<{ total: number; added: number }> {
		const tracks: CaptureEntry[] = z.array(captureEntrySchema).parse(input);
		return this.captureStore(this.settings()).import(tracks);
	}

	async downloadLink(key: string, format: string = DEFAULT_DOWNLOAD_FORMAT): Promise<string> {
		const state = withReplay(this.store.snapshot());
		const url = state.urls[key];
		if (!url) {
			throw new NotFoundError(`No remote track known for ${key}`);
		}
		const remoteId = state.remoteIds[key];
		return this.withOrchestrator((orchestrator) =>
			orchestrator.resolveDownload({ key, url, ...(remoteId ? { remoteId } : {}) }, format)
		);
	}

	// internals

	private refFor(state: SyncState, key: string): TrackRef {
		const known = [...state.toDownload, ...state.haveLocally].find((ref) => ref.key === key);
		if (known) return known;
		const { artist, title } = splitKey(key);
		return { key, artist, title };
	}

	private searchTargets(request: SearchRequest): TrackRef[] {
		const state = withReplay(this.store.snapshot());
		if ("key" in request) {
			return [this.refFor(state, request.key)];
		}
		if (request.mode === "retry_not_found") {
			return Object.keys(state.notFound)
				.filter((key) => state.notFound[key])
				.map((key) => this.refFor(state, key));
		}
		return state.toDownload.filter((ref) => !state.urls[ref.key] && !state.notFound[ref.key] && !state.skipped[ref.key]);
	}

	private async withOrchestrator<T>(run: (orchestrator: RemoteOrchestrator) => Promise<T>): Promise<T> {
		const orchestrator = this.orchestrators(this.settings());
		try {
			return await run(orchestrator);
		} finally {
			await orchestrator.close();
		}
	}

	/** Commit a patch and re-derive notFound from the resulting outcome log */
	private commitWithReplay(build: (state: SyncState) => StatePatch): Promise<SyncState> {
		return this.store.commit((state) => {
			const patch = build(state);
			return { ...patch, notFound: replayPatch(mergeInto(state, patch)).notFound };
		});
	}

	private async recordFailure(ref: TrackRef, error: unknown): Promise<void> {
		const timestamp = this.now().toISOString();
		await this.commitWithReplay(() => ({
			outcomes: [{ timestamp, key: ref.key, action: failureAction(error), error: errorMessage(error) }],
		}));
	}

	private async recordFailureAndThrow(ref: TrackRef, error: unknown): Promise<void> {
		await this.recordFailure(ref, error);
		throw error;
	}

	/**
	 * Target for a favorite change. A fresh search result is committed right
	 * away so a failing toggle or a retry does not lose or repeat it.
	 */
	private async locate(orchestrator: RemoteOrchestrator, ref: TrackRef): Promise<FavoriteTarget> {
		const state = withReplay(this.store.snapshot());
		const url = state.urls[ref.key];
		if (url) {
			const remoteId = state.remoteIds[ref.key];
			return { key: ref.key, url, ...(remoteId ? { remoteId } : {}) };
		}
		const match = await orchestrator.search(ref.artist, ref.title);
		const timestamp = this.now().toISOString();
		await this.commitWithReplay(() => foundPatch(ref, match, timestamp));
		return { key: ref.key, url: match.url, ...(match.remoteId ? { remoteId: match.remoteId } : {}) };
	}

	private async starOne(
		orchestrator: RemoteOrchestrator,
		ref: TrackRef,
		ctx: JobContext,
		source: "sync" | "star" | "undismiss"
	): Promise<void> {
		const target = await this.locate(orchestrator, ref);
		ctx.report({ lastUrl: target.url });

		const result = await orchestrator.ensureFavorited(target);
		const remoteId = result.remoteId ?? target.remoteId;
		const timestamp = this.now().toISOString();

		await this.commitWithReplay(() => ({
			urls: { [ref.key]: target.url },
			...(remoteId ? { remoteIds: { [ref.key]: remoteId } } : {}),
			starred: { [ref.key]: true },
			...(source === "sync" ? {} : { dismissed: { [ref.key]: false } }),
			outcomes: [
				{ timestamp, key: ref.key, action: "starred", url: target.url, remoteId },
			],
			mutations: result.toggled ? [{ timestamp, action: "starred", key: ref.key, source }] : [],
		}));
	}

	private async unstarOne(orchestrator: RemoteOrchestrator, ref: TrackRef, ctx: JobContext): Promise<void> {
		const target = await this.locate(orchestrator, ref);
		ctx.report({ lastUrl: target.url });

		const result = await orchestrator.ensureUnfavorited(target);
		const remoteId = result.remoteId ?? target.remoteId;
		const timestamp = this.now().toISOString();

		await this.commitWithReplay(() => ({
			urls: { [ref.key]: target.url },
			...(remoteId ? { remoteIds: { [ref.key]: remoteId } } : {}),
			starred: { [ref.key]: false },
			dismissed: { [ref.key]: true },
			outcomes: [
				{ timestamp, key: ref.key, action: "unstarred", url: target.url, remoteId },
			],
			mutations: result.toggled ? [{ timestamp, action: "unstarred", key: ref.key, source: "unstar" }] : [],
		}));
	}
}

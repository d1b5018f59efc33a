// Service and wiring
export { SyncService, failureAction, DEFAULT_DOWNLOAD_FORMAT } from "../sync/service.js";
export type { SearchMode, SearchRequest, CrawlSummary, RescanSummary, CleanupSummary, SyncServiceOptions } from "../sync/service.js";
export { createSyncService } from "../sync/create.js";

// Jobs
export { JobController, runItems } from "../jobs/controller.js";
export type { JobHandle, JobProgress, JobResult, JobOutcome, ItemRunSummary } from "../jobs/controller.js";
export { CancellationToken } from "../jobs/cancellation.js";

// Track identity
export { trackKey, splitKey, normalizedKey, deepKey, lookup, buildIndex, parseArtistTitleFromFilename } from "../identity/track-key.js";
export type { TrackKey, LookupTier } from "../identity/track-key.js";

// State
export { StateStore } from "../state/store.js";
export { emptyState, mergeInto } from "../state/merge.js";
export { replayOutcomes, RESET_MARKER_KEY } from "../state/outcome-log.js";
export type { SyncState, StatePatch, OutcomeEntry, MutationEntry, TrackRef } from "../state/types.js";

// Reconciliation
export { classify, reconcile, statusSnapshot, alternateVersionKeys } from "../reconcile/engine.js";
export type { StatusSnapshot } from "../reconcile/engine.js";
export { applyCrawl } from "../reconcile/crawl-merge.js";

// Remote catalogue
export { RemoteOrchestrator } from "../remote/orchestrator.js";
export type { SearchMatch, FavoriteResult } from "../remote/orchestrator.js";
export { crawlFavorites, maxPagesForRange, TIME_RANGES } from "../crawl/paginator.js";
export { buildVerifyList, crossCheckFavorites, MAX_CROSS_CHECK } from "../crawl/cross-check.js";
export type { TimeRange, CrawlResult } from "../crawl/paginator.js";
export type { RemoteBackend } from "../remote/types.js";

// Local inputs
export { scanFolders, readTrackIdentity } from "../library/scanner.js";
export type { LocalTrack } from "../library/types.js";
export { JsonCaptureReader, mergeCaptures } from "../capture/reader.js";
export type { CaptureEntry } from "../capture/reader.js";

// Settings and errors
export { loadSettings, saveSettings, settingsUpdateSchema } from "../settings.js";
export type { Settings } from "../settings.js";
export * from "../errors.js";

// Logging
export { logger, createLogger } from "../utils/logger.js";

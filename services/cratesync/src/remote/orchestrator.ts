/**
 * Remote mutation orchestrator
 *
 * Finds tracks on the catalogue and moves their favorite flag to a wanted
 * state. Every mutation reads first and toggles at most once, so repeating a
 * call never flips a track back.
 */

import { NotFoundError, TransientBackendError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import { remoteIdFromUrl } from "./catalogue.js";
import { pickBest, searchQueries, type ScoredCandidate } from "./scoring.js";
import type { BackendKind, FavoriteTarget, RemoteBackend } from "./types.js";

const log = createLogger("orchestrator");

export type BackendFactory = () => Promise<RemoteBackend>;

export interface OrchestratorOptions {
	request: BackendFactory;
	browser: BackendFactory;
	/** search through the request backend instead of the browser */
	searchUseHttp?: boolean;
}

export interface SearchMatch {
	url: string;
	remoteTitle: string;
	remoteId?: string;
	score: number;
}

export interface FavoriteResult {
	starred: boolean;
	/** a mutating call was made */
	toggled: boolean;
	/** remote id learned while acting, for the caller to persist */
	remoteId?: string;
	backend: BackendKind;
}

/**
 * Lazily created backend; the browser only launches when first asked for
 */
class LazyBackend {
	private readonly factory: BackendFactory;
	private instance: Promise<RemoteBackend> | null = null;

	constructor(factory: BackendFactory) {
		this.factory = factory;
	}

	get(): Promise<RemoteBackend> {
		if (!this.instance) {
			const created = this.factory();
			// a failed launch may be retried by the next caller
			this.instance = created.catch((error: unknown) => {
				this.instance = null;
				throw error;
			});
		}
		return this.instance;
	}

	async close(): Promise<void> {
		const pending = this.instance;
		this.instance = null;
		if (pending) {
			await (await pending).close();
		}
	}
}

export class RemoteOrchestrator {
	private readonly request: LazyBackend;
	private readonly browser: LazyBackend;
	private readonly searchUseHttp: boolean;

	constructor(options: OrchestratorOptions) {
		this.request = new LazyBackend(options.request);
		this.browser = new LazyBackend(options.browser);
		this.searchUseHttp = options.searchUseHttp ?? true;
	}

	async search(artist: string, title: string): Promise<SearchMatch> {
		const backend = await (this.searchUseHttp ? this.request : this.browser).get();
		let best: ScoredCandidate | undefined;

		for (const query of searchQueries(artist, title)) {
			const candidates = await backend.search(query);
			const pick = pickBest(candidates, artist, title);
			log.debug({ query, candidates: candidates.length, score: pick?.score }, "search query");
			if (pick && (!best || pick.score > best.score)) {
				best = pick;
			}
		}

		if (!best) {
			throw new NotFoundError(`No match for ${artist} - ${title}`);
		}
		return {
			url: best.url,
			remoteTitle: best.title,
			score: best.score,
			...(best.remoteId ? { remoteId: best.remoteId } : {}),
		};
	}

	ensureFavorited(target: FavoriteTarget): Promise<FavoriteResult> {
		return this.ensureState(target, true);
	}

	ensureUnfavorited(target: FavoriteTarget): Promise<FavoriteResult> {
		return this.ensureState(target, false);
	}

	async resolveDownload(target: FavoriteTarget, format: string): Promise<string> {
		const backend = await this.request.get();
		return backend.resolveDownload(withRemoteId(target), format);
	}

	async detectSessionExpiry(): Promise<boolean> {
		return (await this.request.get()).detectSessionExpiry();
	}

	/** Backend used for crawling the favorites listing */
	crawlBackend(): Promise<RemoteBackend> {
		return this.request.get();
	}

	async close(): Promise<void> {
		await Promise.all([this.request.close(), this.browser.close()]);
	}

	private async ensureState(target: FavoriteTarget, wanted: boolean): Promise<FavoriteResult> {
		const resolved = withRemoteId(target);
		let backend: RemoteBackend;
		let current: boolean;
		let remoteId = resolved.remoteId;

		if (remoteId) {
			backend = await this.request.get();
			current = await backend.readFavoriteState(resolved);
		} else {
			backend = await this.browser.get();
			const page = await backend.openTrack(resolved.url);
			current = page.favorited;
			remoteId = page.remoteId;
		}

		const discovered = remoteId && remoteId !== target.remoteId ? { remoteId } : {};
		if (current === wanted) {
			log.debug({ key: target.key, wanted, backend: backend.kind }, "already in wanted state");
			return { starred: current, toggled: false, backend: backend.kind, ...discovered };
		}

		const acting: FavoriteTarget = remoteId ? { ...resolved, remoteId } : resolved;
		const reported = await backend.toggleFavorite(acting);
		const verified = reported === wanted ? await backend.readFavoriteState(acting) : reported;
		if (verified !== wanted) {
			throw new TransientBackendError(
				`Favorite state of ${target.key} is ${verified ? "on" : "off"} after toggling, expected ${wanted ? "on" : "off"}`
			);
		}

		log.info({ key: target.key, starred: wanted, backend: backend.kind }, "favorite state changed");
		return { starred: wanted, toggled: true, backend: backend.kind, ...discovered };
	}
}

function withRemoteId(target: FavoriteTarget): FavoriteTarget {
	if (target.remoteId) return target;
	const remoteId = remoteIdFromUrl(target.url);
	return remoteId ? { ...target, remoteId } : target;
}

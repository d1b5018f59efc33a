/**
 * In-process catalogue used by the tests in place of the real site
 */

import { SessionExpiredError, TransientBackendError } from "../errors.js";
import { listingKey, remoteIdFromUrl } from "../remote/catalogue.js";
import type { BackendKind, FavoriteTarget, FavoritesPage, RemoteBackend, SearchCandidate, TrackPage } from "../remote/types.js";

export interface FakeTrack {
	url: string;
	title: string;
	remoteId: string;
	favorited: boolean;
}

export interface FakeCalls {
	search: string[];
	read: string[];
	toggle: string[];
	open: string[];
}

export class FakeCatalogue {
	readonly tracks: FakeTrack[] = [];
	readonly calls: FakeCalls = { search: [], read: [], toggle: [], open: [] };
	sessionExpired = false;
	/** toggles that silently do nothing */
	ignoreToggles = false;
	/** number of upcoming operations that fail as transient */
	transientFailures = 0;
	pageSize = 2;

	add(title: string, remoteId: string, favorited = false): FakeTrack {
		const slug = title.toLowerCase().replace(/[^a-z0-9]+/g, "-").replace(/^-|-$/g, "");
		const track = { url: `https://remote.test/track/${slug}-${remoteId}.html`, title, remoteId, favorited };
		this.tracks.push(track);
		return track;
	}

	byUrl(url: string): FakeTrack | undefined {
		return this.tracks.find((t) => t.url === url);
	}

	favorites(): FakeTrack[] {
		return this.tracks.filter((t) => t.favorited);
	}

	backend(kind: BackendKind): FakeBackend {
		return new FakeBackend(this, kind);
	}

	gate(): void {
		if (this.sessionExpired) {
			throw new SessionExpiredError();
		}
		if (this.transientFailures > 0) {
			this.transientFailures--;
			throw new TransientBackendError("connection reset");
		}
	}
}

export class FakeBackend implements RemoteBackend {
	readonly kind: BackendKind;
	closed = false;
	private readonly catalogue: FakeCatalogue;

	constructor(catalogue: FakeCatalogue, kind: BackendKind) {
		this.catalogue = catalogue;
		this.kind = kind;
	}

	async search(query: string): Promise<SearchCandidate[]> {
		this.catalogue.gate();
		this.catalogue.calls.search.push(query);
		const words = query.toLowerCase().split(/\s+/).filter(Boolean);
		return this.catalogue.tracks
			.filter((t) => words.some((w) => t.title.toLowerCase().includes(w)))
			.map((t) => ({ url: t.url, title: t.title, remoteId: t.remoteId }));
	}

	async openTrack(url: string): Promise<TrackPage> {
		this.catalogue.gate();
		this.catalogue.calls.open.push(url);
		const track = this.find(url);
		return { url, title: track.title, remoteId: track.remoteId, favorited: track.favorited };
	}

	async readFavoriteState(target: FavoriteTarget): Promise<boolean> {
		this.catalogue.gate();
		this.catalogue.calls.read.push(target.key);
		return this.find(target.url).favorited;
	}

	async toggleFavorite(target: FavoriteTarget): Promise<boolean> {
		this.catalogue.gate();
		if (this.kind === "request" && !(target.remoteId ?? remoteIdFromUrl(target.url))) {
			throw new Error(`Request backend needs a remote id to toggle ${target.key}`);
		}
		this.catalogue.calls.toggle.push(target.key);
		const track = this.find(target.url);
		if (!this.catalogue.ignoreToggles) {
			track.favorited = !track.favorited;
		}
		return track.favorited;
	}

	async readFavoritesPage(page: number): Promise<FavoritesPage> {
		this.catalogue.gate();
		const all = this.catalogue.favorites();
		const start = (page - 1) * this.catalogue.pageSize;
		const slice = all.slice(start, start + this.catalogue.pageSize);
		return {
			entries: slice.map((t) => ({ key: listingKey(t.title), url: t.url, title: t.title, remoteId: t.remoteId })),
			hasNext: start + this.catalogue.pageSize < all.length,
		};
	}

	async detectSessionExpiry(): Promise<boolean> {
		return this.catalogue.sessionExpired;
	}

	async resolveDownload(target: FavoriteTarget, format: string): Promise<string> {
		this.catalogue.gate();
		const track = this.find(target.url);
		return `https://remote.test/files/${track.remoteId}.${format}`;
	}

	async close(): Promise<void> {
		this.closed = true;
	}

	private find(url: string): FakeTrack {
		const track = this.catalogue.byUrl(url);
		if (!track) {
			throw new TransientBackendError(`No such page ${url}`);
		}
		return track;
	}
}

export type BackendKind = "request" | "browser";

export interface SearchCandidate {
	url: string;
	title: string;
	remoteId?: string;
}

export interface TrackPage {
	url: string;
	title?: string;
	remoteId?: string;
	favorited: boolean;
}

/** The remote entry a favorite operation acts on. */
export interface FavoriteTarget {
	key: string;
	url: string;
	remoteId?: string;
}

export interface FavoriteListing {
	key: string;
	url: string;
	title: string;
	remoteId?: string;
}

export interface FavoritesPage {
	entries: FavoriteListing[];
	hasNext: boolean;
}

/**
 * Contract shared by the request-based client and the browser driver.
 * Both throw SessionExpiredError on a login redirect, PremiumRequiredError on
 * a premium redirect and TransientBackendError on network or driver failures.
 */
export interface RemoteBackend {
	readonly kind: BackendKind;
	search(query: string): Promise<SearchCandidate[]>;
	openTrack(url: string): Promise<TrackPage>;
	readFavoriteState(target: FavoriteTarget): Promise<boolean>;
	/** Flips the favorite flag and returns the new state. */
	toggleFavorite(target: FavoriteTarget): Promise<boolean>;
	readFavoritesPage(page: number): Promise<FavoritesPage>;
	detectSessionExpiry(): Promise<boolean>;
	resolveDownload(target: FavoriteTarget, format: string): Promise<string>;
	close(): Promise<void>;
}

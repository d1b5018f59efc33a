/**
 * Request-based backend: plain HTTP with the saved session cookies.
 * Fast, but favorite toggles need the track's remote id.
 */

import got, { RequestError } from "got";
import type { CookieJar } from "tough-cookie";
import { z } from "zod";
import { PremiumRequiredError, SessionExpiredError, TransientBackendError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import {
	CatalogueUrls,
	isLoginUrl,
	isPremiumUrl,
	parseFavoritesPage,
	parseSearchResults,
	parseTrackPage,
	remoteIdFromUrl,
} from "./catalogue.js";
import type { FavoriteTarget, FavoritesPage, RemoteBackend, SearchCandidate, TrackPage } from "./types.js";

const log = createLogger("request-backend");

export interface PageResponse {
	/** Final URL after redirects */
	url: string;
	statusCode: number;
	body: string;
	location?: string;
}

export interface RequestOptions {
	headers?: Record<string, string>;
	followRedirect?: boolean;
}

export interface PageClient {
	get(url: string, options?: RequestOptions): Promise<PageResponse>;
	post(url: string, options?: RequestOptions): Promise<PageResponse>;
}

const DEFAULT_HEADERS = {
	"User-Agent":
		"Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
	"Accept-Language": "en-US,en;q=0.9",
};

const XHR_HEADERS = {
	"X-Requested-With": "XMLHttpRequest",
	Accept: "application/json, text/javascript, */*; q=0.01",
};

/**
 * got-backed page client sharing one cookie jar
 */
export function createGotClient(cookieJar: CookieJar, timeoutMs: number): PageClient {
	const client = got.extend({
		cookieJar,
		headers: DEFAULT_HEADERS,
		timeout: { request: timeoutMs },
		throwHttpErrors: false,
		retry: { limit: 0 },
	});

	const send = async (method: "GET" | "POST", url: string, options: RequestOptions = {}): Promise<PageResponse> => {
		try {
			const response = await client(url, {
				method,
				headers: options.headers,
				followRedirect: options.followRedirect ?? true,
			});
			const location = response.headers.location;
			return {
				url: response.url,
				statusCode: response.statusCode,
				body: response.body,
				...(location ? { location } : {}),
			};
		} catch (error) {
			if (error instanceof RequestError) {
				const code = error.code;
				log.warn({ method, url, code }, "request failed");
				throw new TransientBackendError(`${method} ${url}: ${code} ${error.message}`, { cause: error });
			}
			throw error;
		}
	};

	return {
		get: (url, options) => send("GET", url, options),
		post: (url, options) => send("POST", url, options),
	};
}

const toggleResponseSchema = z.object({
	result: z.enum(["favored", "unfavored"]),
});

const downloadResponseSchema = z
	.object({
		url: z.string().optional(),
		link: z.string().optional(),
		href: z.string().optional(),
	})
	.passthrough();

function parseJson(body: string): unknown {
	try {
		return JSON.parse(body);
	} catch {
		return undefined;
	}
}

export class RequestBackend implements RemoteBackend {
	readonly kind = "request" as const;
	private readonly client: PageClient;
	private readonly urls: CatalogueUrls;

	constructor(client: PageClient, urls: CatalogueUrls) {
		this.client = client;
		this.urls = urls;
	}

	async search(query: string): Promise<SearchCandidate[]> {
		const page = await this.fetchPage(this.urls.search(query));
		return parseSearchResults(page.body, this.urls);
	}

	async openTrack(url: string): Promise<TrackPage> {
		const page = await this.fetchPage(url);
		const parsed = parseTrackPage(page.body, page.url);
		if (!parsed.hasFavoriteControl) {
			throw new TransientBackendError(`No favorite control on ${page.url}`);
		}
		return { url: page.url, title: parsed.title, remoteId: parsed.remoteId, favorited: parsed.favorited };
	}

	async readFavoriteState(target: FavoriteTarget): Promise<boolean> {
		return (await this.openTrack(target.url)).favorited;
	}

	async toggleFavorite(target: FavoriteTarget): Promise<boolean> {
		const remoteId = target.remoteId ?? remoteIdFromUrl(target.url);
		if (!remoteId) {
			throw new Error(`Request backend needs a remote id to toggle ${target.key}`);
		}

		const response = await this.client.post(this.urls.toggleFavorite(remoteId), {
			headers: { ...XHR_HEADERS, Referer: target.url },
		});
		this.checkLanding(response);

		const parsed = toggleResponseSchema.safeParse(parseJson(response.body));
		if (!parsed.success) {
			throw new TransientBackendError(
				`Unexpected toggle response for ${remoteId} (status ${response.statusCode})`
			);
		}
		return parsed.data.result === "favored";
	}

	async readFavoritesPage(page: number): Promise<FavoritesPage> {
		const response = await this.fetchPage(this.urls.favorites(page));
		return parseFavoritesPage(response.body, page, this.urls);
	}

	async detectSessionExpiry(): Promise<boolean> {
		const response = await this.client.get(this.urls.favorites(1));
		return isLoginUrl(response.url);
	}

	async resolveDownload(target: FavoriteTarget, format: string): Promise<string> {
		const remoteId = target.remoteId ?? remoteIdFromUrl(target.url);
		if (!remoteId) {
			throw new Error(`No remote id known for ${target.key}`);
		}
		const response = await this.client.get(this.urls.download(remoteId, format), {
			headers: { ...XHR_HEADERS, Referer: target.url },
			followRedirect: false,
		});
		if (response.location) {
			this.checkLanding({ ...response, url: this.urls.absolute(response.location) });
		}

		const parsed = downloadResponseSchema.safeParse(parseJson(response.body));
		const link = parsed.success ? parsed.data.url ?? parsed.data.link ?? parsed.data.href : undefined;
		if (!link) {
			throw new TransientBackendError(`Unexpected download response for ${remoteId} (status ${response.statusCode})`);
		}
		return this.urls.absolute(link);
	}

	async close(): Promise<void> {}

	private async fetchPage(url: string): Promise<PageResponse> {
		const response = await this.client.get(url);
		this.checkLanding(response);
		if (response.statusCode >= 500 || response.statusCode === 429) {
			throw new TransientBackendError(`GET ${url} answered ${response.statusCode}`);
		}
		return response;
	}

	private checkLanding(response: PageResponse): void {
		if (isLoginUrl(response.url)) {
			throw new SessionExpiredError();
		}
		if (isPremiumUrl(response.url)) {
			throw new PremiumRequiredError();
		}
	}
}

/**
 * Catalogue site layout: paths, markup selectors and parsers shared by the
 * request client and the browser driver.
 */

import * as cheerio from "cheerio";
import { trackKey, splitKey } from "../identity/track-key.js";
import type { FavoriteListing, FavoritesPage, SearchCandidate } from "./types.js";

export const LOGIN_PATH = "/account/logoreg";
export const PREMIUM_PATH = "/account/premium";

export const TRACK_LINK_SELECTOR = 'a[href*="/track/"]';
export const FAVORITE_BUTTON_SELECTORS = [
	"button.favorites",
	"button.favorite",
	"button[class*='favorite']",
	"button[data-track-id]",
] as const;

const FAVORITED_CLASSES = ["active", "favorited", "starred", "selected", "added"];
const TRACK_ID_IN_URL = /-(\d+)\.html/;

export class CatalogueUrls {
	readonly baseUrl: string;

	constructor(baseUrl: string) {
		this.baseUrl = baseUrl.replace(/\/+$/, "");
	}

	absolute(href: string): string {
		return new URL(href, `${this.baseUrl}/`).toString();
	}

	login(): string {
		return `${this.baseUrl}${LOGIN_PATH}`;
	}

	search(query: string): string {
		return `${this.baseUrl}/list/tracks?searchFilter=${encodeURIComponent(query)}&availableFilter=1`;
	}

	favorites(page: number): string {
		return `${this.baseUrl}/account/favorites?page=${page}`;
	}

	toggleFavorite(remoteId: string): string {
		return `${this.baseUrl}/tracks/favor/${remoteId}`;
	}

	download(remoteId: string, format: string): string {
		return `${this.baseUrl}/download/${remoteId}/${format}`;
	}
}

export function isLoginUrl(url: string): boolean {
	return new URL(url).pathname.startsWith(LOGIN_PATH);
}

export function isPremiumUrl(url: string): boolean {
	return new URL(url).pathname.startsWith(PREMIUM_PATH);
}

export function remoteIdFromUrl(url: string): string | undefined {
	return TRACK_ID_IN_URL.exec(url)?.[1];
}

export interface ButtonAttributes {
	className?: string | null;
	ariaPressed?: string | null;
	dataFavorited?: string | null;
	dataActive?: string | null;
}

/** A favorite control that already shows the favorited state. Clicking it would undo the favorite. */
export function isFavoritedMarkup(attrs: ButtonAttributes): boolean {
	const classes = (attrs.className ?? "").toLowerCase().split(/\s+/);
	if (classes.some((c) => FAVORITED_CLASSES.some((marker) => c === marker || c.endsWith(`-${marker}`) || c.startsWith(`${marker}-`)))) {
		return true;
	}
	if ((attrs.ariaPressed ?? "").toLowerCase() === "true") {
		return true;
	}
	const flag = (attrs.dataFavorited || attrs.dataActive || "").toLowerCase();
	return flag === "true" || flag === "1";
}

function cleanText(str: string | undefined | null): string {
	return (str ?? "").replace(/\s+/g, " ").trim();
}

export function parseSearchResults(html: string, urls: CatalogueUrls): SearchCandidate[] {
	const $ = cheerio.load(html);
	const seen = new Set<string>();
	const results: SearchCandidate[] = [];

	$(TRACK_LINK_SELECTOR).each((_, el) => {
		const href = $(el).attr("href");
		const title = cleanText($(el).text());
		if (!href || !title) return;
		const url = urls.absolute(href);
		if (seen.has(url)) return;
		seen.add(url);
		const remoteId = $(el).closest("[data-track-id]").attr("data-track-id") ?? remoteIdFromUrl(url);
		results.push(remoteId ? { url, title, remoteId } : { url, title });
	});
	return results;
}

export interface ParsedTrackPage {
	title?: string;
	remoteId?: string;
	favorited: boolean;
	hasFavoriteControl: boolean;
}

export function parseTrackPage(html: string, url: string): ParsedTrackPage {
	const $ = cheerio.load(html);
	const heading = cleanText($("h1").first().text());

	for (const selector of FAVORITE_BUTTON_SELECTORS) {
		const button = $(selector).first();
		if (!button.length) continue;
		return {
			title: heading || undefined,
			remoteId: button.attr("data-track-id") ?? remoteIdFromUrl(url),
			favorited: isFavoritedMarkup({
				className: button.attr("class"),
				ariaPressed: button.attr("aria-pressed"),
				dataFavorited: button.attr("data-favorited"),
				dataActive: button.attr("data-active"),
			}),
			hasFavoriteControl: true,
		};
	}

	return {
		title: heading || undefined,
		remoteId: $("[data-track-id]").first().attr("data-track-id") ?? remoteIdFromUrl(url),
		favorited: false,
		hasFavoriteControl: false,
	};
}

/**
 * Turn a listed "Artist - Title (Mix)" into the key the rest of the engine uses
 */
export function listingKey(title: string): string {
	const { artist, title: rest } = splitKey(title);
	return trackKey(artist, rest);
}

export function parseFavoritesPage(html: string, page: number, urls: CatalogueUrls): FavoritesPage {
	const $ = cheerio.load(html);
	const entries: FavoriteListing[] = [];
	const seen = new Set<string>();

	$("[data-track-id]").each((_, el) => {
		const item = $(el);
		const link = item.is("a") ? item : item.find(TRACK_LINK_SELECTOR).first();
		const href = link.attr("href");
		const title = cleanText(link.text());
		if (!href || !title) return;
		const key = listingKey(title);
		if (seen.has(key)) return;
		seen.add(key);
		entries.push({
			key,
			url: urls.absolute(href),
			title,
			remoteId: item.attr("data-track-id") ?? remoteIdFromUrl(href),
		});
	});

	const nextPage = `page=${page + 1}`;
	const hasNext =
		$('a[rel="next"]').length > 0 ||
		$("a[href]")
			.toArray()
			.some((a) => ($(a).attr("href") ?? "").includes(nextPage));

	return { entries, hasNext };
}

/**
 * Browser backend: drives an installed Chrome through playwright-core with a
 * persistent profile. Slower than the request backend but works without a
 * known remote id and follows the site's own scripts.
 */

import { chromium, type BrowserContext, type Page } from "playwright-core";
import { PremiumRequiredError, SessionExpiredError, TransientBackendError, errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import {
	CatalogueUrls,
	FAVORITE_BUTTON_SELECTORS,
	isFavoritedMarkup,
	isLoginUrl,
	isPremiumUrl,
	parseFavoritesPage,
	parseSearchResults,
	parseTrackPage,
} from "./catalogue.js";
import { readSavedCookies, writeSavedCookies, type SavedCookie } from "./session.js";
import type { FavoriteTarget, FavoritesPage, RemoteBackend, SearchCandidate, TrackPage } from "./types.js";

const log = createLogger("browser-backend");

const NAVIGATION_TIMEOUT = 60_000;
const CLICK_SETTLE_MS = 1_500;
const LOGIN_WAIT_MS = 5 * 60_000;

export interface BrowserOptions {
	profileDir: string;
	cookiesPath: string;
	headed: boolean;
	/** Chrome channel to drive; playwright-core ships no browser of its own */
	channel?: string;
}

type SameSite = "Strict" | "Lax" | "None";

function sameSiteOf(value: string | undefined): SameSite | undefined {
	switch ((value ?? "").toLowerCase()) {
		case "strict":
			return "Strict";
		case "lax":
			return "Lax";
		case "none":
			return "None";
		default:
			return undefined;
	}
}

async function launch(options: BrowserOptions): Promise<BrowserContext> {
	try {
		return await chromium.launchPersistentContext(options.profileDir, {
			headless: !options.headed,
			channel: options.channel ?? "chrome",
			viewport: { width: 1440, height: 900 },
			locale: "en-US",
		});
	} catch (error) {
		throw new TransientBackendError(`Could not launch the browser: ${errorMessage(error)}`, { cause: error });
	}
}

async function restoreCookies(context: BrowserContext, cookies: readonly SavedCookie[], baseUrl: string): Promise<void> {
	const host = new URL(baseUrl).hostname;
	const prepared = cookies.map((c) => {
		const expires = c.expiry ?? c.expires;
		const sameSite = sameSiteOf(c.sameSite);
		return {
			name: c.name,
			value: c.value,
			domain: c.domain ?? host,
			path: c.path ?? "/",
			...(expires !== undefined && expires > 0 ? { expires } : {}),
			...(c.httpOnly !== undefined ? { httpOnly: c.httpOnly } : {}),
			...(c.secure !== undefined ? { secure: c.secure } : {}),
			...(sameSite ? { sameSite } : {}),
		};
	});
	if (prepared.length > 0) {
		await context.addCookies(prepared);
	}
}

async function saveContextCookies(context: BrowserContext, cookiesPath: string, baseUrl: string): Promise<number> {
	const cookies = await context.cookies(baseUrl);
	await writeSavedCookies(
		cookiesPath,
		cookies.map((c) => ({
			name: c.name,
			value: c.value,
			domain: c.domain,
			path: c.path,
			expires: c.expires,
			httpOnly: c.httpOnly,
			secure: c.secure,
			sameSite: c.sameSite,
		}))
	);
	return cookies.length;
}

export class BrowserBackend implements RemoteBackend {
	readonly kind = "browser" as const;
	private readonly context: BrowserContext;
	private readonly page: Page;
	private readonly urls: CatalogueUrls;

	private constructor(context: BrowserContext, page: Page, urls: CatalogueUrls) {
		this.context = context;
		this.page = page;
		this.urls = urls;
	}

	static async open(options: BrowserOptions, urls: CatalogueUrls): Promise<BrowserBackend> {
		const context = await launch(options);
		try {
			await restoreCookies(context, readSavedCookies(options.cookiesPath), urls.baseUrl);
			const page = context.pages()[0] ?? (await context.newPage());
			page.setDefaultNavigationTimeout(NAVIGATION_TIMEOUT);
			log.info({ headed: options.headed, profile: options.profileDir }, "browser ready");
			return new BrowserBackend(context, page, urls);
		} catch (error) {
			await context.close();
			throw error;
		}
	}

	async search(query: string): Promise<SearchCandidate[]> {
		const html = await this.visit(this.urls.search(query));
		return parseSearchResults(html, this.urls);
	}

	async openTrack(url: string): Promise<TrackPage> {
		const html = await this.visit(url);
		const parsed = parseTrackPage(html, this.page.url());
		if (!parsed.hasFavoriteControl) {
			throw new TransientBackendError(`No favorite control on ${this.page.url()}`);
		}
		return { url: this.page.url(), title: parsed.title, remoteId: parsed.remoteId, favorited: parsed.favorited };
	}

	async readFavoriteState(target: FavoriteTarget): Promise<boolean> {
		return (await this.openTrack(target.url)).favorited;
	}

	async toggleFavorite(target: FavoriteTarget): Promise<boolean> {
		if (this.page.url() !== target.url) {
			await this.visit(target.url);
		}
		const button = this.page.locator(FAVORITE_BUTTON_SELECTORS.join(", ")).first();
		try {
			await button.click({ timeout: 15_000 });
			await this.page.waitForTimeout(CLICK_SETTLE_MS);
		} catch (error) {
			throw new TransientBackendError(`Could not click favorite on ${target.url}: ${errorMessage(error)}`, {
				cause: error,
			});
		}
		this.checkLanding(this.page.url());

		const attrs = await button.evaluate((el) => ({
			className: el.getAttribute("class"),
			ariaPressed: el.getAttribute("aria-pressed"),
			dataFavorited: el.getAttribute("data-favorited"),
			dataActive: el.getAttribute("data-active"),
		}));
		return isFavoritedMarkup(attrs);
	}

	async readFavoritesPage(page: number): Promise<FavoritesPage> {
		const html = await this.visit(this.urls.favorites(page));
		return parseFavoritesPage(html, page, this.urls);
	}

	async detectSessionExpiry(): Promise<boolean> {
		try {
			await this.visit(this.urls.favorites(1));
			return false;
		} catch (error) {
			if (error instanceof SessionExpiredError) return true;
			throw error;
		}
	}

	async resolveDownload(target: FavoriteTarget): Promise<string> {
		throw new Error(`Download links are resolved over HTTP only (${target.key})`);
	}

	async close(): Promise<void> {
		await this.context.close();
	}

	private async visit(url: string): Promise<string> {
		try {
			await this.page.goto(url, { waitUntil: "domcontentloaded" });
		} catch (error) {
			throw new TransientBackendError(`Navigation to ${url} failed: ${errorMessage(error)}`, { cause: error });
		}
		this.checkLanding(this.page.url());
		return this.page.content();
	}

	private checkLanding(url: string): void {
		if (isLoginUrl(url)) {
			throw new SessionExpiredError();
		}
		if (isPremiumUrl(url)) {
			throw new PremiumRequiredError();
		}
	}
}

/**
 * Open a headed browser on the login page, wait for the user to sign in and
 * store the resulting cookies for both backends.
 */
export async function captureSession(options: BrowserOptions, urls: CatalogueUrls): Promise<number> {
	const context = await launch({ ...options, headed: true });
	try {
		const page = context.pages()[0] ?? (await context.newPage());
		await page.goto(urls.login(), { waitUntil: "domcontentloaded", timeout: NAVIGATION_TIMEOUT });
		log.info("waiting for login in the browser window");
		await page.waitForURL((url) => !isLoginUrl(url.toString()), { timeout: LOGIN_WAIT_MS });
		const saved = await saveContextCookies(context, options.cookiesPath, urls.baseUrl);
		log.info({ cookies: saved }, "session captured");
		return saved;
	} finally {
		await context.close();
	}
}

/**
 * Saved remote session: a JSON array of browser cookies, shared by the
 * request client (tough-cookie jar) and the browser driver.
 */

import { Cookie, CookieJar } from "tough-cookie";
import { z } from "zod";
import { readJsonFile, writeJsonAtomic } from "../utils/fs.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("session");

export const savedCookieSchema = z.object({
	name: z.string().min(1),
	value: z.string().default(""),
	domain: z.string().optional(),
	path: z.string().optional(),
	secure: z.boolean().optional(),
	httpOnly: z.boolean().optional(),
	/** seconds since epoch; browser drivers write either name, -1 for session cookies */
	expiry: z.number().optional(),
	expires: z.number().optional(),
	sameSite: z.string().optional(),
});

export type SavedCookie = z.infer<typeof savedCookieSchema>;

export function readSavedCookies(cookiesPath: string): SavedCookie[] {
	const read = readJsonFile(cookiesPath);
	if (read.kind === "missing") {
		return [];
	}
	if (read.kind === "corrupt") {
		log.warn({ err: read.error, path: cookiesPath }, "cookies file unreadable");
		return [];
	}
	const parsed = z.array(z.unknown()).safeParse(read.data);
	if (!parsed.success) {
		log.warn({ path: cookiesPath }, "cookies file is not a list");
		return [];
	}
	return parsed.data.flatMap((raw) => {
		const cookie = savedCookieSchema.safeParse(raw);
		return cookie.success ? [cookie.data] : [];
	});
}

export async function writeSavedCookies(cookiesPath: string, cookies: readonly SavedCookie[]): Promise<void> {
	await writeJsonAtomic(cookiesPath, cookies);
	log.info({ path: cookiesPath, count: cookies.length }, "session cookies saved");
}

function expiryOf(cookie: SavedCookie): Date | "Infinity" {
	const seconds = cookie.expiry ?? cookie.expires;
	return seconds !== undefined && seconds > 0 ? new Date(seconds * 1000) : "Infinity";
}

/**
 * Build a cookie jar for the catalogue from the saved cookies
 */
export async function loadCookieJar(cookiesPath: string, baseUrl: string): Promise<{ jar: CookieJar; loaded: number }> {
	const jar = new CookieJar();
	const host = new URL(baseUrl).hostname;
	let loaded = 0;

	for (const saved of readSavedCookies(cookiesPath)) {
		const cookie = new Cookie({
			key: saved.name,
			value: saved.value,
			domain: saved.domain ?? host,
			path: saved.path ?? "/",
			secure: saved.secure ?? false,
			httpOnly: saved.httpOnly ?? false,
			expires: expiryOf(saved),
		});
		try {
			await jar.setCookie(cookie.toString(), baseUrl);
			loaded++;
		} catch (error) {
			log.warn({ err: error, cookie: saved.name, domain: saved.domain }, "skipping cookie for another domain");
		}
	}

	return { jar, loaded };
}

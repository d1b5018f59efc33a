/**
 * Track identity: one key per (artist, title), plus the fuzzy tiers used to
 * correlate keys that come from different sources.
 */

import path from "path";

export type TrackKey = string;

export type LookupTier = "exact" | "lower" | "normalized" | "deep";

export const LOOKUP_TIERS: readonly LookupTier[] = ["exact", "lower", "normalized", "deep"];

const KEY_SEPARATOR = " - ";

export function trackKey(artist: string, title: string): TrackKey {
	return `${artist.trim()}${KEY_SEPARATOR}${title.trim()}`;
}

export function splitKey(key: TrackKey): { artist: string; title: string } {
	const idx = key.indexOf(KEY_SEPARATOR);
	if (idx === -1) {
		return { artist: "", title: key.trim() };
	}
	return {
		artist: key.slice(0, idx).trim(),
		title: key.slice(idx + KEY_SEPARATOR.length).trim(),
	};
}

/**
 * Drop everything from the first " (" on, e.g. "(Radio Edit)" or "(feat. X)"
 */
export function stripQualifiers(key: string): string {
	const trimmed = key.trim();
	const idx = trimmed.indexOf(" (");
	if (idx === -1) {
		return trimmed;
	}
	return trimmed.slice(0, idx).trim() || key;
}

export function normalizedKey(key: string): string {
	return stripQualifiers(key).toLowerCase();
}

/**
 * Order-independent artist form: "B & A - T" and "A, B - T" collapse to "a, b - t"
 */
export function deepKey(key: string): string {
	const s = normalizedKey(key).replaceAll(" & ", ", ");
	const idx = s.indexOf(KEY_SEPARATOR);
	if (idx === -1) {
		return s;
	}
	const artists = s
		.slice(0, idx)
		.split(", ")
		.map((a) => a.trim())
		.filter((a) => a.length > 0)
		.sort();
	return `${artists.join(", ")}${KEY_SEPARATOR}${s.slice(idx + KEY_SEPARATOR.length)}`;
}

export function tierForm(key: string, tier: LookupTier): string {
	switch (tier) {
		case "exact":
			return key;
		case "lower":
			return key.toLowerCase();
		case "normalized":
			return normalizedKey(key);
		case "deep":
			return deepKey(key);
	}
}

export interface IndexEntry<T> {
	key: TrackKey;
	value: T;
}

export interface LookupHit<T> extends IndexEntry<T> {
	tier: LookupTier;
}

/** Picks the record to keep when two records share a tier form. */
export type ChooseFn<T> = (existing: IndexEntry<T>, incoming: IndexEntry<T>) => IndexEntry<T>;

export type KeyIndex<T> = Record<LookupTier, Map<string, IndexEntry<T>>>;

const keepFirst = <T>(existing: IndexEntry<T>): IndexEntry<T> => existing;

export function buildIndex<T>(entries: Iterable<IndexEntry<T>>, choose: ChooseFn<T> = keepFirst): KeyIndex<T> {
	const index: KeyIndex<T> = {
		exact: new Map(),
		lower: new Map(),
		normalized: new Map(),
		deep: new Map(),
	};
	for (const entry of entries) {
		for (const tier of LOOKUP_TIERS) {
			const form = tierForm(entry.key, tier);
			const existing = index[tier].get(form);
			index[tier].set(form, existing ? choose(existing, entry) : entry);
		}
	}
	return index;
}

export function indexFromRecord<T>(record: Record<string, T>): KeyIndex<T> {
	return buildIndex(Object.entries(record).map(([key, value]) => ({ key, value })));
}

/**
 * Look a key up tier by tier (exact, lower, normalized, deep) and return the
 * first hit. Results of different tiers are never combined.
 */
export function lookup<T>(
	index: KeyIndex<T>,
	key: string,
	options: { maxTier?: LookupTier } = {}
): LookupHit<T> | undefined {
	const last = LOOKUP_TIERS.indexOf(options.maxTier ?? "deep");
	for (let i = 0; i <= last; i++) {
		const tier = LOOKUP_TIERS[i];
		const hit = index[tier].get(tierForm(key, tier));
		if (hit) {
			return { ...hit, tier };
		}
	}
	return undefined;
}

const FILENAME_SEPARATORS = [" - ", " – ", " — ", " _ ", "_-_"];

/**
 * Parse "Artist - Title.ext" when a file has no usable tags
 */
export function parseArtistTitleFromFilename(filename: string): { artist: string; title: string } {
	const name = path.parse(filename).name;
	for (const sep of FILENAME_SEPARATORS) {
		const idx = name.indexOf(sep);
		if (idx !== -1) {
			return { artist: name.slice(0, idx).trim(), title: name.slice(idx + sep.length).trim() };
		}
	}
	const dash = name.indexOf("-");
	if (dash !== -1) {
		const artist = name.slice(0, dash).trim();
		const title = name.slice(dash + 1).trim();
		if (artist && title) {
			return { artist, title };
		}
	}
	return { artist: "", title: name };
}

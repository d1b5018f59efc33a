/**
 * Result scoring for catalogue searches
 */

import { splitKey, stripQualifiers } from "../identity/track-key.js";
import type { SearchCandidate } from "./types.js";

export const MIN_MATCH_SCORE = 0.3;
export const EXTENDED_BONUS = 0.05;
export const CANDIDATES_PER_QUERY = 15;

const EDGE_PUNCTUATION = /^[.,;:&()]+|[.,;:&()]+$/g;

function normalizeWord(word: string): string {
	return word.trim().replace(EDGE_PUNCTUATION, "").trim();
}

function words(s: string): Set<string> {
	return new Set(s.split(/\s+/).map(normalizeWord).filter((w) => w.length > 0));
}

/**
 * Word-overlap similarity in [0, 1]. Containment of one string in the other
 * blends in the length ratio, capped below an exact match.
 */
export function similarity(a: string, b: string): number {
	if (!a || !b) return 0;
	const s1 = a.toLowerCase().trim();
	const s2 = b.toLowerCase().trim();
	if (s1 === s2) return 1;

	const w1 = words(s1);
	const w2 = words(s2);
	if (w1.size === 0 || w2.size === 0) return 0;

	let overlap = 0;
	for (const w of w1) {
		if (w2.has(w)) overlap++;
	}
	const union = w1.size + w2.size - overlap;
	const jaccard = union ? overlap / union : 0;

	if (s1.includes(s2) || s2.includes(s1)) {
		const lengthRatio = Math.min(s1.length, s2.length) / Math.max(s1.length, s2.length);
		return Math.min(0.85, jaccard * 0.5 + lengthRatio * 0.5);
	}
	return jaccard;
}

/**
 * Score a listed "Artist - Title (Mix)" against the wanted artist and title.
 * Listings without an artist part are compared as a whole.
 */
export function scoreCandidate(listed: string, artist: string, title: string): number {
	const parts = splitKey(listed);
	const listedArtist = parts.artist || listed;
	const listedTitle = parts.artist ? stripQualifiers(parts.title) : listed;

	const artistScore = artist ? similarity(artist, listedArtist) : 0.5;
	const titleScore = title ? similarity(stripQualifiers(title), listedTitle) : 0.5;
	const bonus = /extended/i.test(listed) ? EXTENDED_BONUS : 0;
	return artistScore * 0.4 + titleScore * 0.6 + bonus;
}

export function searchQueries(artist: string, title: string): string[] {
	const a = artist.trim();
	const t = title.trim();
	if (a && t) return [`${a} ${t}`, `${t} ${a}`, a, t];
	if (a) return [a];
	if (t) return [t];
	return [];
}

export interface ScoredCandidate extends SearchCandidate {
	score: number;
}

/**
 * Highest scoring candidate at or above the threshold; ties keep the earlier one
 */
export function pickBest(
	candidates: readonly SearchCandidate[],
	artist: string,
	title: string
): ScoredCandidate | undefined {
	let best: ScoredCandidate | undefined;
	for (const candidate of candidates.slice(0, CANDIDATES_PER_QUERY)) {
		const text = candidate.title.trim();
		if (text.length < 3) continue;
		const score = scoreCandidate(text, artist, title);
		if (score >= MIN_MATCH_SCORE && (!best || score > best.score)) {
			best = { ...candidate, score };
		}
	}
	return best;
}

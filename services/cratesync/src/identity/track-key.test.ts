import { describe, test, expect } from "vitest";
import {
	buildIndex,
	deepKey,
	indexFromRecord,
	lookup,
	normalizedKey,
	parseArtistTitleFromFilename,
	splitKey,
	stripQualifiers,
	trackKey,
} from "./track-key.js";

describe("Track Key", () => {
	test("trackKey joins trimmed artist and title", () => {
		expect(trackKey("  Artist ", " Song ")).toBe("Artist - Song");
	});

	test("splitKey splits on the first separator only", () => {
		expect(splitKey("A - B - C")).toEqual({ artist: "A", title: "B - C" });
		expect(splitKey("Untitled")).toEqual({ artist: "", title: "Untitled" });
	});

	test("stripQualifiers cuts from the first parenthesis", () => {
		expect(stripQualifiers("Artist - Song (Radio Edit)")).toBe("Artist - Song");
		expect(stripQualifiers("Artist - Song (feat. X) (Extended Mix)")).toBe("Artist - Song");
		expect(stripQualifiers("Artist - Song")).toBe("Artist - Song");
	});

	test("normalizedKey lowercases the stripped key", () => {
		expect(normalizedKey("Artist - Song (Original Mix)")).toBe("artist - song");
	});

	test("deepKey ignores artist order and ampersands", () => {
		expect(deepKey("Dox & DvirNuns - Track")).toBe("dox, dvirnuns - track");
		expect(deepKey("DvirNuns, Dox - Track (Extended)")).toBe("dox, dvirnuns - track");
	});

	test("parseArtistTitleFromFilename handles common separators", () => {
		expect(parseArtistTitleFromFilename("CamelPhat - Cycles.aiff")).toEqual({ artist: "CamelPhat", title: "Cycles" });
		expect(parseArtistTitleFromFilename("Artist – Title.mp3")).toEqual({ artist: "Artist", title: "Title" });
		expect(parseArtistTitleFromFilename("Artist-Title.wav")).toEqual({ artist: "Artist", title: "Title" });
		expect(parseArtistTitleFromFilename("JustATitle.mp3")).toEqual({ artist: "", title: "JustATitle" });
	});
});

describe("lookup", () => {
	test("tries tiers in order and reports the tier that matched", () => {
		const index = indexFromRecord({ "Artist - Song": 1 });
		expect(lookup(index, "Artist - Song")?.tier).toBe("exact");
		expect(lookup(index, "ARTIST - SONG")?.tier).toBe("lower");
		expect(lookup(index, "artist - song (Radio Edit)")?.tier).toBe("normalized");
	});

	test("finds a key stored only in its normalized form", () => {
		const index = indexFromRecord({ "artist - song": "u1" });
		const hit = lookup(index, "Artist - Song (Extended Mix)");
		expect(hit).toEqual({ key: "artist - song", value: "u1", tier: "normalized" });
	});

	test("an exact match wins over a different track on the deep tier", () => {
		const index = indexFromRecord({
			"B, A - Song": "deep-candidate",
			"A & B - Song": "exact-candidate",
		});
		const hit = lookup(index, "A & B - Song");
		expect(hit?.value).toBe("exact-candidate");
		expect(hit?.tier).toBe("exact");
	});

	test("deep tier matches reordered artists", () => {
		const index = indexFromRecord({ "Dox, DvirNuns - Track": "u" });
		expect(lookup(index, "DvirNuns & Dox - Track")).toEqual({ key: "Dox, DvirNuns - Track", value: "u", tier: "deep" });
	});

	test("maxTier stops before looser tiers", () => {
		const index = indexFromRecord({ "Artist - Song": true });
		expect(lookup(index, "artist - song", { maxTier: "lower" })?.tier).toBe("lower");
		expect(lookup(index, "Artist - Song (Edit)", { maxTier: "lower" })).toBeUndefined();
	});

	test("returns undefined when nothing matches", () => {
		expect(lookup(indexFromRecord({ "A - B": 1 }), "C - D")).toBeUndefined();
	});

	test("choose decides collisions within a tier", () => {
		const index = buildIndex(
			[
				{ key: "Artist - Song", value: { at: "2024-01-01" } },
				{ key: "artist - song", value: { at: "2024-06-01" } },
			],
			(existing, incoming) => (incoming.value.at > existing.value.at ? incoming : existing)
		);
		expect(lookup(index, "ARTIST - SONG")?.value.at).toBe("2024-06-01");
		expect(lookup(index, "Artist - Song")?.value.at).toBe("2024-01-01");
	});
});

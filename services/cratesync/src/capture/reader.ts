/**
 * Capture list: the tracks the user identified and wants locally.
 * Stored as { tracks: [{ artist, title, capturedAt? }], updatedAt }.
 */

import { z } from "zod";
import { readJsonFile, writeJsonAtomic } from "../utils/fs.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("capture");

export const captureEntrySchema = z.object({
	artist: z.string(),
	title: z.string(),
	capturedAt: z.string().optional(),
});

const captureFileSchema = z.object({
	tracks: z.array(captureEntrySchema).default([]),
	updatedAt: z.string().optional(),
});

export type CaptureEntry = z.infer<typeof captureEntrySchema>;

export interface CaptureReader {
	read(): Promise<CaptureEntry[]>;
}

export interface CaptureStore extends CaptureReader {
	import(incoming: readonly CaptureEntry[]): Promise<{ total: number; added: number }>;
}

function identity(entry: CaptureEntry): string {
	return `${entry.artist.trim().toLowerCase()}\u0000${entry.title.trim().toLowerCase()}`;
}

/**
 * Merge incoming captures into existing ones. Duplicates (case-insensitive
 * artist + title) take the incoming entry; incoming order comes first.
 */
export function mergeCaptures(
	existing: readonly CaptureEntry[],
	incoming: readonly CaptureEntry[]
): { merged: CaptureEntry[]; added: number } {
	const byId = new Map<string, CaptureEntry>();
	for (const entry of existing) byId.set(identity(entry), entry);

	let added = 0;
	for (const entry of incoming) {
		const id = identity(entry);
		if (!byId.has(id)) added++;
		byId.set(id, entry);
	}

	const merged: CaptureEntry[] = [];
	const seen = new Set<string>();
	for (const entry of [...incoming, ...existing]) {
		const id = identity(entry);
		if (seen.has(id)) continue;
		seen.add(id);
		const chosen = byId.get(id);
		if (chosen) merged.push(chosen);
	}
	return { merged, added };
}

export class JsonCaptureReader implements CaptureStore {
	readonly filePath: string;

	constructor(filePath: string) {
		this.filePath = filePath;
	}

	async read(): Promise<CaptureEntry[]> {
		const read = readJsonFile(this.filePath);
		if (read.kind === "missing") {
			return [];
		}
		if (read.kind === "corrupt") {
			log.warn({ err: read.error, path: this.filePath }, "capture list unreadable");
			return [];
		}
		const parsed = captureFileSchema.safeParse(read.data);
		if (!parsed.success) {
			log.warn({ path: this.filePath, issues: parsed.error.issues.length }, "capture list has an unexpected shape");
			return [];
		}
		return parsed.data.tracks;
	}

	async import(incoming: readonly CaptureEntry[]): Promise<{ total: number; added: number }> {
		const existing = await this.read();
		const { merged, added } = mergeCaptures(existing, incoming);
		await writeJsonAtomic(this.filePath, { tracks: merged, updatedAt: new Date().toISOString() });
		log.info({ added, total: merged.length }, "capture list updated");
		return { total: merged.length, added };
	}
}

import fs from "fs";
import path from "path";
import { parseFile } from "music-metadata";
import { parseArtistTitleFromFilename } from "../identity/track-key.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { LocalTrack, ScanOptions, ScanResult } from "./types.js";

const log = createLogger("scanner");

export const AUDIO_EXTENSIONS = [".mp3", ".flac", ".m4a", ".aac", ".ogg", ".wav", ".aiff", ".aif"] as const;

export interface LibraryScanner {
	scan(folders: readonly string[], options?: ScanOptions): Promise<ScanResult>;
}

/**
 * Read artist and title from the file's tags, or from its name when the tags
 * are missing or unreadable
 */
export async function readTrackIdentity(filePath: string): Promise<{ artist: string; title: string }> {
	let artist = "";
	let title = "";
	try {
		const { common } = await parseFile(filePath, { skipCovers: true, duration: false });
		artist = common.artist?.trim() ?? "";
		title = common.title?.trim() ?? "";
	} catch (error) {
		log.debug({ file: filePath, error: errorMessage(error) }, "unreadable tags, using the file name");
	}

	if (artist && title) {
		return { artist, title };
	}
	const parsed = parseArtistTitleFromFilename(path.basename(filePath));
	return { artist: artist || parsed.artist, title: title || parsed.title };
}

async function walk(
	dir: string,
	extensions: ReadonlySet<string>,
	files: string[],
	errors: ScanResult["errors"]
): Promise<void> {
	let entries: fs.Dirent[];
	try {
		entries = await fs.promises.readdir(dir, { withFileTypes: true });
	} catch (error) {
		log.warn({ dir, error: errorMessage(error) }, "skipping unreadable folder");
		errors.push({ path: dir, error: errorMessage(error) });
		return;
	}

	for (const entry of entries) {
		const fullPath = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			await walk(fullPath, extensions, files, errors);
		} else if (entry.isFile() && extensions.has(path.extname(entry.name).toLowerCase())) {
			files.push(fullPath);
		}
	}
}

/**
 * Scan destination folders recursively for audio files
 */
export async function scanFolders(folders: readonly string[], options: ScanOptions = {}): Promise<ScanResult> {
	const wanted: readonly string[] = options.extensions ?? AUDIO_EXTENSIONS;
	const extensions = new Set(wanted.map((e) => e.toLowerCase()));
	const files: string[] = [];
	const errors: ScanResult["errors"] = [];

	for (const folder of folders) {
		await walk(folder, extensions, files, errors);
	}

	const tracks: LocalTrack[] = [];
	for (const [index, filepath] of files.entries()) {
		try {
			const stat = await fs.promises.stat(filepath);
			const { artist, title } = await readTrackIdentity(filepath);
			tracks.push({ artist, title, filepath, scannedAt: stat.mtime.toISOString() });
		} catch (error) {
			errors.push({ path: filepath, error: errorMessage(error) });
		}
		options.onProgress?.(index + 1);
	}

	log.info({ folders: folders.length, files: files.length, errors: errors.length }, "scan finished");
	return { tracks, errors };
}

export const folderScanner: LibraryScanner = { scan: scanFolders };

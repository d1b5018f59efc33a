export interface LocalTrack {
	artist: string;
	title: string;
	filepath: string;
	scannedAt: string; // ISO timestamp (file mtime)
}

export interface ScanOptions {
	extensions?: readonly string[];
	onProgress?: (filesSeen: number) => void;
}

export interface ScanResult {
	tracks: LocalTrack[];
	errors: Array<{ path: string; error: string }>;
}

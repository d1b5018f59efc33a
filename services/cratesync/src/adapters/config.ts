/**
 * Configuration Adapter for the sync engine
 *
 * Derives the engine's settings from the shared server config.
 */

import { config } from "../../../../src/config/index.js";

export interface EngineConfig {
	statePath: string;
	settingsPath: string;
	capturePath: string;
	cookiesPath: string;
	browserProfileDir: string;
	remoteBaseUrl: string;
	remoteTimeoutMs: number;
	musicRootPath: string;
	logLevel: string;
}

export function getEngineConfig(): EngineConfig {
	return {
		statePath: config.storage.statePath,
		settingsPath: config.storage.settingsPath,
		capturePath: config.storage.capturePath,
		cookiesPath: config.storage.cookiesPath,
		browserProfileDir: config.storage.browserProfileDir,
		remoteBaseUrl: config.remote.baseUrl,
		remoteTimeoutMs: config.remote.timeoutMs,
		musicRootPath: config.music.rootPath,
		logLevel: config.logging.level,
	};
}

export { config };

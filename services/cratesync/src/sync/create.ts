import { getEngineConfig, type EngineConfig } from "../adapters/config.js";
import { JsonCaptureReader } from "../capture/reader.js";
import { folderScanner } from "../library/scanner.js";
import { liveOrchestratorFactory } from "../remote/factory.js";
import { StateStore } from "../state/store.js";
import { SyncService } from "./service.js";

/**
 * Service wired to the files and the live catalogue named by the config
 */
export function createSyncService(env: EngineConfig = getEngineConfig()): SyncService {
	const store = new StateStore(env.statePath);
	store.load();

	return new SyncService({
		store,
		scanner: folderScanner,
		orchestrators: liveOrchestratorFactory(env),
		captureStore: (settings) => new JsonCaptureReader(settings.captureListPath),
		settingsPath: env.settingsPath,
	});
}

import type { EngineConfig } from "../adapters/config.js";
import type { Settings } from "../settings.js";
import { BrowserBackend } from "./browser-backend.js";
import { CatalogueUrls } from "./catalogue.js";
import { RequestBackend, createGotClient } from "./http-backend.js";
import { RemoteOrchestrator } from "./orchestrator.js";
import { loadCookieJar } from "./session.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("remote");

export type OrchestratorFactory = (settings: Settings) => RemoteOrchestrator;

/**
 * Orchestrator wired to the live catalogue. Both backends read the same
 * saved cookies; the browser also keeps its own profile.
 */
export function liveOrchestratorFactory(env: EngineConfig): OrchestratorFactory {
	const urls = new CatalogueUrls(env.remoteBaseUrl);

	return (settings) =>
		new RemoteOrchestrator({
			searchUseHttp: settings.searchUseHttp,
			request: async () => {
				const { jar, loaded } = await loadCookieJar(settings.cookiesPath, urls.baseUrl);
				if (loaded === 0) {
					log.warn({ path: settings.cookiesPath }, "no saved session cookies, requests will be anonymous");
				}
				return new RequestBackend(createGotClient(jar, env.remoteTimeoutMs), urls);
			},
			browser: () =>
				BrowserBackend.open(
					{ profileDir: settings.browserProfileDir, cookiesPath: settings.cookiesPath, headed: settings.headedMode },
					urls
				),
		});
}

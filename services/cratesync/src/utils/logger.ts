import pino, { type Logger } from "pino";
import { getEngineConfig } from "../adapters/config.js";

export const logger: Logger = pino({
	name: "cratesync",
	level: getEngineConfig().logLevel,
});

/**
 * Child logger tagged with the module it belongs to
 */
export function createLogger(module: string): Logger {
	return logger.child({ module });
}

export type { Logger };

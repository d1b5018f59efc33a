/**
 * User settings persisted next to the state file.
 * Values not stored fall back to the environment-derived engine config.
 */

import { z } from "zod";
import { getEngineConfig } from "./adapters/config.js";
import { readJsonFile, writeJsonAtomic } from "./utils/fs.js";
import { createLogger } from "./utils/logger.js";

const log = createLogger("settings");

export function settingsSchema() {
	const env = getEngineConfig();
	return z.object({
		destinationFolders: z.array(z.string().min(1)).default(env.musicRootPath ? [env.musicRootPath] : []),
		cookiesPath: z.string().min(1).default(env.cookiesPath),
		browserProfileDir: z.string().min(1).default(env.browserProfileDir),
		headedMode: z.boolean().default(true),
		searchUseHttp: z.boolean().default(true),
		captureListPath: z.string().min(1).default(env.capturePath),
	});
}

export type Settings = z.infer<ReturnType<typeof settingsSchema>>;

export const settingsUpdateSchema = z
	.object({
		destinationFolders: z.array(z.string().min(1)),
		cookiesPath: z.string().min(1),
		browserProfileDir: z.string().min(1),
		headedMode: z.boolean(),
		searchUseHttp: z.boolean(),
		captureListPath: z.string().min(1),
	})
	.partial()
	.strict();

export type SettingsUpdate = z.infer<typeof settingsUpdateSchema>;

export function loadSettings(settingsPath: string = getEngineConfig().settingsPath): Settings {
	const schema = settingsSchema();
	const read = readJsonFile(settingsPath);
	if (read.kind === "ok") {
		const parsed = schema.safeParse(read.data);
		if (parsed.success) {
			return parsed.data;
		}
		log.warn({ path: settingsPath, issues: parsed.error.issues.length }, "invalid settings, using defaults");
	} else if (read.kind === "corrupt") {
		log.warn({ err: read.error, path: settingsPath }, "settings file unreadable, using defaults");
	}
	return schema.parse({});
}

/**
 * Validate an update, merge it over the stored settings and persist the result
 */
export async function saveSettings(
	input: unknown,
	settingsPath: string = getEngineConfig().settingsPath
): Promise<Settings> {
	const update = settingsUpdateSchema.parse(input);
	const next = settingsSchema().parse({ ...loadSettings(settingsPath), ...update });
	await writeJsonAtomic(settingsPath, next);
	log.info({ path: settingsPath, fields: Object.keys(update) }, "settings saved");
	return next;
}

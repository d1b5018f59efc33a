import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { ZodError } from "zod";
import { getEngineConfig } from "./adapters/config.js";
import { loadSettings, saveSettings } from "./settings.js";

describe("settings", () => {
	let dir: string;
	let settingsPath: string;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "cratesync-settings-"));
		settingsPath = path.join(dir, "settings.json");
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	test("defaults come from the engine config", () => {
		const env = getEngineConfig();
		const settings = loadSettings(settingsPath);
		expect(settings.headedMode).toBe(true);
		expect(settings.searchUseHttp).toBe(true);
		expect(settings.cookiesPath).toBe(env.cookiesPath);
		expect(settings.captureListPath).toBe(env.capturePath);
	});

	test("saveSettings merges over what is stored", async () => {
		await saveSettings({ destinationFolders: ["/music/a"] }, settingsPath);
		const saved = await saveSettings({ headedMode: false }, settingsPath);

		expect(saved.destinationFolders).toEqual(["/music/a"]);
		expect(saved.headedMode).toBe(false);
		expect(loadSettings(settingsPath)).toEqual(saved);
	});

	test("unknown or mistyped fields are rejected and nothing is written", async () => {
		await expect(saveSettings({ headedMode: "yes" }, settingsPath)).rejects.toBeInstanceOf(ZodError);
		expect(fs.existsSync(settingsPath)).toBe(false);
	});

	test("a corrupt file falls back to defaults", () => {
		fs.writeFileSync(settingsPath, "{not json");
		expect(loadSettings(settingsPath).searchUseHttp).toBe(true);
	});
});

import fs from "fs";
import path from "path";

export type JsonReadResult =
	| { kind: "missing" }
	| { kind: "ok"; data: unknown }
	| { kind: "corrupt"; error: Error };

export function readJsonFile(filePath: string): JsonReadResult {
	let content: string;
	try {
		content = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return { kind: "missing" };
		}
		return { kind: "corrupt", error: error instanceof Error ? error : new Error(String(error)) };
	}

	try {
		return { kind: "ok", data: JSON.parse(content) };
	} catch (error) {
		return { kind: "corrupt", error: error instanceof Error ? error : new Error(String(error)) };
	}
}

/**
 * Write JSON through a temp file, fsync it and rename it over the target.
 * The target is either the old or the new content, never a partial write.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
	const json = JSON.stringify(data, null, 2);
	const tmpPath = `${filePath}.tmp.${process.pid}`;

	await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
	try {
		const handle = await fs.promises.open(tmpPath, "w");
		try {
			await handle.writeFile(json, "utf-8");
			await handle.sync();
		} finally {
			await handle.close();
		}
		await fs.promises.rename(tmpPath, filePath);
	} finally {
		await fs.promises.rm(tmpPath, { force: true });
	}
}

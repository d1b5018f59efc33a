/**
 * Persisted state store
 *
 * One JSON file holds every per-track fact plus the outcome and mutation logs.
 * Writes go through commit(), which serializes them on a single chain.
 */

import { CorruptStateError } from "../errors.js";
import { readJsonFile, writeJsonAtomic } from "../utils/fs.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { emptyState, mergeInto } from "./merge.js";
import { syncStateSchema } from "./schema.js";
import type { SaveResult, StatePatch, SyncState } from "./types.js";

export type PatchSource = StatePatch | ((state: SyncState) => StatePatch);

export class StateStore {
	readonly statePath: string;
	private readonly log: Logger;
	private current: SyncState | null = null;
	private chain: Promise<unknown> = Promise.resolve();

	constructor(statePath: string, log: Logger = createLogger("state")) {
		this.statePath = statePath;
		this.log = log;
	}

	/**
	 * Load state from disk. Missing or corrupt files yield an empty state.
	 */
	load(): SyncState {
		const read = readJsonFile(this.statePath);
		if (read.kind === "missing") {
			this.current = emptyState();
			return this.current;
		}

		if (read.kind === "ok") {
			const parsed = syncStateSchema.safeParse(read.data);
			if (parsed.success) {
				this.current = parsed.data;
				return this.current;
			}
			this.warnCorrupt(new CorruptStateError(this.statePath, { cause: parsed.error }));
		} else {
			this.warnCorrupt(new CorruptStateError(this.statePath, { cause: read.error }));
		}

		this.current = emptyState();
		return this.current;
	}

	async save(state: SyncState): Promise<SaveResult> {
		try {
			await writeJsonAtomic(this.statePath, state);
			return { ok: true };
		} catch (error) {
			const err = error instanceof Error ? error : new Error(String(error));
			this.log.error({ err, path: this.statePath }, "failed to save state");
			return { ok: false, error: err };
		}
	}

	/** Last loaded or committed state; loads on first use. */
	snapshot(): SyncState {
		return this.current ?? this.load();
	}

	/**
	 * Merge a patch into the current state and persist it. Commits run one at
	 * a time in call order; a failed save leaves the in-memory state as it was.
	 */
	commit(source: PatchSource): Promise<SyncState> {
		const run = async (): Promise<SyncState> => {
			const base = this.snapshot();
			const patch = typeof source === "function" ? source(base) : source;
			const next = mergeInto(base, patch);
			const result = await this.save(next);
			if (!result.ok) {
				throw result.error;
			}
			this.current = next;
			return next;
		};

		const pending = this.chain.then(run, run);
		this.chain = pending.catch(() => undefined);
		return pending;
	}

	private warnCorrupt(error: CorruptStateError): void {
		this.log.warn({ err: error, path: this.statePath }, "state file corrupt, starting from an empty state");
	}
}

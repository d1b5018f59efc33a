import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import pino from "pino";
import { JsonCaptureReader } from "../capture/reader.js";
import { BusyError, NotFoundError, SessionExpiredError } from "../errors.js";
import { JobController } from "../jobs/controller.js";
import type { LocalTrack } from "../library/types.js";
import { FakeCatalogue } from "../__fixtures__/fake-catalogue.js";
import { RemoteOrchestrator } from "../remote/orchestrator.js";
import { StateStore } from "../state/store.js";
import { SyncService } from "./service.js";

const WANTED = "Artist One - Song A";
const LOCAL = "Artist Two - Song B";

describe("SyncService", () => {
	let dir: string;
	let catalogue: FakeCatalogue;
	let localTracks: LocalTrack[];
	let store: StateStore;
	let service: SyncService;
	let tick: number;

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "cratesync-service-"));
		const capturePath = path.join(dir, "captures.json");
		fs.writeFileSync(
			capturePath,
			JSON.stringify({
				tracks: [
					{ artist: "Artist One", title: "Song A" },
					{ artist: "Artist Two", title: "Song B" },
				],
			})
		);

		catalogue = new FakeCatalogue();
		localTracks = [
			{
				artist: "Artist Two",
				title: "Song B",
				filepath: "/music/Artist Two - Song B.mp3",
				scannedAt: "2024-01-01T00:00:00.000Z",
			},
		];
		store = new StateStore(path.join(dir, "state.json"), pino({ level: "silent" }));
		tick = 0;

		service = new SyncService({
			store,
			scanner: { scan: async () => ({ tracks: localTracks, errors: [] }) },
			orchestrators: () =>
				new RemoteOrchestrator({
					request: async () => catalogue.backend("request"),
					browser: async () => catalogue.backend("browser"),
				}),
			captureStore: () => new JsonCaptureReader(capturePath),
			settingsPath: path.join(dir, "settings.json"),
			jobs: new JobController({ retryDelayMs: 0 }),
			now: () => new Date(Date.UTC(2024, 5, 1, 12, 0, tick++)),
		});
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	test("rescan classifies captures against the local library", async () => {
		const result = await service.rescan().done;
		expect(result).toEqual({
			outcome: "completed",
			value: { captures: 2, files: 1, toDownload: 1, haveLocally: 1, scanErrors: 0 },
		});

		const status = service.status();
		expect(status.to_download.map((t) => t.key)).toEqual([WANTED]);
		expect(status.have_locally.map((t) => t.key)).toEqual([LOCAL]);
		expect(status.local_paths).toEqual({ [LOCAL]: "/music/Artist Two - Song B.mp3" });
		expect(status.last_reconcile_at).not.toBeNull();
	});

	test("a later successful search clears the not-found mark", async () => {
		await service.rescan().done;

		const miss = await service.search({ all: true, mode: "unfound" }).done;
		expect(miss).toEqual({ outcome: "completed", value: { processed: 1, failed: 1 } });
		expect(service.status().not_found).toEqual({ [WANTED]: true });

		const track = catalogue.add("Artist One - Song A (Extended Mix)", "11");
		const hit = await service.search({ all: true, mode: "retry_not_found" }).done;
		expect(hit).toEqual({ outcome: "completed", value: { processed: 1, failed: 0 } });

		const status = service.status();
		expect(status.not_found).toEqual({});
		expect(status.urls).toEqual({ [WANTED]: track.url });
		expect(status.remote_ids).toEqual({ [WANTED]: "11" });
		expect(status.remote_titles).toEqual({ [WANTED]: "Artist One - Song A (Extended Mix)" });
		expect(status.match_scores[WANTED]).toBeCloseTo(1.05, 6);
		expect(store.snapshot().notFound).toEqual({});
	});

	test("sync searches, stars and records each track in one step", async () => {
		fs.writeFileSync(
			path.join(dir, "captures.json"),
			JSON.stringify({
				tracks: [
					{ artist: "Artist One", title: "Song A" },
					{ artist: "Nobody", title: "Nothing" },
				],
			})
		);
		const track = catalogue.add("Artist One - Song A", "11");
		await service.rescan().done;

		const result = await service.sync().done;
		expect(result).toEqual({ outcome: "completed", value: { processed: 2, failed: 1 } });
		expect(track.favorited).toBe(true);

		const status = service.status();
		expect(status.starred).toEqual({ [WANTED]: true });
		expect(status.urls).toEqual({ [WANTED]: track.url });
		expect(status.not_found).toEqual({ "Nobody - Nothing": true });
		expect(service.mutationLog()).toEqual([
			{ timestamp: expect.any(String), action: "starred", key: WANTED, source: "sync" },
		]);

		// already starred tracks are not revisited
		const again = await service.sync().done;
		expect(again).toEqual({ outcome: "completed", value: { processed: 1, failed: 1 } });
		expect(catalogue.calls.toggle).toEqual([WANTED]);
	});

	test("unstar dismisses the track and star brings it back", async () => {
		const track = catalogue.add("Artist One - Song A", "11", true);
		await service.rescan().done;

		await service.unstar(WANTED).done;
		expect(track.favorited).toBe(false);
		expect(service.status().dismissed).toEqual({ [WANTED]: true });
		expect(service.status().starred).toEqual({ [WANTED]: false });

		await service.star(WANTED).done;
		expect(track.favorited).toBe(true);
		expect(service.status().dismissed).toEqual({});
		expect(service.mutationLog().map((m) => [m.action, m.source])).toEqual([
			["starred", "star"],
			["unstarred", "unstar"],
		]);
	});

	test("a single-track star that finds nothing fails the job", async () => {
		const result = await service.star("Ghost - Track").done;
		expect(result.outcome).toBe("failed");
		if (result.outcome === "failed") {
			expect(result.error).toBeInstanceOf(NotFoundError);
		}
		expect(service.status().not_found).toEqual({ "Ghost - Track": true });
		expect(service.progress().lastOutcome).toBe("failed");
	});

	test("a complete crawl marks listed favorites and demotes the rest", async () => {
		await store.commit({ starred: { "Old - Gone": true } });
		catalogue.add("Artist Three - Track C", "31", true);
		catalogue.add("Artist Four - Track D", "41", true);
		catalogue.add("Artist Five - Track E", "51");

		const result = await service.crawl("all").done;
		expect(result).toEqual({ outcome: "completed", value: { pages: 1, favorites: 2, complete: true, crossChecked: 0 } });

		const status = service.status();
		expect(status.starred).toEqual({
			"Old - Gone": false,
			"Artist Three - Track C": true,
			"Artist Four - Track D": true,
		});
		expect(status.last_full_crawl_at).not.toBeNull();
		expect(service.mutationLog().filter((m) => m.action === "unstarred").map((m) => m.key)).toEqual(["Old - Gone"]);
	});

	test("a crawl on an expired session fails without touching state", async () => {
		catalogue.sessionExpired = true;
		const result = await service.crawl("1_month").done;
		expect(result.outcome).toBe("failed");
		if (result.outcome === "failed") {
			expect(result.error).toBeInstanceOf(SessionExpiredError);
		}
		expect(service.status().last_crawl_at).toBeNull();
	});

	test("direct commands are refused while a job runs", async () => {
		let release = () => {};
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});
		const blocker = service.jobs.start("rescan", 0, () => gate);

		expect(() => service.crawl()).toThrow(BusyError);
		expect(() => service.undismiss(WANTED)).toThrow(BusyError);
		await expect(service.dismissManualCheck(WANTED)).rejects.toBeInstanceOf(BusyError);
		await expect(service.skip([WANTED])).rejects.toBeInstanceOf(BusyError);
		await expect(service.resetNotFound()).rejects.toBeInstanceOf(BusyError);
		expect(service.stop()).toBe(true);

		release();
		await blocker.done;
		await expect(service.dismissManualCheck(WANTED)).resolves.toBeUndefined();
	});

	test("resetNotFound clears marks until a new miss is recorded", async () => {
		await service.rescan().done;
		await service.search({ key: WANTED }).done;
		expect(service.status().not_found).toEqual({ [WANTED]: true });

		expect(await service.resetNotFound()).toBe(1);
		expect(service.status().not_found).toEqual({});

		await service.search({ all: true, mode: "unfound" }).done;
		expect(service.status().not_found).toEqual({ [WANTED]: true });
	});

	test("dismissManualCheck hides an alternate version warning", async () => {
		catalogue.add("Artist One - Song A (Radio Edit)", "12");
		await service.rescan().done;
		await service.search({ key: WANTED }).done;
		expect(service.status().alternate_versions).toEqual([WANTED]);

		await service.dismissManualCheck(WANTED);
		expect(service.status().alternate_versions).toEqual([]);
		expect(service.status().dismissed_manual_check).toEqual({ [WANTED]: true });
	});

	test("download links resolve for tracks with a known url", async () => {
		catalogue.add("Artist One - Song A", "11");
		await service.rescan().done;
		await expect(service.downloadLink(WANTED)).rejects.toBeInstanceOf(NotFoundError);

		await service.search({ key: WANTED }).done;
		expect(await service.downloadLink(WANTED, "3")).toBe("https://remote.test/files/11.3");
	});

	test("imported captures feed the next rescan", async () => {
		expect(await service.importCaptures([{ artist: "Artist Six", title: "Song F" }])).toEqual({ total: 3, added: 1 });
		await service.rescan().done;
		expect(service.status().to_download.map((t) => t.key)).toEqual(["Artist Six - Song F", WANTED]);
	});
	test("a toggle that does not stick keeps the search match for the next run", async () => {
		const track = catalogue.add("Artist One - Song A", "11");
		catalogue.ignoreToggles = true;
		await service.rescan().done;

		const result = await service.sync([WANTED]).done;
		expect(result).toEqual({ outcome: "completed", value: { processed: 1, failed: 1 } });
		// the retry reuses the stored url instead of searching again
		expect(catalogue.calls.search).toHaveLength(4);

		const status = service.status();
		expect(status.urls).toEqual({ [WANTED]: track.url });
		expect(status.remote_ids).toEqual({ [WANTED]: "11" });
		expect(status.starred).toEqual({});
		expect(status.not_found).toEqual({});
		expect(store.snapshot().outcomes.map((o) => [o.action, o.key])).toEqual([
			["found", WANTED],
			["failed", WANTED],
		]);
	});

	test("a bounded crawl reads starred tracks it did not list and demotes the unfavorited ones", async () => {
		catalogue.pageSize = 1;
		catalogue.add("Artist Three - Track C", "31", true);
		catalogue.add("Artist Four - Track D", "41", true);
		catalogue.add("Artist Five - Track E", "51", true);
		const kept = catalogue.add("Kept - Old", "71", true);
		const gone = catalogue.add("Old - Gone", "61");
		await store.commit({
			starred: { "Old - Gone": true, "Kept - Old": true },
			urls: { "Old - Gone": gone.url, "Kept - Old": kept.url },
		});

		const result = await service.crawl("1_month").done;
		expect(result).toEqual({
			outcome: "completed",
			value: { pages: 3, favorites: 3, complete: false, crossChecked: 2 },
		});
		expect(catalogue.calls.read).toEqual(["Old - Gone", "Kept - Old"]);

		const status = service.status();
		expect(status.starred).toEqual({
			"Old - Gone": false,
			"Kept - Old": true,
			"Artist Three - Track C": true,
			"Artist Four - Track D": true,
			"Artist Five - Track E": true,
		});
		expect(status.last_full_crawl_at).toBeNull();
		expect(service.mutationLog().filter((m) => m.action === "unstarred")).toEqual([
			{ timestamp: expect.any(String), action: "unstarred", key: "Old - Gone", source: "crawl" },
		]);
	});

	test("stopping a sync during the third track leaves the rest untouched", async () => {
		const names = ["Alpha", "Bravo", "Charlie", "Delta", "Echo", "Foxtrot", "Golf", "Hotel", "India", "Juliet"];
		fs.writeFileSync(
			path.join(dir, "captures.json"),
			JSON.stringify({ tracks: names.map((n) => ({ artist: `Artist ${n}`, title: `Song ${n}` })) })
		);
		for (const [i, n] of names.entries()) {
			catalogue.add(`Artist ${n} - Song ${n}`, `${i + 1}`);
		}
		await service.rescan().done;
		const keys = service.status().to_download.map((t) => t.key);
		expect(keys).toHaveLength(10);

		let stopping = false;
		const unsubscribe = service.jobs.subscribe((progress) => {
			if (!stopping && progress.currentKey === keys[2]) {
				stopping = true;
				service.stop();
			}
		});
		const result = await service.sync().done;
		unsubscribe();
		expect(result).toEqual({ outcome: "stopped" });

		const state = store.snapshot();
		const done = keys.slice(0, 3);
		const untouched = keys.slice(3);
		expect(done.map((key) => state.starred[key])).toEqual([true, true, true]);
		expect(state.outcomes.filter((o) => o.key === keys[2]).map((o) => o.action)).toEqual(["found", "starred"]);
		for (const key of untouched) {
			expect(state.starred[key]).toBeUndefined();
			expect(state.urls[key]).toBeUndefined();
			expect(state.outcomes.some((o) => o.key === key)).toBe(false);
		}
		expect(catalogue.calls.toggle).toEqual(done);
		expect(service.progress().lastOutcome).toBe("stopped");
	});

	test("skipped tracks leave to_download and are not synced until unskipped", async () => {
		catalogue.add("Artist One - Song A", "11");
		await service.rescan().done;

		expect(await service.skip([WANTED])).toBe(1);
		expect(await service.skip([WANTED])).toBe(0);
		const status = service.status();
		expect(status.to_download).toEqual([]);
		expect(status.skipped.map((t) => t.key)).toEqual([WANTED]);

		expect(await service.sync().done).toEqual({ outcome: "completed", value: { processed: 0, failed: 0 } });
		expect(catalogue.calls.search).toEqual([]);

		expect(await service.unskip([WANTED, "Nobody - Nothing"])).toBe(1);
		expect(service.status().to_download.map((t) => t.key)).toEqual([WANTED]);
		expect(service.status().skipped).toEqual([]);
	});

	test("cleanupMatches drops matches under the threshold for good", async () => {
		const other = "Artist Two - Song B";
		await store.commit({
			urls: { [WANTED]: "https://remote.test/track/a-11.html", [other]: "https://remote.test/track/b-12.html" },
			remoteIds: { [WANTED]: "11", [other]: "12" },
			remoteTitles: { [WANTED]: "Artist One - Song A (Extended Mix)", [other]: "Someone Else - Other Thing" },
			matchScores: { [WANTED]: 0.9, [other]: 0.4 },
			outcomes: [
				{
					timestamp: "2024-01-01T00:00:00.000Z",
					key: other,
					action: "found",
					url: "https://remote.test/track/b-12.html",
					title: "Someone Else - Other Thing",
				},
			],
		});

		expect(await service.cleanupMatches()).toEqual({ kept: 1, removed: 1, threshold: 0.3 });

		const status = service.status();
		expect(status.urls).toEqual({ [WANTED]: "https://remote.test/track/a-11.html" });
		expect(status.remote_ids).toEqual({ [WANTED]: "11" });
		expect(status.remote_titles).toEqual({ [WANTED]: "Artist One - Song A (Extended Mix)" });
		expect(Object.keys(status.match_scores)).toEqual([WANTED]);
		expect(status.match_scores[WANTED]).toBeCloseTo(1.05, 6);
		expect(status.not_found).toEqual({});
	});

	test("undismiss stars the track again on the remote", async () => {
		const track = catalogue.add("Artist One - Song A", "11", true);
		await service.rescan().done;
		await service.unstar(WANTED).done;
		expect(track.favorited).toBe(false);

		const result = await service.undismiss(WANTED).done;
		expect(result).toEqual({ outcome: "completed", value: { processed: 1, failed: 0 } });
		expect(track.favorited).toBe(true);
		expect(service.status().dismissed).toEqual({});
		expect(service.status().starred).toEqual({ [WANTED]: true });
		expect(service.mutationLog().map((m) => [m.action, m.source])).toEqual([
			["starred", "undismiss"],
			["unstarred", "unstar"],
		]);
	});

	test("checkSession reports whether the remote session is signed in", async () => {
		expect(await service.checkSession()).toEqual({ loggedIn: true });
		catalogue.sessionExpired = true;
		expect(await service.checkSession()).toEqual({ loggedIn: false });
	});
});

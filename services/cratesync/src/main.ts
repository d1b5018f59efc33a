#!/usr/bin/env node

import { Command, Option } from "commander";
import pc from "picocolors";
import { TIME_RANGES } from "./crawl/paginator.js";
import { errorMessage } from "./errors.js";
import { createSyncService } from "./sync/create.js";
import type { SyncService } from "./sync/service.js";
import {
	checkSessionCommand,
	cleanupMatchesCommand,
	crawlCommand,
	downloadLinkCommand,
	importCapturesCommand,
	loginCommand,
	rescanCommand,
	resetNotFoundCommand,
	searchCommand,
	skipCommand,
	starCommand,
	statusCommand,
	syncCommand,
	undismissCommand,
	unskipCommand,
	unstarCommand,
} from "./cli/commands.js";

const program = new Command();

program
	.name("cratesync")
	.description("Keep captured tracks, the local library and remote favorites in sync")
	.version("0.1.0");

/**
 * Build the service for a command and report failures the same way everywhere
 */
function run<A extends unknown[]>(action: (service: SyncService, ...args: A) => Promise<void> | void) {
	return async (...args: A) => {
		try {
			await action(createSyncService(), ...args);
		} catch (e) {
			console.error(pc.red("Error:"), errorMessage(e));
			process.exitCode = 1;
		}
	};
}

program
	.command("status")
	.description("Show what is captured, local, starred and missing")
	.option("-m, --mutations <n>", "Also list the last N favorite changes")
	.action(run((service, opts: { mutations?: string }) => statusCommand(service, opts)));

program
	.command("crawl")
	.description("Read the remote favorites listing and update starred state")
	.addOption(new Option("-r, --range <range>", "How far back to read").choices([...TIME_RANGES]).default("all"))
	.action(run((service, opts: { range?: string }) => crawlCommand(service, opts)));

program
	.command("search")
	.description("Find remote matches for one track or for every unmatched one")
	.argument("[key]", 'Track key, e.g. "Artist - Title"')
	.addOption(new Option("--mode <mode>", "Which tracks to search").choices(["unfound", "retry_not_found"]).default("unfound"))
	.action(run((service, key: string | undefined, opts: { mode?: string }) => searchCommand(service, key, opts)));

program
	.command("sync")
	.alias("s")
	.description("Star every track still to download on the remote catalogue")
	.argument("[keys...]", "Limit to these track keys")
	.action(run((service, keys: string[]) => syncCommand(service, keys)));

program
	.command("star")
	.description("Star one track and clear its dismissal")
	.argument("<key>", "Track key")
	.action(run((service, key: string) => starCommand(service, key)));

program
	.command("unstar")
	.description("Remove one track from favorites and dismiss it")
	.argument("<key>", "Track key")
	.action(run((service, key: string) => unstarCommand(service, key)));

program
	.command("undismiss")
	.description("Clear a dismissal and star the track again")
	.argument("<key>", "Track key")
	.action(run((service, key: string) => undismissCommand(service, key)));

program
	.command("skip")
	.description("Hide tracks from the download list without touching the remote")
	.argument("<keys...>", "Track keys")
	.action(run((service, keys: string[]) => skipCommand(service, keys)));

program
	.command("unskip")
	.description("Put skipped tracks back on the download list")
	.argument("<keys...>", "Track keys")
	.action(run((service, keys: string[]) => unskipCommand(service, keys)));

program
	.command("cleanup-matches")
	.description("Re-score stored matches and drop the ones under the threshold")
	.action(run((service) => cleanupMatchesCommand(service)));

program
	.command("check-session")
	.description("Check that the saved session is still signed in")
	.action(run((service) => checkSessionCommand(service)));

program
	.command("rescan")
	.description("Re-read the capture list and the destination folders")
	.action(run((service) => rescanCommand(service)));

program
	.command("reset-not-found")
	.description("Forget every not-found mark so the tracks are searched again")
	.action(run((service) => resetNotFoundCommand(service)));

program
	.command("import-captures")
	.description("Merge captured tracks from a JSON file into the capture list")
	.argument("<file>", "JSON array of { artist, title } or { tracks: [...] }")
	.action(run((service, file: string) => importCapturesCommand(service, file)));

program
	.command("download-link")
	.description("Resolve the download link of a matched track")
	.argument("<key>", "Track key")
	.option("-f, --format <format>", "Download format id")
	.action(run((service, key: string, opts: { format?: string }) => downloadLinkCommand(service, key, opts)));

program
	.command("login")
	.description("Sign in through a browser window and save the session")
	.action(run((service) => loginCommand(service)));

await program.parseAsync();

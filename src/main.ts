#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import { analyseCommand } from "./cli/analyse.js";
import { downloadScrobblesCommand } from "./cli/download-scrobbles.js";
import { genresCommand } from "./cli/genres.js";
import { libraryCommand } from "./cli/library.js";
import { parseDateOption } from "./cli/output.js";
import { errorMessage } from "./errors.js";
import { VERSION } from "./version.js";

const program = new Command();

program
	.name("extended-scrobbles")
	.description("Archive Last.fm scrobbles and extend them with track lengths and genres")
	.version(VERSION)
	.option("--config <path>", "Path to configuration.toml (default: ./data/configuration.toml)");

function run(task: () => Promise<void>) {
	task().catch((e: unknown) => {
		console.error(pc.red("Error:"), errorMessage(e));
		process.exit(1);
	});
}

function configPath(): string | undefined {
	return program.opts<{ config?: string }>().config;
}

program
	.command("download-scrobbles")
	.alias("download")
	.description("Download every scrobble of a user that is not archived yet")
	.option("-u, --username <name>", "Last.fm username (prompted for when missing)")
	.option("--until <date>", "Exclusive end of the history to download", parseDateOption)
	.action((opts) => {
		run(() => downloadScrobblesCommand(opts, configPath()));
	});

program
	.command("analyse")
	.alias("analyze")
	.description("Extend archived scrobbles with track lengths and genres and write a spreadsheet")
	.option("-u, --username <name>", "Last.fm username whose archives are analysed")
	.option("-f, --scrobbles-file <path>", "Analyse a raw JSON dump of recent-tracks pages instead")
	.option("--from <date>", "Only scrobbles at or after this date", parseDateOption)
	.option("--to <date>", "Only scrobbles before this date", parseDateOption)
	.option("-o, --output <path>", "Spreadsheet to write (default: paths.xlsx_output_path)")
	.option("--rebuild-library-cache", "Rescan the music library even if a cache exists")
	.option("--write-tags", "Write genres and MusicBrainz IDs into matched MP3 files")
	.option("--clear-failures", "Clear the failure log before analysing")
	.action((opts) => {
		run(() => analyseCommand(opts, configPath()));
	});

program
	.command("library")
	.alias("l")
	.description("Rescan the music library and rewrite its cache")
	.action(() => {
		run(() => libraryCommand(configPath()));
	});

program
	.command("genres")
	.alias("g")
	.description("Download the genre whitelist and tree")
	.option("--no-force", "Keep genre files that are already cached")
	.action((opts) => {
		run(() => genresCommand(opts, configPath()));
	});

program.parse();

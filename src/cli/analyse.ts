import path from "path";
import ora from "ora";
import pc from "picocolors";
import { requireLastFmApiKey, type Config } from "../config.js";
import { ScrobbleEnricher, runAnalysis } from "../analysis/analysis.js";
import { LibraryMatcher } from "../analysis/matcher.js";
import { clearFailureLog, logAnalysisComplete, logAnalysisStart } from "../analysis/report.js";
import { ensureGenreData, loadGenreData } from "../genres/data.js";
import { GenreResolver } from "../genres/resolver.js";
import { LastFmClient } from "../lastfm/client.js";
import type { ScrobbledTrack } from "../lastfm/types.js";
import { ensureLibraryIndex } from "../library/cache.js";
import { MusicBrainzClient } from "../musicbrainz/client.js";
import { archiveDirectoryForUser, isWithinRange, loadArchivedScrobbles } from "../scrobbles/archive.js";
import { loadRawScrobblePages } from "../scrobbles/download.js";
import { VERSION } from "../version.js";
import { YouTubeMatcher } from "../youtube/search.js";
import { createProgressBar, loadCommandConfig, printConfig, printHeader, promptUsername } from "./output.js";

export interface AnalyseCommandOptions {
	username?: string;
	scrobblesFile?: string;
	from?: Date;
	to?: Date;
	output?: string;
	rebuildLibraryCache?: boolean;
	writeTags?: boolean;
	clearFailures?: boolean;
}

function loadScrobbles(
	config: Config,
	options: AnalyseCommandOptions,
	username: string | undefined
): ScrobbledTrack[] {
	const range = { from: options.from, to: options.to };
	if (options.scrobblesFile) {
		return loadRawScrobblePages(path.resolve(options.scrobblesFile))
			.filter((track) => isWithinRange(track, range))
			.sort((a, b) => a.scrobbledAt - b.scrobbledAt);
	}
	if (!username) return [];
	return loadArchivedScrobbles(
		archiveDirectoryForUser(config.paths.scrobbleArchiveDir, username),
		range,
		username
	);
}

export async function analyseCommand(options: AnalyseCommandOptions, configPath?: string) {
	printHeader("Analyse Scrobbles");

	const { config } = loadCommandConfig(configPath);
	const apiKey = requireLastFmApiKey(config);
	const username = options.scrobblesFile ? options.username : (options.username ?? (await promptUsername()));
	const outputPath = options.output ? path.resolve(options.output) : config.paths.xlsxOutputPath;

	printConfig([
		["Source", options.scrobblesFile ? path.resolve(options.scrobblesFile) : `archives of ${username}`],
		["From", options.from ? options.from.toISOString() : "beginning"],
		["To", options.to ? options.to.toISOString() : "now"],
		["Library", config.paths.musicLibraryRoot ?? "(none)"],
		["Output", outputPath],
		["Write tags", options.writeTags ? "yes" : "no"],
	]);

	// ═══════════════════════════════════════════════════════════════════════════
	// Scrobbles
	// ═══════════════════════════════════════════════════════════════════════════

	const scrobbles = loadScrobbles(config, options, username);
	if (scrobbles.length === 0) {
		console.log(pc.yellow("  ⚠ No scrobbles to analyse. Run download-scrobbles first."));
		console.log();
		return;
	}
	console.log(pc.green(`  ✓ Loaded ${scrobbles.length} scrobbles`));

	// ═══════════════════════════════════════════════════════════════════════════
	// Library
	// ═══════════════════════════════════════════════════════════════════════════

	const librarySpinner = ora({
		text: pc.dim("Loading music library..."),
		prefixText: " ",
		color: "magenta",
	}).start();
	const libraryBar = createProgressBar("files");
	let scanning = false;

	const library = await ensureLibraryIndex(config, {
		rebuild: options.rebuildLibraryCache,
		onProgress: (done, total) => {
			if (!scanning) {
				librarySpinner.stop();
				libraryBar.start(total, 0);
				scanning = true;
			}
			libraryBar.update(done);
		},
	});

	if (scanning) {
		libraryBar.stop();
		console.log(pc.green(`  ✓ Scanned ${library.index.files.length} library files`));
	} else if (library.source === "none") {
		librarySpinner.warn(pc.yellow("No music library configured"));
	} else {
		librarySpinner.succeed(pc.green(`Loaded ${library.index.files.length} library files from cache`));
	}

	// ═══════════════════════════════════════════════════════════════════════════
	// Genres
	// ═══════════════════════════════════════════════════════════════════════════

	const genreSpinner = ora({
		text: pc.dim("Loading genre data..."),
		prefixText: " ",
		color: "magenta",
	}).start();
	try {
		await ensureGenreData(config.paths.cacheDir);
	} catch (error) {
		genreSpinner.fail(pc.red("Failed to download genre data"));
		throw error;
	}
	const genreData = loadGenreData(config.paths.cacheDir);
	genreSpinner.succeed(pc.green(`Loaded ${genreData.whitelist.size} genres`));

	const lastfm = new LastFmClient({ apiKey, requestIntervalMs: config.lastfm.requestIntervalMs });
	const enricher = new ScrobbleEnricher({
		matcher: new LibraryMatcher(library.index, config.matching),
		musicbrainz: new MusicBrainzClient({
			contact: config.musicbrainz.contact,
			version: VERSION,
			requestIntervalMs: config.musicbrainz.requestIntervalMs,
		}),
		youtube: new YouTubeMatcher({
			maxResults: config.matching.youtubeMaxResults,
			minTitleScore: config.matching.fuzzyYoutubeMinTitle,
		}),
		genres: new GenreResolver(lastfm, genreData, {
			...config.genres,
			minLastfmSimilarity: config.matching.minLastfmSimilarity,
		}),
	});

	// ═══════════════════════════════════════════════════════════════════════════
	// Analysis
	// ═══════════════════════════════════════════════════════════════════════════

	if (options.clearFailures) {
		clearFailureLog(config.paths.failureLogPath);
	}

	logAnalysisStart({ username, scrobbles: scrobbles.length, libraryFiles: library.index.files.length });

	const bar = createProgressBar("scrobbles");
	bar.start(scrobbles.length, 0);
	const summary = await runAnalysis({
		scrobbles,
		enricher,
		outputPath,
		failureLogPath: config.paths.failureLogPath,
		parseLogInterval: config.progress.parseLogInterval,
		writeTags: options.writeTags,
		onProgress: (done) => bar.update(done),
	}).finally(() => bar.stop());

	logAnalysisComplete(summary);
	if (summary.failed > 0) {
		console.log(pc.dim(`  Failures logged to ${config.paths.failureLogPath}`));
		console.log();
	}
}

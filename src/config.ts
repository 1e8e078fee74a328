import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import { parse as parseToml } from "smol-toml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

dotenv.config();

export const CONFIG_FILE_NAME = "configuration.toml";

const score = z.number().min(0).max(100);

const configSchema = z.object({
	logging: z.object({
		level: z.enum(["debug", "info", "warn", "error"]).default("info"),
		logFile: z.string().optional(),
	}),
	lastfm: z.object({
		apiKey: z.string().default(""),
		apiSecret: z.string().optional(),
		requestIntervalMs: z.number().int().nonnegative().default(200),
	}),
	musicbrainz: z.object({
		contact: z.string().default("https://github.com/extended-scrobbles"),
		requestIntervalMs: z.number().int().nonnegative().default(1000),
	}),
	paths: z.object({
		dataDir: z.string(),
		cacheDir: z.string().default("{DATA_DIR}/cache"),
		musicLibraryRoot: z.string().optional(),
		libraryCacheFile: z.string().default("{DATA_DIR}/library-cache.json"),
		scrobbleArchiveDir: z.string().default("{DATA_DIR}/scrobbles"),
		xlsxOutputPath: z.string().default("{DATA_DIR}/extended-scrobbles.xlsx"),
		failureLogPath: z.string().default("{DATA_DIR}/analysis-failures.json"),
	}),
	matching: z.object({
		fuzzyMinArtist: score.default(82),
		fuzzyMinAlbum: score.default(80),
		fuzzyMinTitle: score.default(85),
		fuzzyYoutubeMinTitle: score.default(70),
		minLastfmSimilarity: score.default(80),
		youtubeMaxResults: z.number().int().positive().default(8),
	}),
	genres: z.object({
		maxGenreCount: z.number().int().positive().default(3),
		minGenreWeight: z.number().int().nonnegative().default(20),
		searchPageLimit: z.number().int().positive().default(15),
		preferSpecific: z.boolean().default(false),
	}),
	progress: z.object({
		cacheLogInterval: z.number().int().positive().default(100),
		parseLogInterval: z.number().int().positive().default(50),
	}),
});

export type Config = z.infer<typeof configSchema>;

type TomlTable = Record<string, unknown>;

function isTable(value: unknown): value is TomlTable {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function table(raw: TomlTable, name: string): TomlTable {
	const value = raw[name];
	if (value === undefined) return {};
	if (!isTable(value)) {
		throw new ConfigError(`Configuration value '${name}' must be a table`);
	}
	return value;
}

/**
 * Get the default configuration file path: ./data/configuration.toml
 * (or inside DATA_DIR when that environment variable is set).
 */
export function getDefaultConfigPath(): string {
	return path.resolve(process.env.DATA_DIR || "./data", CONFIG_FILE_NAME);
}

/**
 * Replace {DATA_DIR} and {CACHE_DIR} placeholders and make the path absolute.
 */
export function expandPath(value: string, dirs: { dataDir: string; cacheDir?: string }): string {
	let expanded = value.replaceAll("{DATA_DIR}", dirs.dataDir);
	if (dirs.cacheDir !== undefined) {
		expanded = expanded.replaceAll("{CACHE_DIR}", dirs.cacheDir);
	}
	return path.resolve(expanded);
}

function readConfigFile(filePath: string): TomlTable {
	let contents: string;
	try {
		contents = fs.readFileSync(filePath, "utf-8");
	} catch (error) {
		throw new ConfigError(`Failed to read configuration file ${filePath}`, { cause: error });
	}

	try {
		return parseToml(contents);
	} catch (error) {
		throw new ConfigError(`Failed to parse configuration file ${filePath} as TOML`, { cause: error });
	}
}

function envNumber(name: string): number | undefined {
	const value = process.env[name];
	if (value === undefined || value.trim() === "") return undefined;
	return Number(value);
}

export function loadConfig(filePath: string = getDefaultConfigPath()): Config {
	const raw = readConfigFile(filePath);

	const logging = table(raw, "logging");
	const lastfm = table(raw, "lastfm");
	const musicbrainz = table(raw, "musicbrainz");
	const paths = table(raw, "paths");
	const matching = table(raw, "matching");
	const genres = table(raw, "genres");
	const progress = table(raw, "progress");

	const rawConfig = {
		logging: {
			level: process.env.LOG_LEVEL || logging.level,
			logFile: logging.log_file,
		},
		lastfm: {
			apiKey: process.env.LASTFM_API_KEY || lastfm.api_key,
			apiSecret: process.env.LASTFM_API_SECRET || lastfm.api_secret,
			requestIntervalMs: envNumber("LASTFM_REQUEST_INTERVAL_MS") ?? lastfm.request_interval_ms,
		},
		musicbrainz: {
			contact: musicbrainz.contact,
			requestIntervalMs: musicbrainz.request_interval_ms,
		},
		paths: {
			dataDir: process.env.DATA_DIR || paths.data_dir || path.dirname(filePath),
			cacheDir: paths.cache_dir,
			musicLibraryRoot: process.env.MUSIC_LIBRARY_ROOT || paths.music_library_root,
			libraryCacheFile: paths.library_cache_file,
			scrobbleArchiveDir: paths.scrobble_archive_dir,
			xlsxOutputPath: paths.xlsx_output_path,
			failureLogPath: paths.failure_log_path,
		},
		matching: {
			fuzzyMinArtist: matching.fuzzy_min_artist,
			fuzzyMinAlbum: matching.fuzzy_min_album,
			fuzzyMinTitle: matching.fuzzy_min_title,
			fuzzyYoutubeMinTitle: matching.fuzzy_youtube_min_title,
			minLastfmSimilarity: matching.min_lastfm_similarity,
			youtubeMaxResults: matching.youtube_max_results,
		},
		genres: {
			maxGenreCount: genres.max_genre_count,
			minGenreWeight: genres.min_genre_weight,
			searchPageLimit: genres.search_page_limit,
			preferSpecific: genres.prefer_specific,
		},
		progress: {
			cacheLogInterval: progress.cache_log_interval,
			parseLogInterval: progress.parse_log_interval,
		},
	};

	const parsed = configSchema.safeParse(rawConfig);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new ConfigError(`Invalid configuration in ${filePath}: ${issues}`);
	}

	return resolvePaths(parsed.data);
}

function resolvePaths(config: Config): Config {
	const dataDir = path.resolve(config.paths.dataDir);
	const cacheDir = expandPath(config.paths.cacheDir, { dataDir });
	const dirs = { dataDir, cacheDir };

	return {
		...config,
		logging: {
			...config.logging,
			logFile: config.logging.logFile ? expandPath(config.logging.logFile, dirs) : undefined,
		},
		paths: {
			dataDir,
			cacheDir,
			musicLibraryRoot: config.paths.musicLibraryRoot
				? expandPath(config.paths.musicLibraryRoot, dirs)
				: undefined,
			libraryCacheFile: expandPath(config.paths.libraryCacheFile, dirs),
			scrobbleArchiveDir: expandPath(config.paths.scrobbleArchiveDir, dirs),
			xlsxOutputPath: expandPath(config.paths.xlsxOutputPath, dirs),
			failureLogPath: expandPath(config.paths.failureLogPath, dirs),
		},
	};
}

/**
 * Commands that talk to Last.fm need an API key; the others don't.
 */
export function requireLastFmApiKey(config: Config): string {
	if (!config.lastfm.apiKey) {
		throw new ConfigError(
			"Last.fm API key missing: set lastfm.api_key in the configuration file or LASTFM_API_KEY in .env"
		);
	}
	return config.lastfm.apiKey;
}

import fs from "fs";
import path from "path";
import { z } from "zod";
import type { Config } from "../config.js";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { buildLibraryCache, findAudioFiles, type BuildLibraryOptions } from "./scanner.js";
import type { LibraryFile, LibraryIndex, LibraryScanFailure } from "./types.js";

const CACHE_VERSION = 1;

const libraryFileSchema = z.object({
	filePath: z.string(),
	trackLength: z.number(),
	artistName: z.string().optional(),
	artistMbid: z.string().optional(),
	albumName: z.string().optional(),
	albumMbid: z.string().optional(),
	trackTitle: z.string().optional(),
	trackMbid: z.string().optional(),
	genres: z.array(z.string()).default([]),
});

const libraryCacheSchema = z.object({
	version: z.literal(CACHE_VERSION),
	createdAt: z.string(),
	root: z.string(),
	files: z.array(libraryFileSchema),
});

type LibraryCache = z.infer<typeof libraryCacheSchema>;

const log = createLogger("library");

function addTo(map: Map<string, LibraryFile[]>, key: string | undefined, file: LibraryFile): void {
	if (key === undefined) return;
	const list = map.get(key);
	if (list) {
		list.push(file);
	} else {
		map.set(key, [file]);
	}
}

/**
 * Index library files by track MBID and by exact title, artist and album.
 * With duplicate MBIDs the first file wins.
 */
export function createLibraryIndex(files: LibraryFile[]): LibraryIndex {
	const index: LibraryIndex = {
		files,
		byTrackMbid: new Map(),
		byTitle: new Map(),
		byArtist: new Map(),
		byAlbum: new Map(),
		artistNames: [],
		albumNames: [],
		trackTitles: [],
	};

	for (const file of files) {
		if (file.trackMbid && !index.byTrackMbid.has(file.trackMbid)) {
			index.byTrackMbid.set(file.trackMbid, file);
		}
		addTo(index.byTitle, file.trackTitle, file);
		addTo(index.byArtist, file.artistName, file);
		addTo(index.byAlbum, file.albumName, file);
	}

	index.artistNames = [...index.byArtist.keys()];
	index.albumNames = [...index.byAlbum.keys()];
	index.trackTitles = [...index.byTitle.keys()];
	return index;
}

export function loadLibraryCache(cacheFile: string): LibraryCache | null {
	if (!fs.existsSync(cacheFile)) {
		return null;
	}

	try {
		const parsed = libraryCacheSchema.safeParse(JSON.parse(fs.readFileSync(cacheFile, "utf-8")));
		if (parsed.success) {
			return parsed.data;
		}
		log.warn(`Ignoring library cache ${cacheFile}: unexpected structure`);
	} catch (error) {
		log.warn(`Ignoring library cache ${cacheFile}: ${errorMessage(error)}`);
	}
	return null;
}

export function saveLibraryCache(cacheFile: string, root: string, files: LibraryFile[]): void {
	fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
	const cache: LibraryCache = {
		version: CACHE_VERSION,
		createdAt: new Date().toISOString(),
		root,
		files,
	};
	fs.writeFileSync(cacheFile, JSON.stringify(cache, null, 2), "utf-8");
}

export interface EnsureLibraryOptions extends Omit<BuildLibraryOptions, "logInterval"> {
	/** Scan the library even if a cache file exists. */
	rebuild?: boolean;
}

export interface LibraryLoadResult {
	index: LibraryIndex;
	source: "cache" | "scan" | "none";
	failures: LibraryScanFailure[];
}

/**
 * Load the library index from its JSON cache, or scan the library and
 * write the cache. Without a configured library root the index is empty.
 */
export async function ensureLibraryIndex(
	config: Config,
	options: EnsureLibraryOptions = {}
): Promise<LibraryLoadResult> {
	const root = config.paths.musicLibraryRoot;
	if (!root) {
		log.info("No music library configured, local matching disabled");
		return { index: createLibraryIndex([]), source: "none", failures: [] };
	}

	const cacheFile = config.paths.libraryCacheFile;
	if (!options.rebuild) {
		const cache = loadLibraryCache(cacheFile);
		if (cache && cache.root === root) {
			log.info(`Loaded ${cache.files.length} library files from ${cacheFile}`);
			return { index: createLibraryIndex(cache.files), source: "cache", failures: [] };
		}
	}

	log.info(`Scanning music library at ${root}`);
	const filePaths = await findAudioFiles(root);
	log.info(`Found ${filePaths.length} audio files`);

	const { files, failures } = await buildLibraryCache(filePaths, {
		...options,
		logInterval: config.progress.cacheLogInterval,
	});
	if (failures.length > 0) {
		log.warn(`${failures.length} files could not be read`);
	}

	saveLibraryCache(cacheFile, root, files);
	log.info(`Saved library cache with ${files.length} files to ${cacheFile}`);
	return { index: createLibraryIndex(files), source: "scan", failures };
}

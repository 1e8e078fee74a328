import fs from "fs";
import path from "path";
import got from "got";
import { parse as parseYaml } from "yaml";
import { createLogger } from "../logger.js";
import { toTitleCase } from "../utils/index.js";
import { flattenGenreTree, type Genre } from "./tree.js";

// Genre whitelist and tree from beets' lastgenre plugin (MIT licensed).
const BEETS_RAW_URL = "https://raw.githubusercontent.com/beetbox/beets/master";

export const GENRE_FILES = {
	list: { url: `${BEETS_RAW_URL}/beetsplug/lastgenre/genres.txt`, fileName: "genres.txt" },
	tree: { url: `${BEETS_RAW_URL}/beetsplug/lastgenre/genres-tree.yaml`, fileName: "genres-tree.yaml" },
	license: { url: `${BEETS_RAW_URL}/LICENSE`, fileName: "LICENSE_BEETS_GENRES.md" },
} as const;

export interface GenreData {
	/** Title-cased genre names that may be used as tags. */
	whitelist: Set<string>;
	tree: Genre[];
	/** Tree nodes keyed by title-cased name. */
	byName: Map<string, Genre>;
}

export type TextDownloader = (url: string) => Promise<string>;

const downloadText: TextDownloader = (url) => got(url, { timeout: { request: 30_000 } }).text();

const log = createLogger("genres");

function genreFilePaths(cacheDir: string) {
	return {
		list: path.join(cacheDir, GENRE_FILES.list.fileName),
		tree: path.join(cacheDir, GENRE_FILES.tree.fileName),
		license: path.join(cacheDir, GENRE_FILES.license.fileName),
	};
}

/**
 * Download the genre list, tree and license into `cacheDir` unless the
 * list and tree are already there. Returns whether anything was downloaded.
 */
export async function ensureGenreData(
	cacheDir: string,
	options: { force?: boolean; download?: TextDownloader } = {}
): Promise<boolean> {
	const { force = false, download = downloadText } = options;
	const paths = genreFilePaths(cacheDir);

	if (!force && fs.existsSync(paths.list) && fs.existsSync(paths.tree)) {
		return false;
	}

	log.info("Downloading genre data...");
	fs.mkdirSync(cacheDir, { recursive: true });
	for (const key of ["list", "tree", "license"] as const) {
		log.debug(`Downloading ${GENRE_FILES[key].url}`);
		fs.writeFileSync(paths[key], await download(GENRE_FILES[key].url), "utf-8");
	}
	log.info("Genre data downloaded.");
	return true;
}

export function parseGenreData(listText: string, treeYaml: string): GenreData {
	const whitelist = new Set(
		listText
			.split(/\r?\n/)
			.map((line) => line.trim())
			.filter((line) => line.length > 0)
			.map(toTitleCase)
	);

	const tree = flattenGenreTree(parseYaml(treeYaml));
	const byName = new Map<string, Genre>();
	for (const genre of tree) {
		const key = toTitleCase(genre.name);
		if (!byName.has(key)) byName.set(key, genre);
	}

	return { whitelist, tree, byName };
}

export function loadGenreData(cacheDir: string): GenreData {
	const paths = genreFilePaths(cacheDir);
	const data = parseGenreData(fs.readFileSync(paths.list, "utf-8"), fs.readFileSync(paths.tree, "utf-8"));
	log.info(`Loaded ${data.whitelist.size} genres (${data.tree.length} in the tree)`);
	return data;
}

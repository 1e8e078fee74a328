import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import { parseFile } from "music-metadata";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { processInBatches } from "../utils/batch.js";
import type { LibraryFile, LibraryFileReader, LibraryScanFailure, LibraryScanResult } from "./types.js";

export const AUDIO_EXTENSIONS = new Set([".mp3", ".ogg", ".wav", ".flac", ".m4a"]);

const log = createLogger("library");

function isAudioFile(filename: string): boolean {
	return AUDIO_EXTENSIONS.has(path.extname(filename).toLowerCase());
}

/** Empty tags count as missing. */
function tag(value: string | undefined): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}

/**
 * Recursively find all audio files below `root`, sorted by path.
 */
export async function findAudioFiles(root: string): Promise<string[]> {
	const files: string[] = [];

	async function walk(dir: string): Promise<void> {
		let entries: Dirent[];
		try {
			entries = await fs.readdir(dir, { withFileTypes: true });
		} catch (error) {
			log.warn(`Cannot read directory ${dir}: ${errorMessage(error)}`);
			return;
		}

		for (const entry of entries) {
			const fullPath = path.join(dir, entry.name);
			if (entry.isDirectory()) {
				await walk(fullPath);
			} else if (entry.isFile() && isAudioFile(entry.name)) {
				files.push(fullPath);
			}
		}
	}

	await walk(root);
	return files.sort();
}

/**
 * Read the tags of one audio file with music-metadata.
 */
export async function readLibraryFile(filePath: string): Promise<LibraryFile> {
	const { common, format } = await parseFile(filePath, { duration: true, skipCovers: true });

	return {
		filePath,
		trackLength: format.duration ?? 0,
		artistName: tag(common.artist),
		artistMbid: tag(common.musicbrainz_artistid?.[0]),
		albumName: tag(common.album),
		albumMbid: tag(common.musicbrainz_albumid),
		trackTitle: tag(common.title),
		trackMbid: tag(common.musicbrainz_recordingid),
		genres: (common.genre ?? []).map((genre) => genre.trim()).filter((genre) => genre.length > 0),
	};
}

export interface BuildLibraryOptions {
	reader?: LibraryFileReader;
	concurrency?: number;
	/** Log progress every this many files. */
	logInterval?: number;
	onProgress?: (done: number, total: number) => void;
}

/**
 * Read every file, skipping (and reporting) the ones that can't be parsed.
 */
export async function buildLibraryCache(
	filePaths: string[],
	options: BuildLibraryOptions = {}
): Promise<LibraryScanResult> {
	const { reader = readLibraryFile, concurrency = 8, logInterval = 100, onProgress } = options;
	const failures: LibraryScanFailure[] = [];
	let done = 0;

	const results = await processInBatches(filePaths, concurrency, async (filePath) => {
		let file: LibraryFile | null = null;
		try {
			file = await reader(filePath);
		} catch (error) {
			failures.push({ filePath, error: errorMessage(error) });
			log.debug(`Could not read ${filePath}: ${errorMessage(error)}`);
		}

		done++;
		onProgress?.(done, filePaths.length);
		if (done % logInterval === 0) {
			log.info(`Read ${done}/${filePaths.length} files`);
		}
		return file;
	});

	return {
		files: results.filter((file): file is LibraryFile => file !== null),
		failures,
	};
}

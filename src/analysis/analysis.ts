import type { GenreResolver } from "../genres/resolver.js";
import type { ScrobbledTrack } from "../lastfm/types.js";
import type { LibraryFile } from "../library/types.js";
import { createLogger } from "../logger.js";
import type { MusicBrainzClient, ReleaseTrack } from "../musicbrainz/client.js";
import { writeSpreadsheet, type WriteSpreadsheetOptions } from "../export/spreadsheet.js";
import { writeResolvedTags } from "../tags/tagger.js";
import { errorMessage } from "../errors.js";
import { percentage } from "../utils/index.js";
import { buildYouTubeQuery, type YouTubeMatcher } from "../youtube/search.js";
import type { LibraryMatcher } from "./matcher.js";
import { writeFailureLog } from "./report.js";
import {
	TRACK_SOURCES,
	type AnalysisSummary,
	type ExtendedScrobble,
	type SourceCounts,
	type TrackSource,
} from "./types.js";

export interface EnricherDependencies {
	matcher: LibraryMatcher;
	musicbrainz?: Pick<MusicBrainzClient, "findReleaseTrack">;
	youtube?: Pick<YouTubeMatcher, "findDuration">;
	genres?: Pick<GenreResolver, "fromMetadata">;
}

export function emptySourceCounts(): SourceCounts {
	return { local_library_mbid: 0, local_library_metadata: 0, musicbrainz: 0, youtube: 0, basic: 0 };
}

function fromScrobble(scrobble: ScrobbledTrack, source: TrackSource): ExtendedScrobble {
	return {
		scrobbledAt: scrobble.scrobbledAt,
		source,
		artistName: scrobble.artist.name,
		artistMbid: scrobble.artist.mbid,
		albumName: scrobble.album?.name,
		albumMbid: scrobble.album?.mbid,
		trackTitle: scrobble.trackName,
		trackMbid: scrobble.trackMbid,
	};
}

/** Tags of the local file win; the scrobble fills the gaps. */
function fromLibraryFile(scrobble: ScrobbledTrack, file: LibraryFile, source: TrackSource): ExtendedScrobble {
	const base = fromScrobble(scrobble, source);
	return {
		...base,
		artistName: file.artistName ?? base.artistName,
		artistMbid: file.artistMbid ?? base.artistMbid,
		albumName: file.albumName ?? base.albumName,
		albumMbid: file.albumMbid ?? base.albumMbid,
		trackTitle: file.trackTitle ?? base.trackTitle,
		trackMbid: file.trackMbid ?? base.trackMbid,
		trackLength: file.trackLength,
		genres: file.genres.length > 0 ? file.genres : undefined,
		filePath: file.filePath,
	};
}

function fromReleaseTrack(scrobble: ScrobbledTrack, track: ReleaseTrack): ExtendedScrobble {
	return {
		...fromScrobble(scrobble, "musicbrainz"),
		albumName: track.albumTitle,
		albumMbid: track.albumMbid,
		trackTitle: track.trackTitle,
		trackMbid: track.trackMbid,
		trackLength: track.trackLength,
	};
}

const log = createLogger("analysis");

/**
 * Finds the best available data for each scrobble, trying sources in
 * order: local file by MBID, local file by metadata, MusicBrainz,
 * YouTube, and finally the scrobble itself.
 */
export class ScrobbleEnricher {
	constructor(private readonly deps: EnricherDependencies) {}

	private async findSource(scrobble: ScrobbledTrack): Promise<ExtendedScrobble> {
		const { matcher, musicbrainz, youtube } = this.deps;

		const byMbid = matcher.findByMbid(scrobble);
		if (byMbid) return fromLibraryFile(scrobble, byMbid, "local_library_mbid");

		const byMetadata = matcher.findByMetadata(scrobble);
		if (byMetadata) return fromLibraryFile(scrobble, byMetadata, "local_library_metadata");

		if (musicbrainz && scrobble.trackMbid) {
			const releaseTrack = await musicbrainz.findReleaseTrack(scrobble.trackMbid);
			if (releaseTrack) return fromReleaseTrack(scrobble, releaseTrack);
		}

		if (youtube) {
			const query = buildYouTubeQuery(scrobble.artist.name, scrobble.album?.name, scrobble.trackName);
			const duration = await youtube.findDuration(query);
			if (duration !== null) {
				return { ...fromScrobble(scrobble, "youtube"), trackLength: duration };
			}
		}

		return fromScrobble(scrobble, "basic");
	}

	async enrichScrobble(scrobble: ScrobbledTrack): Promise<ExtendedScrobble> {
		const extended = await this.findSource(scrobble);
		log.debug(`${extended.source}: ${scrobble.artist.name} - ${scrobble.trackName}`);

		if (extended.genres === undefined && this.deps.genres) {
			const genres = await this.deps.genres.fromMetadata(
				extended.trackTitle,
				extended.albumName,
				extended.artistName
			);
			if (genres !== null) extended.genres = genres;
		}

		return extended;
	}
}

export interface AnalysisOptions {
	scrobbles: ScrobbledTrack[];
	enricher: ScrobbleEnricher;
	outputPath: string;
	failureLogPath: string;
	/** Log progress every this many scrobbles. */
	parseLogInterval: number;
	/** Write genres and MBIDs back into matched local MP3 files. */
	writeTags?: boolean;
	spreadsheet?: WriteSpreadsheetOptions;
	onProgress?: (done: number, total: number) => void;
}

/**
 * Tag every matched local file once, with its most recent scrobble.
 */
function tagLibraryFiles(scrobbles: ExtendedScrobble[], failureLogPath: string): number {
	const latestByFile = new Map<string, ExtendedScrobble>();
	for (const scrobble of scrobbles) {
		if (scrobble.filePath) latestByFile.set(scrobble.filePath, scrobble);
	}

	let tagged = 0;
	for (const [filePath, scrobble] of latestByFile) {
		try {
			if (writeResolvedTags(filePath, scrobble)) tagged++;
		} catch (error) {
			log.warn(errorMessage(error));
			writeFailureLog(failureLogPath, {
				scrobbledAt: scrobble.scrobbledAt,
				artist: scrobble.artistName,
				track: scrobble.trackTitle,
				filePath,
				error: errorMessage(error),
				type: "tag_write",
			});
		}
	}
	return tagged;
}

/**
 * Enrich every scrobble, write the spreadsheet and optionally the tags.
 * A scrobble that fails is logged and left out; the run continues.
 */
export async function runAnalysis(options: AnalysisOptions): Promise<AnalysisSummary> {
	const startTime = Date.now();
	const { scrobbles, enricher } = options;
	const extended: ExtendedScrobble[] = [];
	let failed = 0;

	for (const [index, scrobble] of scrobbles.entries()) {
		try {
			extended.push(await enricher.enrichScrobble(scrobble));
		} catch (error) {
			failed++;
			const label = `${scrobble.artist.name} - ${scrobble.trackName}`;
			log.warn(`Failed to process scrobble "${label}": ${errorMessage(error)}`);
			writeFailureLog(options.failureLogPath, {
				scrobbledAt: scrobble.scrobbledAt,
				artist: scrobble.artist.name,
				track: scrobble.trackName,
				error: errorMessage(error),
				type: "enrich",
			});
		}

		const done = index + 1;
		options.onProgress?.(done, scrobbles.length);
		if (done % options.parseLogInterval === 0) {
			log.info(`Parsing progress: ${done} scrobbles (${percentage(done, scrobbles.length)}%)`);
		}
	}

	await writeSpreadsheet(options.outputPath, extended, options.spreadsheet);

	const taggedFiles = options.writeTags ? tagLibraryFiles(extended, options.failureLogPath) : 0;

	const counts = emptySourceCounts();
	for (const scrobble of extended) {
		counts[scrobble.source]++;
	}
	const percentages = emptySourceCounts();
	for (const source of TRACK_SOURCES) {
		percentages[source] = percentage(counts[source], extended.length);
	}

	return {
		totalScrobbles: scrobbles.length,
		processed: extended.length,
		failed,
		counts,
		percentages,
		outputPath: options.outputPath,
		taggedFiles,
		duration: Date.now() - startTime,
	};
}

import type { ScrobbledTrack } from "../lastfm/types.js";
import type { LibraryFile, LibraryIndex } from "../library/types.js";
import { createLogger } from "../logger.js";
import { extractOne, ratio } from "../matching/fuzzy.js";
import { cacheKey } from "../utils/index.js";

export interface MatchThresholds {
	fuzzyMinArtist: number;
	fuzzyMinAlbum: number;
	fuzzyMinTitle: number;
}

const log = createLogger("matcher");

function uniqueNames(files: LibraryFile[], pick: (file: LibraryFile) => string | undefined): string[] {
	const names = new Set<string>();
	for (const file of files) {
		const name = pick(file);
		if (name !== undefined) names.add(name);
	}
	return [...names];
}

/**
 * Matches scrobbles against the local music library.
 */
export class LibraryMatcher {
	private readonly partialCache = new Map<string, LibraryFile | null>();

	constructor(
		private readonly index: LibraryIndex,
		private readonly thresholds: MatchThresholds
	) {}

	findByMbid(scrobble: ScrobbledTrack): LibraryFile | null {
		if (!scrobble.trackMbid) return null;
		return this.index.byTrackMbid.get(scrobble.trackMbid) ?? null;
	}

	/**
	 * Exact title match, narrowed by exact artist and then exact album name
	 * while more than one file is left. Ambiguity gives no match.
	 */
	findByFullMetadata(scrobble: ScrobbledTrack): LibraryFile | null {
		let matches = this.index.byTitle.get(scrobble.trackName) ?? [];

		const narrowings: Array<(file: LibraryFile) => boolean> = [
			(file) => file.artistName === scrobble.artist.name,
			(file) => file.albumName === scrobble.album?.name,
		];

		for (const keep of narrowings) {
			if (matches.length <= 1) break;
			matches = matches.filter(keep);
		}

		if (matches.length === 1) return matches[0];
		if (matches.length > 1) {
			log.warn(
				`Multiple full metadata matches for "${scrobble.artist.name} - ${scrobble.trackName}": ` +
					matches.map((file) => file.filePath).join(", ")
			);
		}
		return null;
	}

	/**
	 * Fuzzy match: closest artist, then (if the scrobble has one) closest
	 * album of that artist, then closest title among the remaining files.
	 */
	findByPartialMetadata(scrobble: ScrobbledTrack): LibraryFile | null {
		const key = cacheKey(scrobble.trackName, scrobble.album?.name, scrobble.artist.name);
		const cached = this.partialCache.get(key);
		if (cached !== undefined) {
			log.debug("findByPartialMetadata: cache hit");
			return cached;
		}

		const result = this.matchPartially(scrobble);
		this.partialCache.set(key, result);
		return result;
	}

	private matchPartially(scrobble: ScrobbledTrack): LibraryFile | null {
		const { fuzzyMinArtist, fuzzyMinAlbum, fuzzyMinTitle } = this.thresholds;

		const artist = extractOne(scrobble.artist.name, this.index.artistNames, ratio, fuzzyMinArtist);
		if (!artist) return null;

		let candidates = this.index.byArtist.get(artist.choice) ?? [];

		const albumName = scrobble.album?.name;
		if (albumName) {
			const album = extractOne(
				albumName,
				uniqueNames(candidates, (file) => file.albumName),
				ratio,
				fuzzyMinAlbum
			);
			if (album) {
				candidates = candidates.filter((file) => file.albumName === album.choice);
			}
		}

		const title = extractOne(
			scrobble.trackName,
			uniqueNames(candidates, (file) => file.trackTitle),
			ratio,
			fuzzyMinTitle
		);
		if (!title) return null;

		return candidates.find((file) => file.trackTitle === title.choice) ?? null;
	}

	findByMetadata(scrobble: ScrobbledTrack): LibraryFile | null {
		return this.findByFullMetadata(scrobble) ?? this.findByPartialMetadata(scrobble);
	}
}

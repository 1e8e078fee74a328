import { LastFmApiError, LastFmStructureError } from "../errors.js";
import type { LastFmClient } from "../lastfm/client.js";
import type { TagTarget, TopTag } from "../lastfm/types.js";
import { createLogger } from "../logger.js";
import { extractOne, weightedRatio } from "../matching/fuzzy.js";
import { cacheKey, toTitleCase } from "../utils/index.js";
import type { GenreData } from "./data.js";

export type TagSource = Pick<LastFmClient, "getTopTags" | "searchTracks" | "searchAlbums" | "searchArtists">;

export interface GenreResolverOptions {
	maxGenreCount: number;
	/** Tags must weigh more than this (Last.fm weights run 0-100). */
	minGenreWeight: number;
	searchPageLimit: number;
	/** Minimum weighted ratio when choosing an album from search results. */
	minLastfmSimilarity: number;
	/** Order deeper (more specific) genres of the tree first. */
	preferSpecific: boolean;
}

const log = createLogger("genres");

/**
 * Finds genres for a track from the Last.fm top tags of the track,
 * its album and its artist, filtered through the genre whitelist.
 */
export class GenreResolver {
	private readonly cache = new Map<string, string[] | null>();

	constructor(
		private readonly lastfm: TagSource,
		private readonly data: GenreData,
		private readonly options: GenreResolverOptions
	) {}

	/**
	 * Turn raw tags into at most `maxGenreCount` whitelisted genre names,
	 * heaviest first.
	 */
	selectGenres(tags: TopTag[]): string[] {
		const names = tags
			.filter((tag) => tag.weight > this.options.minGenreWeight)
			.sort((a, b) => b.weight - a.weight)
			.map((tag) => toTitleCase(tag.name));

		let genres = [...new Set(names)].filter((name) => this.data.whitelist.has(name));

		if (this.options.preferSpecific) {
			const depth = (name: string) => this.data.byName.get(name)?.depth ?? -1;
			genres = genres.sort((a, b) => depth(b) - depth(a));
		}

		return genres.slice(0, this.options.maxGenreCount);
	}

	private async cached(key: string, resolve: () => Promise<string[] | null>): Promise<string[] | null> {
		const hit = this.cache.get(key);
		if (hit !== undefined) {
			log.debug(`Cache hit for ${key}`);
			return hit;
		}

		let result: string[] | null;
		try {
			result = await resolve();
		} catch (error) {
			if (!(error instanceof LastFmApiError || error instanceof LastFmStructureError)) {
				throw error;
			}
			log.debug(`No genres for ${key}: ${error.message}`);
			result = null;
		}

		this.cache.set(key, result);
		return result;
	}

	private async tagsOf(targets: TagTarget[]): Promise<string[]> {
		const tags: TopTag[] = [];
		for (const target of targets) {
			tags.push(...(await this.lastfm.getTopTags(target)));
		}
		return this.selectGenres(tags);
	}

	async fromMbids(trackMbid: string, albumMbid: string, artistMbid: string): Promise<string[] | null> {
		return this.cached(cacheKey("mbid", trackMbid, albumMbid, artistMbid), () =>
			this.tagsOf([
				{ type: "track", mbid: trackMbid },
				{ type: "album", mbid: albumMbid },
				{ type: "artist", mbid: artistMbid },
			])
		);
	}

	/**
	 * Search Last.fm for the track, album and artist by name. The first
	 * track and artist results are used as Last.fm ranks them; the album
	 * is the closest title. Without an album only track and artist tags count.
	 */
	async fromMetadata(title: string, album: string | undefined, artist: string): Promise<string[] | null> {
		return this.cached(cacheKey("metadata", title, album, artist), async () => {
			const pageLimit = this.options.searchPageLimit;

			const [track] = await this.lastfm.searchTracks(artist, title, pageLimit);
			if (!track) return null;

			const targets: TagTarget[] = [{ type: "track", artist: track.artist, track: track.name }];

			if (album) {
				const albums = await this.lastfm.searchAlbums(album, pageLimit);
				const best = extractOne(
					album,
					albums.map((candidate) => candidate.name),
					weightedRatio,
					this.options.minLastfmSimilarity
				);
				if (!best) return null;

				const chosen = albums[best.index];
				targets.push({ type: "album", artist: chosen.artist, album: chosen.name });
			}

			const [foundArtist] = await this.lastfm.searchArtists(artist, pageLimit);
			if (!foundArtist) return null;
			targets.push({ type: "artist", artist: foundArtist.name });

			return this.tagsOf(targets);
		});
	}
}

import yts from "yt-search";
import { createLogger } from "../logger.js";
import { extractOne, partialRatio } from "../matching/fuzzy.js";

export interface VideoResult {
	title: string;
	/** "h:mm:ss", "m:ss" or "s". */
	timestamp: string;
}

export type VideoSearch = (query: string) => Promise<VideoResult[]>;

export const searchYouTube: VideoSearch = async (query) => {
	const result = await yts(query);
	return result.videos.map((video) => ({ title: video.title, timestamp: video.timestamp }));
};

/**
 * Convert a YouTube duration to seconds. Returns null for anything that
 * isn't one to three colon-separated numbers (live streams, premieres).
 */
export function parseDuration(timestamp: string): number | null {
	const parts = timestamp.trim().split(":");
	if (parts.length > 3 || parts.some((part) => !/^\d+$/.test(part))) {
		return null;
	}
	return parts.reduce((seconds, part) => seconds * 60 + Number(part), 0);
}

/** Search query from the non-empty parts, in artist, album, title order. */
export function buildYouTubeQuery(artist: string, album: string | undefined, title: string): string {
	return [artist, album, title]
		.map((part) => part?.trim() ?? "")
		.filter((part) => part.length > 0)
		.join(" ");
}

export interface YouTubeMatcherOptions {
	search?: VideoSearch;
	maxResults?: number;
	/** Minimum partial ratio between the query and a video title. */
	minTitleScore: number;
}

const log = createLogger("youtube");

export class YouTubeMatcher {
	private readonly search: VideoSearch;
	private readonly maxResults: number;
	private readonly minTitleScore: number;
	private readonly cache = new Map<string, number | null>();

	constructor(options: YouTubeMatcherOptions) {
		this.search = options.search ?? searchYouTube;
		this.maxResults = options.maxResults ?? 8;
		this.minTitleScore = options.minTitleScore;
	}

	/**
	 * Duration in seconds of the video whose title best matches `query`.
	 */
	async findDuration(query: string): Promise<number | null> {
		const cached = this.cache.get(query);
		if (cached !== undefined) {
			log.debug(`Using cached search for "${query}"`);
			return cached;
		}

		const videos = (await this.search(query)).slice(0, this.maxResults);
		const match = extractOne(
			query,
			videos.map((video) => video.title),
			partialRatio,
			this.minTitleScore
		);

		const duration = match ? parseDuration(videos[match.index].timestamp) : null;
		log.debug(match ? `Hit for "${query}": ${match.choice}` : `No hit for "${query}"`);

		this.cache.set(query, duration);
		return duration;
	}
}

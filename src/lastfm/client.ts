import axios, { type AxiosInstance } from "axios";
import { LastFmApiError, LastFmStructureError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { sleep } from "../utils/index.js";
import { RateLimiter } from "../utils/rate-limiter.js";
import { parseOptionalMbid, parseUserRecentTracks } from "./parse.js";
import {
	rawAlbumSearchSchema,
	rawArtistSearchSchema,
	rawErrorSchema,
	rawTopTagsSchema,
	rawTrackSearchSchema,
	type SearchAlbum,
	type SearchArtist,
	type SearchTrack,
	type TagTarget,
	type TopTag,
	type UserRecentTracks,
	type UserRecentTracksOptions,
} from "./types.js";

export const DEFAULT_LASTFM_API_ROOT_URL = "https://ws.audioscrobbler.com/2.0/";

/** Maximum page size of user.getRecentTracks. */
export const MAX_RECENT_TRACKS_PER_PAGE = 200;

const SEARCH_PAGE_SIZE = 50;
const NETWORK_ERROR_CODES = ["ECONNABORTED", "ECONNREFUSED", "ECONNRESET", "ENETRESET", "ETIMEDOUT"];

type QueryParams = Record<string, string | number | undefined>;

export interface LastFmClientOptions {
	apiKey: string;
	baseUrl?: string;
	/** Minimum spacing between two requests. */
	requestIntervalMs?: number;
	/** How often a transient failure is retried before giving up. */
	maxRetries?: number;
	retryDelayMs?: number;
	http?: AxiosInstance;
}

const log = createLogger("lastfm");

function toUnixSeconds(date: Date): number {
	return Math.floor(date.getTime() / 1000);
}

export class LastFmClient {
	private readonly apiKey: string;
	private readonly baseUrl: string;
	private readonly http: AxiosInstance;
	private readonly limiter: RateLimiter;
	private readonly maxRetries: number;
	private readonly retryDelayMs: number;

	constructor(options: LastFmClientOptions) {
		this.apiKey = options.apiKey;
		this.baseUrl = options.baseUrl ?? DEFAULT_LASTFM_API_ROOT_URL;
		this.http = options.http ?? axios.create({ timeout: 30_000 });
		this.limiter = new RateLimiter(options.requestIntervalMs ?? 200);
		this.maxRetries = options.maxRetries ?? 3;
		this.retryDelayMs = options.retryDelayMs ?? 5000;
	}

	/**
	 * Call a Last.fm API method and return the JSON body.
	 * Error bodies become LastFmApiError; transient failures are retried.
	 */
	async call(method: string, params: QueryParams = {}, attempt = 0): Promise<unknown> {
		try {
			return await this.limiter.schedule(() => this.request(method, params));
		} catch (error) {
			if (attempt < this.maxRetries && this.isTransient(error)) {
				log.warn(`${method} failed (${errorMessage(error)}), retrying`);
				await sleep(this.retryDelayMs);
				return this.call(method, params, attempt + 1);
			}
			throw error;
		}
	}

	private isTransient(error: unknown): boolean {
		if (error instanceof LastFmApiError) return error.isTransient;
		if (axios.isAxiosError(error)) {
			if (NETWORK_ERROR_CODES.includes(error.code || "")) return true;
			const status = error.response?.status;
			return status !== undefined && status >= 500;
		}
		return false;
	}

	private async request(method: string, params: QueryParams): Promise<unknown> {
		log.debug(`GET ${method} ${JSON.stringify(params)}`);
		const response = await this.http.get<unknown>(this.baseUrl, {
			params: { method, ...params, api_key: this.apiKey, format: "json" },
			// Last.fm reports errors in the body, often with a 4xx status
			validateStatus: () => true,
		});

		const apiError = rawErrorSchema.safeParse(response.data);
		if (apiError.success) {
			throw new LastFmApiError(apiError.data.error, apiError.data.message);
		}
		if (response.status >= 500) {
			throw new axios.AxiosError(
				`Last.fm returned HTTP ${response.status}`,
				undefined,
				response.config,
				undefined,
				response
			);
		}
		if (response.status < 200 || response.status >= 300) {
			throw new LastFmStructureError(`Last.fm returned HTTP ${response.status} without an error body`);
		}
		return response.data;
	}

	// ===== User =====

	async getUserRecentTracks(username: string, options: UserRecentTracksOptions = {}): Promise<UserRecentTracks> {
		const limit = options.resultsPerPage ?? MAX_RECENT_TRACKS_PER_PAGE;
		if (limit < 1 || limit > MAX_RECENT_TRACKS_PER_PAGE) {
			throw new RangeError(`resultsPerPage must be between 1 and ${MAX_RECENT_TRACKS_PER_PAGE}`);
		}

		const body = await this.call("user.getrecenttracks", {
			limit,
			user: username,
			page: options.page ?? 1,
			from: options.from ? toUnixSeconds(options.from) : undefined,
			to: options.to ? toUnixSeconds(options.to) : undefined,
			extended: (options.extended ?? true) ? 1 : 0,
		});
		return parseUserRecentTracks(body);
	}

	// ===== Tags =====

	async getTopTags(target: TagTarget): Promise<TopTag[]> {
		const method = `${target.type}.gettoptags`;
		let params: QueryParams;
		if ("mbid" in target) {
			params = { mbid: target.mbid };
		} else if ("track" in target) {
			params = { artist: target.artist, track: target.track, autocorrect: 1 };
		} else if ("album" in target) {
			params = { artist: target.artist, album: target.album, autocorrect: 1 };
		} else {
			params = { artist: target.artist, autocorrect: 1 };
		}

		const body = rawTopTagsSchema.safeParse(await this.call(method, params));
		if (!body.success) {
			throw new LastFmStructureError(`Unexpected ${method} structure`, { cause: body.error });
		}
		return body.data.toptags.tag.map((tag) => ({ name: tag.name, weight: tag.count }));
	}

	// ===== Search =====

	/**
	 * Fetch successive result pages until one comes back empty, or
	 * `pageLimit` pages have been read. Last.fm often returns short pages
	 * before the last one.
	 */
	private async searchPages<T>(
		method: string,
		params: QueryParams,
		pageLimit: number,
		extract: (body: unknown) => T[]
	): Promise<T[]> {
		const results: T[] = [];
		for (let page = 1; page <= pageLimit; page++) {
			const items = extract(await this.call(method, { ...params, page, limit: SEARCH_PAGE_SIZE }));
			results.push(...items);
			if (items.length === 0) break;
		}
		return results;
	}

	async searchTracks(artist: string, title: string, pageLimit = 1): Promise<SearchTrack[]> {
		return this.searchPages("track.search", { artist, track: title }, pageLimit, (body) => {
			const parsed = rawTrackSearchSchema.safeParse(body);
			if (!parsed.success) {
				throw new LastFmStructureError("Unexpected track.search structure", { cause: parsed.error });
			}
			return parsed.data.results.trackmatches.track.map((track) => ({
				name: track.name,
				artist: track.artist,
				mbid: parseOptionalMbid(track.mbid, "track.mbid"),
			}));
		});
	}

	async searchAlbums(title: string, pageLimit = 1): Promise<SearchAlbum[]> {
		return this.searchPages("album.search", { album: title }, pageLimit, (body) => {
			const parsed = rawAlbumSearchSchema.safeParse(body);
			if (!parsed.success) {
				throw new LastFmStructureError("Unexpected album.search structure", { cause: parsed.error });
			}
			return parsed.data.results.albummatches.album.map((album) => ({
				name: album.name,
				artist: album.artist,
				mbid: parseOptionalMbid(album.mbid, "album.mbid"),
			}));
		});
	}

	async searchArtists(name: string, pageLimit = 1): Promise<SearchArtist[]> {
		return this.searchPages("artist.search", { artist: name }, pageLimit, (body) => {
			const parsed = rawArtistSearchSchema.safeParse(body);
			if (!parsed.success) {
				throw new LastFmStructureError("Unexpected artist.search structure", { cause: parsed.error });
			}
			return parsed.data.results.artistmatches.artist.map((artist) => ({
				name: artist.name,
				mbid: parseOptionalMbid(artist.mbid, "artist.mbid"),
			}));
		});
	}
}

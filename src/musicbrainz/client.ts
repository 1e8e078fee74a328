import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { MusicBrainzError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { roundTo } from "../utils/index.js";
import { RateLimiter } from "../utils/rate-limiter.js";

export const MUSICBRAINZ_RELEASE_URL = "https://musicbrainz.org/ws/2/release";

const releaseSearchSchema = z.object({
	"release-count": z.number().optional(),
	releases: z
		.array(
			z.object({
				id: z.string(),
				title: z.string(),
				media: z
					.array(
						z.object({
							tracks: z
								.array(
									z.object({
										id: z.string(),
										title: z.string(),
										length: z.number().nullable().optional(),
										recording: z.object({ id: z.string() }).optional(),
									})
								)
								.default([]),
						})
					)
					.default([]),
			})
		)
		.default([]),
});

/** A track as it appears on a MusicBrainz release. */
export interface ReleaseTrack {
	trackTitle: string;
	trackMbid: string;
	/** Seconds, one decimal. */
	trackLength?: number;
	albumTitle: string;
	albumMbid: string;
}

export interface MusicBrainzClientOptions {
	/** Contact URL or e-mail for the User-Agent header. */
	contact: string;
	version: string;
	requestIntervalMs?: number;
	http?: AxiosInstance;
}

const log = createLogger("musicbrainz");

export class MusicBrainzClient {
	private readonly http: AxiosInstance;
	private readonly limiter: RateLimiter;
	private readonly userAgent: string;
	private readonly cache = new Map<string, ReleaseTrack | null>();

	constructor(options: MusicBrainzClientOptions) {
		// https://musicbrainz.org/doc/MusicBrainz_API/Rate_Limiting
		this.userAgent = `extended-scrobbles/${options.version} ( ${options.contact} )`;
		this.http = options.http ?? axios.create({ timeout: 30_000 });
		this.limiter = new RateLimiter(options.requestIntervalMs ?? 1000);
	}

	/**
	 * Look up the first release containing the track with this MBID.
	 * Misses are cached as well as hits.
	 */
	async findReleaseTrack(trackMbid: string, options: { ignoreCache?: boolean } = {}): Promise<ReleaseTrack | null> {
		if (!options.ignoreCache && this.cache.has(trackMbid)) {
			log.debug(`findReleaseTrack: cache hit for ${trackMbid}`);
			return this.cache.get(trackMbid) ?? null;
		}

		log.debug(`findReleaseTrack: cache miss for ${trackMbid}, requesting`);
		const result = await this.requestReleaseTrack(trackMbid);
		this.cache.set(trackMbid, result);
		return result;
	}

	private async requestReleaseTrack(trackMbid: string): Promise<ReleaseTrack | null> {
		let data: unknown;
		let status: number;
		try {
			const response = await this.limiter.schedule(() =>
				this.http.get<unknown>(MUSICBRAINZ_RELEASE_URL, {
					params: { track: trackMbid, fmt: "json" },
					headers: { "User-Agent": this.userAgent, Accept: "application/json" },
					validateStatus: () => true,
				})
			);
			data = response.data;
			status = response.status;
		} catch (error) {
			throw new MusicBrainzError(`Release lookup for ${trackMbid} failed: ${errorMessage(error)}`, {
				cause: error,
			});
		}

		if (status < 200 || status >= 300) {
			throw new MusicBrainzError(`Release lookup for ${trackMbid} returned HTTP ${status}`);
		}

		const parsed = releaseSearchSchema.safeParse(data);
		if (!parsed.success) {
			throw new MusicBrainzError(`Unexpected release lookup structure for ${trackMbid}`, { cause: parsed.error });
		}

		const release = parsed.data.releases[0];
		if (!release) {
			return null;
		}

		for (const medium of release.media) {
			for (const track of medium.tracks) {
				if (track.id !== trackMbid && track.recording?.id !== trackMbid) continue;

				return {
					trackTitle: track.title,
					trackMbid: track.id,
					trackLength: typeof track.length === "number" ? roundTo(track.length / 1000, 1) : undefined,
					albumTitle: release.title,
					albumMbid: release.id,
				};
			}
		}
		return null;
	}
}

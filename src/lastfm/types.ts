import { z } from "zod";

/**
 * Raw response shapes of the Last.fm web service. Field descriptions come from
 * inspecting real user.getRecentTracks responses; Last.fm doesn't document them.
 */

const rawImageSchema = z.object({
	size: z.string(),
	"#text": z.string(),
});

/** Returned when the request was made with `extended=1`. */
const rawExtendedArtistSchema = z.object({
	name: z.string(),
	mbid: z.string().default(""),
	url: z.string().optional(),
	image: z.array(rawImageSchema).default([]),
});

const rawNormalArtistSchema = z.object({
	"#text": z.string(),
	mbid: z.string().default(""),
});

/**
 * If `#text` is empty, so is `mbid` (most common when scrobbling from YouTube).
 */
const rawAlbumSchema = z.object({
	mbid: z.string().default(""),
	"#text": z.string().default(""),
});

export const rawRecentTrackSchema = z.object({
	artist: z.union([rawExtendedArtistSchema, rawNormalArtistSchema]),
	streamable: z.string(),
	image: z.array(rawImageSchema).default([]),
	// Can be an empty string.
	mbid: z.string().default(""),
	album: rawAlbumSchema,
	name: z.string(),
	url: z.string(),
	// Missing on the track that is currently playing.
	date: z
		.object({
			uts: z.string(),
			"#text": z.string().optional(),
		})
		.optional(),
	loved: z.string().optional(),
	"@attr": z.object({ nowplaying: z.string() }).optional(),
});

export type RawRecentTrack = z.infer<typeof rawRecentTrackSchema>;
export type RawImage = z.infer<typeof rawImageSchema>;

/** Last.fm collapses one-element lists into a bare object. */
export function listOf<T extends z.ZodTypeAny>(item: T) {
	return z.preprocess((value) => {
		if (value === undefined || value === null) return [];
		return Array.isArray(value) ? value : [value];
	}, z.array(item));
}

export const rawUserRecentTracksSchema = z.object({
	recenttracks: z.object({
		track: listOf(z.unknown()),
		"@attr": z.object({
			user: z.string(),
			totalPages: z.string(),
			page: z.string(),
			perPage: z.string(),
			total: z.string(),
		}),
	}),
});

export const rawErrorSchema = z.object({
	error: z.number(),
	message: z.string().optional(),
});

const rawTopTagSchema = z.object({
	name: z.string(),
	count: z.coerce.number(),
});

export const rawTopTagsSchema = z.object({
	toptags: z.object({
		tag: listOf(rawTopTagSchema),
	}),
});

export const rawTrackSearchSchema = z.object({
	results: z.object({
		trackmatches: z.object({
			track: listOf(
				z.object({
					name: z.string(),
					artist: z.string(),
					mbid: z.string().default(""),
				})
			),
		}),
	}),
});

export const rawAlbumSearchSchema = z.object({
	results: z.object({
		albummatches: z.object({
			album: listOf(
				z.object({
					name: z.string(),
					artist: z.string(),
					mbid: z.string().default(""),
				})
			),
		}),
	}),
});

export const rawArtistSearchSchema = z.object({
	results: z.object({
		artistmatches: z.object({
			artist: listOf(
				z.object({
					name: z.string(),
					mbid: z.string().default(""),
				})
			),
		}),
	}),
});

// ═══════════════════════════════════════════════════════════════════════════════
// Parsed types
// ═══════════════════════════════════════════════════════════════════════════════

export const IMAGE_SIZES = ["small", "medium", "large", "extralarge"] as const;
export type ImageSize = (typeof IMAGE_SIZES)[number];

/** A 36 character MusicBrainz identifier. */
export type MusicBrainzId = string;

export interface Image {
	size: ImageSize;
	url: string;
}

export interface Artist {
	name: string;
	mbid?: MusicBrainzId;
	images: Image[];
}

export interface Album {
	name: string;
	mbid?: MusicBrainzId;
}

export interface ScrobbledTrack {
	trackName: string;
	trackMbid?: MusicBrainzId;
	trackUrl: string;
	trackImages: Image[];
	isStreamable: boolean;
	artist: Artist;
	album?: Album;
	/** Unix timestamp (seconds) of the scrobble. */
	scrobbledAt: number;
}

export interface UserRecentTracks {
	username: string;
	currentPage: number;
	totalPages: number;
	scrobblesPerPage: number;
	totalScrobbles: number;
	/** Scrobbles on this page. */
	scrobbledTracks: ScrobbledTrack[];
}

export interface UserRecentTracksOptions {
	/** At most 200. */
	resultsPerPage?: number;
	/** One-indexed. */
	page?: number;
	/** Include artist images and the loved flag. */
	extended?: boolean;
	/** Only scrobbles at or after this time. */
	from?: Date;
	/** Only scrobbles before this time. */
	to?: Date;
}

export interface TopTag {
	name: string;
	weight: number;
}

export type TagTarget =
	| { type: "track"; artist: string; track: string }
	| { type: "album"; artist: string; album: string }
	| { type: "artist"; artist: string }
	| { type: "track" | "album" | "artist"; mbid: MusicBrainzId };

export interface SearchTrack {
	name: string;
	artist: string;
	mbid?: MusicBrainzId;
}

export interface SearchAlbum {
	name: string;
	artist: string;
	mbid?: MusicBrainzId;
}

export interface SearchArtist {
	name: string;
	mbid?: MusicBrainzId;
}

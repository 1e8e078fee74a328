import { LastFmStructureError } from "../errors.js";
import {
	IMAGE_SIZES,
	rawRecentTrackSchema,
	rawUserRecentTracksSchema,
	type Album,
	type Artist,
	type Image,
	type ImageSize,
	type MusicBrainzId,
	type RawImage,
	type RawRecentTrack,
	type ScrobbledTrack,
	type UserRecentTracks,
} from "./types.js";

const TRACK_URL_HOST = "www.last.fm";
const IMAGE_URL_HOST = "lastfm.freetls.fastly.net";

export function isValidMusicBrainzId(value: string): boolean {
	return value.length === 36;
}

/**
 * Last.fm uses an empty string for "no MBID".
 */
export function parseOptionalMbid(value: string, field: string): MusicBrainzId | undefined {
	if (value === "") return undefined;
	if (!isValidMusicBrainzId(value)) {
		throw new LastFmStructureError(`Invalid MusicBrainz ID in ${field}: "${value}"`);
	}
	return value;
}

function isImageSize(value: string): value is ImageSize {
	return IMAGE_SIZES.some((size) => size === value);
}

function parseUrl(value: string, host: string, field: string): string {
	let url: URL;
	try {
		url = new URL(value);
	} catch (error) {
		throw new LastFmStructureError(`Invalid URL in ${field}: "${value}"`, { cause: error });
	}

	if (url.protocol !== "http:" && url.protocol !== "https:") {
		throw new LastFmStructureError(`Unexpected URL scheme in ${field}: "${value}"`);
	}
	if (url.hostname !== host) {
		throw new LastFmStructureError(`Unexpected URL host in ${field}: "${value}"`);
	}
	return value;
}

/** Empty image URLs are common and mean "no image". */
function parseImages(rawImages: RawImage[], field: string): Image[] {
	const images: Image[] = [];
	for (const raw of rawImages) {
		const url = raw["#text"];
		if (url === "") continue;

		if (!isImageSize(raw.size)) {
			throw new LastFmStructureError(`Unknown image size in ${field}: "${raw.size}"`);
		}
		images.push({ size: raw.size, url: parseUrl(url, IMAGE_URL_HOST, field) });
	}
	return images;
}

function parseArtist(raw: RawRecentTrack["artist"]): Artist {
	const name = "name" in raw ? raw.name : raw["#text"];
	if (name === "") {
		throw new LastFmStructureError("Artist name is empty");
	}

	return {
		name,
		mbid: parseOptionalMbid(raw.mbid, "artist.mbid"),
		images: "image" in raw ? parseImages(raw.image, "artist.image") : [],
	};
}

function parseAlbum(raw: RawRecentTrack["album"]): Album | undefined {
	const name = raw["#text"];
	const mbid = parseOptionalMbid(raw.mbid, "album.mbid");

	if (name === "") {
		if (mbid !== undefined) {
			throw new LastFmStructureError(`Album has an MBID (${mbid}) but no name`);
		}
		return undefined;
	}
	return mbid === undefined ? { name } : { name, mbid };
}

function parseStreamable(value: string): boolean {
	if (value === "0") return false;
	if (value === "1") return true;
	throw new LastFmStructureError(`Invalid streamable value: "${value}"`);
}

function parseInteger(value: string, field: string): number {
	const parsed = Number(value);
	if (value.trim() === "" || !Number.isInteger(parsed)) {
		throw new LastFmStructureError(`Invalid integer in ${field}: "${value}"`);
	}
	return parsed;
}

function isNowPlaying(raw: RawRecentTrack): boolean {
	return raw["@attr"]?.nowplaying === "true";
}

/**
 * Convert one raw track object. Returns null for the currently playing track,
 * which has no scrobble date yet.
 */
export function parseScrobbledTrack(value: unknown): ScrobbledTrack | null {
	const result = rawRecentTrackSchema.safeParse(value);
	if (!result.success) {
		throw new LastFmStructureError(`Unexpected track structure: ${result.error.issues[0]?.message}`, {
			cause: result.error,
		});
	}
	const raw = result.data;

	if (isNowPlaying(raw)) return null;
	if (raw.date === undefined) {
		throw new LastFmStructureError(`Track "${raw.name}" has no scrobble date`);
	}

	const track: ScrobbledTrack = {
		trackName: raw.name,
		trackUrl: parseUrl(raw.url, TRACK_URL_HOST, "url"),
		trackImages: parseImages(raw.image, "image"),
		isStreamable: parseStreamable(raw.streamable),
		artist: parseArtist(raw.artist),
		scrobbledAt: parseInteger(raw.date.uts, "date.uts"),
	};

	const trackMbid = parseOptionalMbid(raw.mbid, "mbid");
	if (trackMbid !== undefined) track.trackMbid = trackMbid;

	const album = parseAlbum(raw.album);
	if (album !== undefined) track.album = album;

	return track;
}

/**
 * Parse a list of raw track objects, dropping the currently playing one.
 */
export function parseScrobbledTracks(values: unknown[]): ScrobbledTrack[] {
	const tracks: ScrobbledTrack[] = [];
	for (const value of values) {
		const track = parseScrobbledTrack(value);
		if (track !== null) tracks.push(track);
	}
	return tracks;
}

/**
 * Parse a user.getRecentTracks response body.
 */
export function parseUserRecentTracks(body: unknown): UserRecentTracks {
	const result = rawUserRecentTracksSchema.safeParse(body);
	if (!result.success) {
		throw new LastFmStructureError(
			`Unexpected recent tracks structure: ${result.error.issues[0]?.message}`,
			{ cause: result.error }
		);
	}
	const { track, "@attr": attr } = result.data.recenttracks;

	return {
		username: attr.user,
		currentPage: parseInteger(attr.page, "@attr.page"),
		totalPages: parseInteger(attr.totalPages, "@attr.totalPages"),
		scrobblesPerPage: parseInteger(attr.perPage, "@attr.perPage"),
		totalScrobbles: parseInteger(attr.total, "@attr.total"),
		scrobbledTracks: parseScrobbledTracks(track),
	};
}

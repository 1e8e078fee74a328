import { describe, test, expect } from "vitest";
import { LastFmStructureError } from "../errors.js";
import { parseScrobbledTrack, parseUserRecentTracks } from "./parse.js";

const TRACK_MBID = "11111111-2222-3333-4444-555555555555";
const ALBUM_MBID = "aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee";

function rawTrack(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		artist: {
			url: "https://www.last.fm/music/Test+Artist",
			name: "Test Artist",
			image: [{ size: "small", "#text": "" }],
			mbid: "",
		},
		streamable: "0",
		image: [
			{ size: "small", "#text": "https://lastfm.freetls.fastly.net/i/u/34s/cover.png" },
			{ size: "large", "#text": "" },
		],
		mbid: TRACK_MBID,
		album: { mbid: ALBUM_MBID, "#text": "Test Album" },
		name: "Test Track",
		url: "https://www.last.fm/music/Test+Artist/_/Test+Track",
		date: { uts: "1700000000", "#text": "14 Nov 2023, 22:13" },
		loved: "0",
		...overrides,
	};
}

function recentTracksBody(track: unknown): unknown {
	return {
		recenttracks: {
			track,
			"@attr": { user: "tester", totalPages: "3", page: "1", perPage: "200", total: "401" },
		},
	};
}

describe("parseScrobbledTrack", () => {
	test("parses an extended track", () => {
		expect(parseScrobbledTrack(rawTrack())).toEqual({
			trackName: "Test Track",
			trackMbid: TRACK_MBID,
			trackUrl: "https://www.last.fm/music/Test+Artist/_/Test+Track",
			trackImages: [{ size: "small", url: "https://lastfm.freetls.fastly.net/i/u/34s/cover.png" }],
			isStreamable: false,
			artist: { name: "Test Artist", mbid: undefined, images: [] },
			album: { name: "Test Album", mbid: ALBUM_MBID },
			scrobbledAt: 1700000000,
		});
	});

	test("parses the non-extended artist form", () => {
		const track = parseScrobbledTrack(rawTrack({ artist: { "#text": "Plain Artist", mbid: "" } }));
		expect(track?.artist).toEqual({ name: "Plain Artist", mbid: undefined, images: [] });
	});

	test("skips the currently playing track", () => {
		const raw = rawTrack({ "@attr": { nowplaying: "true" } });
		delete raw.date;
		expect(parseScrobbledTrack(raw)).toBeNull();
	});

	test("treats an empty mbid as absent", () => {
		const track = parseScrobbledTrack(rawTrack({ mbid: "" }));
		expect(track).not.toBeNull();
		expect(track && "trackMbid" in track).toBe(false);
	});

	test("rejects an mbid of the wrong length", () => {
		expect(() => parseScrobbledTrack(rawTrack({ mbid: "1234" }))).toThrow(LastFmStructureError);
	});

	test("rejects an empty artist name", () => {
		expect(() => parseScrobbledTrack(rawTrack({ artist: { "#text": "", mbid: "" } }))).toThrow(
			/Artist name is empty/
		);
	});

	test("handles every album shape", () => {
		expect(parseScrobbledTrack(rawTrack({ album: { mbid: "", "#text": "" } }))?.album).toBeUndefined();
		expect(parseScrobbledTrack(rawTrack({ album: { mbid: "", "#text": "Only Name" } }))?.album).toEqual({
			name: "Only Name",
		});
		expect(() => parseScrobbledTrack(rawTrack({ album: { mbid: ALBUM_MBID, "#text": "" } }))).toThrow(
			/no name/
		);
	});

	test("requires a Last.fm track URL", () => {
		expect(() => parseScrobbledTrack(rawTrack({ url: "ftp://www.last.fm/music/x" }))).toThrow(/scheme/);
		expect(() => parseScrobbledTrack(rawTrack({ url: "https://example.com/music/x" }))).toThrow(/host/);
		expect(() => parseScrobbledTrack(rawTrack({ url: "not a url" }))).toThrow(/Invalid URL/);
	});

	test("requires image URLs on the Last.fm CDN", () => {
		const image = [{ size: "small", "#text": "https://example.com/cover.png" }];
		expect(() => parseScrobbledTrack(rawTrack({ image }))).toThrow(/host in image/);
	});

	test("rejects unknown image sizes", () => {
		const image = [{ size: "mega", "#text": "https://lastfm.freetls.fastly.net/i/u/cover.png" }];
		expect(() => parseScrobbledTrack(rawTrack({ image }))).toThrow(/Unknown image size/);
	});

	test("parses the streamable flag strictly", () => {
		expect(parseScrobbledTrack(rawTrack({ streamable: "1" }))?.isStreamable).toBe(true);
		expect(() => parseScrobbledTrack(rawTrack({ streamable: "yes" }))).toThrow(/streamable/);
	});
});

describe("parseUserRecentTracks", () => {
	test("reads page attributes", () => {
		const page = parseUserRecentTracks(recentTracksBody([rawTrack()]));
		expect(page.username).toBe("tester");
		expect(page.currentPage).toBe(1);
		expect(page.totalPages).toBe(3);
		expect(page.scrobblesPerPage).toBe(200);
		expect(page.totalScrobbles).toBe(401);
		expect(page.scrobbledTracks).toHaveLength(1);
	});

	test("accepts a single track object instead of a list", () => {
		const page = parseUserRecentTracks(recentTracksBody(rawTrack()));
		expect(page.scrobbledTracks.map((track) => track.trackName)).toEqual(["Test Track"]);
	});

	test("drops the now playing entry from a page", () => {
		const playing = rawTrack({ name: "Playing", "@attr": { nowplaying: "true" } });
		delete playing.date;
		const page = parseUserRecentTracks(recentTracksBody([playing, rawTrack()]));
		expect(page.scrobbledTracks.map((track) => track.trackName)).toEqual(["Test Track"]);
	});

	test("rejects non-numeric page attributes", () => {
		const body = {
			recenttracks: {
				track: [],
				"@attr": { user: "tester", totalPages: "many", page: "1", perPage: "200", total: "0" },
			},
		};
		expect(() => parseUserRecentTracks(body)).toThrow(/@attr\.totalPages/);
	});

	test("rejects a body without recenttracks", () => {
		expect(() => parseUserRecentTracks({})).toThrow(LastFmStructureError);
	});
});

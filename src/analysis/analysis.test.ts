import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import NodeID3 from "node-id3";
import type { ScrobbledTrack } from "../lastfm/types.js";
import { createLibraryIndex } from "../library/cache.js";
import type { LibraryFile } from "../library/types.js";
import type { ReleaseTrack } from "../musicbrainz/client.js";
import { runAnalysis, ScrobbleEnricher } from "./analysis.js";
import { LibraryMatcher } from "./matcher.js";
import { loadFailureLog } from "./report.js";

const M1 = "11111111-1111-1111-1111-111111111111";
const M2 = "22222222-2222-2222-2222-222222222222";
const M3 = "33333333-3333-3333-3333-333333333333";
const BROKEN = "44444444-4444-4444-4444-444444444444";

function scrobble(artist: string, track: string, trackMbid?: string, album?: string): ScrobbledTrack {
	return {
		trackName: track,
		trackMbid,
		trackUrl: "https://www.last.fm/music/x",
		trackImages: [],
		isStreamable: false,
		artist: { name: artist, images: [] },
		album: album ? { name: album } : undefined,
		scrobbledAt: 1700000000,
	};
}

describe("Analysis pipeline", () => {
	const testDir = path.join(os.tmpdir(), `extended-scrobbles-analysis-test-${Date.now()}`);
	const mp3Path = path.join(testDir, "local-song.mp3");
	let libraryFiles: LibraryFile[];

	beforeEach(() => {
		fs.mkdirSync(testDir, { recursive: true });
		fs.writeFileSync(mp3Path, Buffer.alloc(128));
		libraryFiles = [
			{
				filePath: path.join(testDir, "hero.flac"),
				trackLength: 241.2,
				artistName: "Local Hero",
				albumName: "First",
				trackTitle: "Tagged Song",
				trackMbid: M1,
				genres: ["Rock"],
			},
			{
				filePath: mp3Path,
				trackLength: 180,
				artistName: "Band",
				albumName: "Album",
				trackTitle: "Local Song",
				genres: [],
			},
		];
	});

	afterEach(() => {
		fs.rmSync(testDir, { recursive: true, force: true });
	});

	function createEnricher() {
		const releaseTrack: ReleaseTrack = {
			trackTitle: "Remote Song",
			trackMbid: M2,
			trackLength: 200.5,
			albumTitle: "Remote Album",
			albumMbid: "aaaaaaaa-aaaa-aaaa-aaaa-aaaaaaaaaaaa",
		};
		const musicbrainz = {
			findReleaseTrack: vi.fn(async (mbid: string) => {
				if (mbid === BROKEN) throw new Error("MusicBrainz is down");
				return mbid === M2 ? releaseTrack : null;
			}),
		};
		const youtube = {
			findDuration: vi.fn(async (query: string) => (query === "Faraway Video Song" ? 123 : null)),
		};
		const genres = { fromMetadata: vi.fn(async () => ["Indie"]) };
		const matcher = new LibraryMatcher(createLibraryIndex(libraryFiles), {
			fuzzyMinArtist: 82,
			fuzzyMinAlbum: 80,
			fuzzyMinTitle: 85,
		});
		return { enricher: new ScrobbleEnricher({ matcher, musicbrainz, youtube, genres }), musicbrainz, genres };
	}

	test("enrichScrobble honours the source priority", async () => {
		const { enricher, musicbrainz, genres } = createEnricher();

		const local = await enricher.enrichScrobble(scrobble("Someone Else", "Whatever", M1));
		expect(local).toMatchObject({
			source: "local_library_mbid",
			artistName: "Local Hero",
			trackTitle: "Tagged Song",
			trackLength: 241.2,
			genres: ["Rock"],
		});
		expect(musicbrainz.findReleaseTrack).not.toHaveBeenCalled();
		expect(genres.fromMetadata).not.toHaveBeenCalled();

		const metadata = await enricher.enrichScrobble(scrobble("Band", "Local Song", undefined, "Album"));
		expect(metadata).toMatchObject({ source: "local_library_metadata", trackLength: 180, genres: ["Indie"] });
		expect(genres.fromMetadata).toHaveBeenCalledWith("Local Song", "Album", "Band");

		const remote = await enricher.enrichScrobble(scrobble("Faraway", "Song", M2));
		expect(remote).toMatchObject({
			source: "musicbrainz",
			artistName: "Faraway",
			albumName: "Remote Album",
			trackTitle: "Remote Song",
			trackLength: 200.5,
		});

		const video = await enricher.enrichScrobble(scrobble("Faraway", "Song", M3, "Video"));
		expect(video).toMatchObject({ source: "youtube", trackLength: 123, trackMbid: M3 });

		const basic = await enricher.enrichScrobble(scrobble("Faraway", "Unknown"));
		expect(basic.source).toBe("basic");
		expect(basic.trackLength).toBeUndefined();
	});

	test("runAnalysis records failures, writes output and tags", async () => {
		const { enricher } = createEnricher();
		const failureLogPath = path.join(testDir, "failures.json");
		const save = vi.fn(async () => undefined);
		const progress: number[] = [];

		const summary = await runAnalysis({
			scrobbles: [
				scrobble("Someone Else", "Whatever", M1),
				scrobble("Band", "Local Song", undefined, "Album"),
				scrobble("Faraway", "Song", M2),
				scrobble("Faraway", "Song", BROKEN),
				scrobble("Faraway", "Song", M3, "Video"),
				scrobble("Faraway", "Unknown"),
			],
			enricher,
			outputPath: path.join(testDir, "out.xlsx"),
			failureLogPath,
			parseLogInterval: 2,
			writeTags: true,
			spreadsheet: { save },
			onProgress: (done) => progress.push(done),
		});

		expect(summary.totalScrobbles).toBe(6);
		expect(summary.processed).toBe(5);
		expect(summary.failed).toBe(1);
		expect(summary.percentages).toEqual({
			local_library_mbid: 20,
			local_library_metadata: 20,
			musicbrainz: 20,
			youtube: 20,
			basic: 20,
		});
		expect(summary.taggedFiles).toBe(1);
		expect(progress).toEqual([1, 2, 3, 4, 5, 6]);
		expect(save).toHaveBeenCalledTimes(1);

		const failures = loadFailureLog(failureLogPath);
		expect(failures).toHaveLength(1);
		expect(failures[0]).toMatchObject({ type: "enrich", track: "Song", error: "MusicBrainz is down" });

		expect(NodeID3.read(mp3Path).genre).toBe("Indie");
	});

	test("runAnalysis counts sources per run when the enricher is reused", async () => {
		const { enricher } = createEnricher();
		const options = {
			enricher,
			outputPath: path.join(testDir, "out.xlsx"),
			failureLogPath: path.join(testDir, "failures.json"),
			parseLogInterval: 10,
			spreadsheet: { save: vi.fn(async () => undefined) },
		};

		await runAnalysis({ ...options, scrobbles: [scrobble("Faraway", "Unknown"), scrobble("Faraway", "Unknown")] });
		const second = await runAnalysis({ ...options, scrobbles: [scrobble("Faraway", "Unknown")] });

		expect(second.processed).toBe(1);
		expect(second.counts).toEqual({
			local_library_mbid: 0,
			local_library_metadata: 0,
			musicbrainz: 0,
			youtube: 0,
			basic: 1,
		});
		expect(second.percentages.basic).toBe(100);
	});
});

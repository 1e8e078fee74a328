import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import NodeID3 from "node-id3";
import type { ExtendedScrobble } from "../analysis/types.js";
import { writeResolvedTags } from "./tagger.js";

const scrobble: ExtendedScrobble = {
	scrobbledAt: 1700000000,
	source: "local_library_metadata",
	artistName: "Artist",
	artistMbid: "11111111-2222-3333-4444-555555555555",
	albumName: "Album",
	albumMbid: "aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee",
	trackTitle: "Track",
	genres: ["Rock", "Shoegaze"],
};

describe("writeResolvedTags", () => {
	const testDir = path.join(os.tmpdir(), `extended-scrobbles-tagger-test-${Date.now()}`);

	beforeEach(() => {
		fs.mkdirSync(testDir, { recursive: true });
	});

	afterEach(() => {
		fs.rmSync(testDir, { recursive: true, force: true });
	});

	test("writes genres and MusicBrainz ids to MP3 files", () => {
		const filePath = path.join(testDir, "track.mp3");
		fs.writeFileSync(filePath, Buffer.alloc(128));

		expect(writeResolvedTags(filePath, scrobble)).toBe(true);

		const tags = NodeID3.read(filePath);
		expect(tags.genre).toBe("Rock;Shoegaze");
		expect(tags.userDefinedText).toEqual([
			{ description: "MusicBrainz Album Id", value: "aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee" },
			{ description: "MusicBrainz Artist Id", value: "11111111-2222-3333-4444-555555555555" },
		]);
	});

	test("skips other formats", () => {
		const filePath = path.join(testDir, "track.flac");
		fs.writeFileSync(filePath, Buffer.alloc(128));

		expect(writeResolvedTags(filePath, scrobble)).toBe(false);
		expect(fs.readFileSync(filePath)).toEqual(Buffer.alloc(128));
	});

	test("skips scrobbles with nothing to write", () => {
		const filePath = path.join(testDir, "empty.mp3");
		fs.writeFileSync(filePath, Buffer.alloc(128));

		expect(
			writeResolvedTags(filePath, { scrobbledAt: 1, source: "basic", artistName: "A", trackTitle: "T" })
		).toBe(false);
	});
});

import { describe, test, expect, vi } from "vitest";
import { buildYouTubeQuery, parseDuration, YouTubeMatcher, type VideoResult } from "./search.js";

describe("parseDuration", () => {
	test("parses every timestamp form", () => {
		expect(parseDuration("1:02:03")).toBe(3723);
		expect(parseDuration("4:05")).toBe(245);
		expect(parseDuration("59")).toBe(59);
	});

	test("rejects malformed timestamps", () => {
		expect(parseDuration("")).toBeNull();
		expect(parseDuration("LIVE")).toBeNull();
		expect(parseDuration("1:2:3:4")).toBeNull();
	});
});

describe("buildYouTubeQuery", () => {
	test("skips missing parts", () => {
		expect(buildYouTubeQuery("Artist", undefined, "Title")).toBe("Artist Title");
		expect(buildYouTubeQuery("Artist", " ", "Title")).toBe("Artist Title");
		expect(buildYouTubeQuery("Artist", "Album", "Title")).toBe("Artist Album Title");
	});
});

describe("YouTubeMatcher", () => {
	const videos: VideoResult[] = [
		{ title: "Completely unrelated cooking video", timestamp: "12:00" },
		{ title: "Test Artist Test Title (Official Audio)", timestamp: "3:25" },
		{ title: "Test Artist Test Title (Live)", timestamp: "5:10" },
	];

	test("returns the duration of the best matching title", async () => {
		const matcher = new YouTubeMatcher({ search: async () => videos, minTitleScore: 70 });
		expect(await matcher.findDuration("Test Artist Test Title")).toBe(205);
	});

	test("returns null when no title is close enough", async () => {
		const matcher = new YouTubeMatcher({ search: async () => [videos[0]], minTitleScore: 70 });
		expect(await matcher.findDuration("Test Artist Test Title")).toBeNull();
	});

	test("only considers the first maxResults videos", async () => {
		const matcher = new YouTubeMatcher({ search: async () => videos, maxResults: 1, minTitleScore: 70 });
		expect(await matcher.findDuration("Test Artist Test Title")).toBeNull();
	});

	test("caches hits and misses per query", async () => {
		const search = vi.fn(async (): Promise<VideoResult[]> => []);
		const matcher = new YouTubeMatcher({ search, minTitleScore: 70 });

		await matcher.findDuration("query");
		await matcher.findDuration("query");
		await matcher.findDuration("other");
		expect(search).toHaveBeenCalledTimes(2);
	});
});

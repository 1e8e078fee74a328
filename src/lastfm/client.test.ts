import { describe, test, expect } from "vitest";
import { LastFmApiError } from "../errors.js";
import { createFakeHttp } from "../testing/fake-http.js";
import { LastFmClient } from "./client.js";

function emptyRecentTracks(): unknown {
	return {
		recenttracks: {
			track: [],
			"@attr": { user: "tester", totalPages: "0", page: "1", perPage: "200", total: "0" },
		},
	};
}

describe("LastFmClient", () => {
	test("getUserRecentTracks sends the expected query", async () => {
		const { http, requests } = createFakeHttp(() => ({ data: emptyRecentTracks() }));
		const client = new LastFmClient({ apiKey: "test-key", http, requestIntervalMs: 0 });

		await client.getUserRecentTracks("tester", {
			page: 2,
			from: new Date(1_000_000),
			to: new Date(2_000_000),
		});

		expect(requests).toHaveLength(1);
		expect(requests[0].url).toBe("https://ws.audioscrobbler.com/2.0/");
		expect(requests[0].params).toEqual({
			method: "user.getrecenttracks",
			format: "json",
			limit: 200,
			user: "tester",
			page: 2,
			from: 1000,
			to: 2000,
			extended: 1,
			api_key: "test-key",
		});
	});

	test("getUserRecentTracks rejects oversized pages", async () => {
		const { http } = createFakeHttp(() => ({ data: emptyRecentTracks() }));
		const client = new LastFmClient({ apiKey: "test-key", http, requestIntervalMs: 0 });
		await expect(client.getUserRecentTracks("tester", { resultsPerPage: 201 })).rejects.toThrow(RangeError);
	});

	test("error bodies become LastFmApiError", async () => {
		const { http } = createFakeHttp(() => ({ status: 400, data: { error: 6, message: "User not found" } }));
		const client = new LastFmClient({ apiKey: "test-key", http, requestIntervalMs: 0 });

		const error = await client.call("user.getrecenttracks").catch((e: unknown) => e);
		expect(error).toBeInstanceOf(LastFmApiError);
		expect(error instanceof LastFmApiError && error.code).toBe(6);
		expect(error instanceof Error && error.message).toBe("Last.fm API error 6: User not found");
	});

	test("transient errors are retried", async () => {
		let calls = 0;
		const { http } = createFakeHttp(() => {
			calls++;
			if (calls === 1) return { data: { error: 29, message: "Rate limit exceeded" } };
			return { data: { ok: true } };
		});
		const client = new LastFmClient({ apiKey: "test-key", http, requestIntervalMs: 0, retryDelayMs: 0 });

		await expect(client.call("user.getinfo")).resolves.toEqual({ ok: true });
		expect(calls).toBe(2);
	});

	test("retries stop after maxRetries", async () => {
		let calls = 0;
		const { http } = createFakeHttp(() => {
			calls++;
			return { data: { error: 16, message: "Temporarily unavailable" } };
		});
		const client = new LastFmClient({
			apiKey: "test-key",
			http,
			requestIntervalMs: 0,
			retryDelayMs: 0,
			maxRetries: 2,
		});

		await expect(client.call("user.getinfo")).rejects.toThrow(LastFmApiError);
		expect(calls).toBe(3);
	});

	test("getTopTags maps count to weight", async () => {
		const { http, requests } = createFakeHttp(() => ({
			data: {
				toptags: {
					tag: [
						{ name: "rock", count: 100, url: "https://www.last.fm/tag/rock" },
						{ name: "indie", count: "40", url: "https://www.last.fm/tag/indie" },
					],
				},
			},
		}));
		const client = new LastFmClient({ apiKey: "test-key", http, requestIntervalMs: 0 });

		const tags = await client.getTopTags({ type: "album", artist: "Test Artist", album: "Test Album" });
		expect(tags).toEqual([
			{ name: "rock", weight: 100 },
			{ name: "indie", weight: 40 },
		]);
		expect(requests[0].params.method).toBe("album.gettoptags");
		expect(requests[0].params.album).toBe("Test Album");
	});

	test("getTopTags by mbid sends only the mbid", async () => {
		const { http, requests } = createFakeHttp(() => ({ data: { toptags: { tag: [] } } }));
		const client = new LastFmClient({ apiKey: "test-key", http, requestIntervalMs: 0 });

		await client.getTopTags({ type: "artist", mbid: "11111111-2222-3333-4444-555555555555" });
		expect(requests[0].params.method).toBe("artist.gettoptags");
		expect(requests[0].params.mbid).toBe("11111111-2222-3333-4444-555555555555");
		expect(requests[0].params.artist).toBeUndefined();
	});

	test("searchAlbums keeps paging past short pages until an empty one", async () => {
		const pages: Record<number, string[]> = { 1: ["A1", "A2", "A3"], 2: ["A4", "A5"], 3: [] };
		const { http, requests } = createFakeHttp((request) => ({
			data: {
				results: {
					albummatches: {
						album: (pages[Number(request.params.page)] ?? []).map((name) => ({ name, artist: "A", mbid: "" })),
					},
				},
			},
		}));
		const client = new LastFmClient({ apiKey: "test-key", http, requestIntervalMs: 0 });

		const albums = await client.searchAlbums("A", 15);
		expect(albums.map((album) => album.name)).toEqual(["A1", "A2", "A3", "A4", "A5"]);
		expect(albums[4]).toEqual({ name: "A5", artist: "A", mbid: undefined });
		expect(requests.map((request) => request.params.page)).toEqual([1, 2, 3]);
	});

	test("search stops at the page limit", async () => {
		const fullPage = Array.from({ length: 50 }, (_, i) => ({ name: `Artist ${i}`, mbid: "" }));
		const { http, requests } = createFakeHttp(() => ({
			data: { results: { artistmatches: { artist: fullPage } } },
		}));
		const client = new LastFmClient({ apiKey: "test-key", http, requestIntervalMs: 0 });

		const artists = await client.searchArtists("Artist", 3);
		expect(artists).toHaveLength(150);
		expect(requests).toHaveLength(3);
	});
});

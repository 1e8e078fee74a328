import fs from "fs";
import { z } from "zod";
import { ArchiveError } from "../errors.js";
import type { LastFmClient } from "../lastfm/client.js";
import { parseScrobbledTracks } from "../lastfm/parse.js";
import type { ScrobbledTrack } from "../lastfm/types.js";
import { createLogger } from "../logger.js";
import { sleep } from "../utils/index.js";
import { archiveDirectoryForUser, saveArchive, scanArchives } from "./archive.js";
import { computeMissingTimeSpans, type TimeSpan } from "./spans.js";

export interface DownloadProgress {
	span: TimeSpan;
	spanIndex: number;
	spanCount: number;
	page: number;
	totalPages: number;
}

export interface DownloadOptions {
	username: string;
	archiveRoot: string;
	/** Exclusive end of the history to archive. Defaults to now. */
	until?: Date;
	/** Pause between two page requests. */
	pageDelayMs?: number;
	onProgress?: (progress: DownloadProgress) => void;
}

export interface DownloadResult {
	directory: string;
	missingSpans: TimeSpan[];
	archivePaths: string[];
	scrobbleCount: number;
}

export type RecentTracksSource = Pick<LastFmClient, "getUserRecentTracks">;

const log = createLogger("download");

/**
 * Fetch every scrobble of one span, page by page. The first page tells us
 * how many pages there are. Scrobbles outside [from, to) are dropped.
 */
async function downloadSpan(
	client: RecentTracksSource,
	username: string,
	span: TimeSpan,
	pageDelayMs: number,
	onPage: (page: number, totalPages: number) => void
): Promise<ScrobbledTrack[]> {
	const range = { from: new Date(span.from * 1000), to: new Date(span.to * 1000) };

	const first = await client.getUserRecentTracks(username, { ...range, page: 1 });
	const totalPages = first.totalPages;
	const tracks = [...first.scrobbledTracks];
	onPage(1, totalPages);

	for (let page = 2; page <= totalPages; page++) {
		await sleep(pageDelayMs);
		const next = await client.getUserRecentTracks(username, { ...range, page });
		tracks.push(...next.scrobbledTracks);
		onPage(page, totalPages);
	}

	return tracks
		.filter((track) => track.scrobbledAt >= span.from && track.scrobbledAt < span.to)
		.sort((a, b) => a.scrobbledAt - b.scrobbledAt);
}

/**
 * Archive every scrobble of `username` that isn't archived yet. Each missing
 * time span becomes one archive file.
 */
export async function downloadScrobbles(
	client: RecentTracksSource,
	options: DownloadOptions
): Promise<DownloadResult> {
	const directory = archiveDirectoryForUser(options.archiveRoot, options.username);
	const until = Math.floor((options.until ?? new Date()).getTime() / 1000);

	const existing = scanArchives(directory, options.username);
	const missingSpans = computeMissingTimeSpans(
		existing.map(({ archive }) => ({ from: archive.from, to: archive.to })),
		until
	);
	log.info(`${existing.length} existing archives, ${missingSpans.length} missing spans for ${options.username}`);

	const archivePaths: string[] = [];
	let scrobbleCount = 0;

	for (const [spanIndex, span] of missingSpans.entries()) {
		const onPage = (page: number, totalPages: number) =>
			options.onProgress?.({ span, spanIndex, spanCount: missingSpans.length, page, totalPages });
		const tracks = await downloadSpan(client, options.username, span, options.pageDelayMs ?? 200, onPage);

		const filePath = saveArchive(directory, {
			archivedAt: Math.floor(Date.now() / 1000),
			username: options.username,
			from: span.from,
			to: span.to,
			scrobbledTracks: tracks,
		});
		log.info(`Archived ${tracks.length} scrobbles to ${filePath}`);

		archivePaths.push(filePath);
		scrobbleCount += tracks.length;
	}

	return { directory, missingSpans, archivePaths, scrobbleCount };
}

const rawPagesSchema = z.array(z.array(z.unknown()));

/**
 * Read a legacy scrobble dump: a JSON list of pages, each a list of raw
 * Last.fm track objects. Returns the scrobbles oldest first.
 */
export function loadRawScrobblePages(filePath: string): ScrobbledTrack[] {
	let content: unknown;
	try {
		content = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new ArchiveError(`Could not read scrobbles file ${filePath}`, { cause: error });
	}

	const pages = rawPagesSchema.safeParse(content);
	if (!pages.success) {
		throw new ArchiveError(`Scrobbles file ${filePath} is not a list of pages`);
	}
	return parseScrobbledTracks(pages.data.flat()).sort((a, b) => a.scrobbledAt - b.scrobbledAt);
}

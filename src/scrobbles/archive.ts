import fs from "fs";
import path from "path";
import { z } from "zod";
import { ArchiveError } from "../errors.js";
import { IMAGE_SIZES, type ScrobbledTrack } from "../lastfm/types.js";
import { createLogger } from "../logger.js";
import { toAscii } from "../utils/index.js";

const mbidSchema = z.string().length(36);

const imageSchema = z.object({
	size: z.enum(IMAGE_SIZES),
	url: z.string(),
});

const scrobbledTrackSchema = z.object({
	trackName: z.string(),
	trackMbid: mbidSchema.optional(),
	trackUrl: z.string(),
	trackImages: z.array(imageSchema),
	isStreamable: z.boolean(),
	artist: z.object({
		name: z.string(),
		mbid: mbidSchema.optional(),
		images: z.array(imageSchema),
	}),
	album: z
		.object({
			name: z.string(),
			mbid: mbidSchema.optional(),
		})
		.optional(),
	scrobbledAt: z.number().int(),
});

const archiveMetadataSchema = z.object({
	/** Unix seconds. */
	archivedAt: z.number().int(),
	username: z.string(),
	/** Inclusive start, Unix seconds. */
	from: z.number().int().nonnegative(),
	/** Exclusive end, Unix seconds. */
	to: z.number().int().nonnegative(),
});

const archiveSchema = archiveMetadataSchema.extend({
	scrobbledTracks: z.array(scrobbledTrackSchema),
});

export type ScrobbleArchiveMetadata = z.infer<typeof archiveMetadataSchema>;

/**
 * A snapshot of a user's scrobbles. Contains every scrobble of the user
 * in the half-open range [from, to).
 */
export interface ScrobbleArchive extends ScrobbleArchiveMetadata {
	scrobbledTracks: ScrobbledTrack[];
}

const log = createLogger("archive");

export interface ArchiveFile {
	filePath: string;
	archive: ScrobbleArchive;
}

export function archiveDirectoryForUser(root: string, username: string): string {
	return path.join(root, `user_${toAscii(username)}`);
}

export function archiveFileName(metadata: Pick<ScrobbleArchiveMetadata, "username" | "from" | "to">): string {
	return `scrobble-archive_user-${toAscii(metadata.username)}_from-${metadata.from}_to-${metadata.to}.json`;
}

/**
 * Write an archive into `directory` and return its path. Two usernames can
 * share an ASCII form, so an archive of another user is never overwritten.
 */
export function saveArchive(directory: string, archive: ScrobbleArchive): string {
	if (archive.from > archive.to) {
		throw new ArchiveError(`Archive range is inverted: from ${archive.from} to ${archive.to}`);
	}
	fs.mkdirSync(directory, { recursive: true });

	const filePath = path.join(directory, archiveFileName(archive));
	if (fs.existsSync(filePath)) {
		const existing = loadArchiveFile(filePath);
		if (existing.username !== archive.username) {
			throw new ArchiveError(`${filePath} already holds scrobbles of ${existing.username}`);
		}
	}
	fs.writeFileSync(filePath, JSON.stringify(archive, null, 2), "utf-8");
	return filePath;
}

export function loadArchiveFile(filePath: string): ScrobbleArchive {
	let content: unknown;
	try {
		content = JSON.parse(fs.readFileSync(filePath, "utf-8"));
	} catch (error) {
		throw new ArchiveError(`Could not read scrobble archive ${filePath}`, { cause: error });
	}

	const parsed = archiveSchema.safeParse(content);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new ArchiveError(
			`Invalid scrobble archive ${filePath}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown"}`
		);
	}
	return parsed.data;
}

/**
 * Load every `*.json` archive in a user's archive directory.
 * A directory that doesn't exist yet has no archives. With `username`,
 * archives of any other user are skipped.
 */
export function scanArchives(directory: string, username?: string): ArchiveFile[] {
	if (!fs.existsSync(directory)) {
		return [];
	}

	const archives: ArchiveFile[] = [];
	const names = fs
		.readdirSync(directory, { withFileTypes: true })
		.filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === ".json")
		.map((entry) => entry.name)
		.sort();

	for (const name of names) {
		const filePath = path.join(directory, name);
		const archive = loadArchiveFile(filePath);
		if (username !== undefined && archive.username !== username) {
			log.warn(`Skipping ${filePath}: archive of ${archive.username}, not ${username}`);
			continue;
		}
		archives.push({ filePath, archive });
	}
	return archives;
}

function scrobbleKey(track: ScrobbledTrack): string {
	return JSON.stringify([track.scrobbledAt, track.artist.name, track.album?.name ?? null, track.trackName]);
}

export interface DateRange {
	/** Inclusive. */
	from?: Date;
	/** Exclusive. */
	to?: Date;
}

export function isWithinRange(track: ScrobbledTrack, range: DateRange): boolean {
	if (range.from && track.scrobbledAt < Math.floor(range.from.getTime() / 1000)) return false;
	if (range.to && track.scrobbledAt >= Math.floor(range.to.getTime() / 1000)) return false;
	return true;
}

/**
 * Every archived scrobble of a user, oldest first. Overlapping archives
 * contribute each scrobble once.
 */
export function loadArchivedScrobbles(
	directory: string,
	range: DateRange = {},
	username?: string
): ScrobbledTrack[] {
	const seen = new Set<string>();
	const scrobbles: ScrobbledTrack[] = [];
	for (const { archive } of scanArchives(directory, username)) {
		for (const track of archive.scrobbledTracks) {
			if (!isWithinRange(track, range)) continue;

			const key = scrobbleKey(track);
			if (seen.has(key)) continue;
			seen.add(key);
			scrobbles.push(track);
		}
	}

	return scrobbles.sort((a, b) => a.scrobbledAt - b.scrobbledAt);
}

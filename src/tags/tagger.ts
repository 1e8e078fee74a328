import path from "path";
import NodeID3 from "node-id3";
import type { ExtendedScrobble } from "../analysis/types.js";
import { TagWriteError } from "../errors.js";

export const ALBUM_ID_DESCRIPTION = "MusicBrainz Album Id";
export const ARTIST_ID_DESCRIPTION = "MusicBrainz Artist Id";

/**
 * Write resolved genres and MusicBrainz identifiers back into a local file.
 * Only MP3 is supported; other formats are left untouched.
 *
 * @returns whether the file was updated
 */
export function writeResolvedTags(filePath: string, scrobble: ExtendedScrobble): boolean {
	if (path.extname(filePath).toLowerCase() !== ".mp3") {
		return false;
	}

	const tags: NodeID3.Tags = {};
	const userDefinedText: Array<{ description: string; value: string }> = [];

	if (scrobble.genres && scrobble.genres.length > 0) {
		tags.genre = scrobble.genres.join(";");
	}
	if (scrobble.albumMbid) {
		userDefinedText.push({ description: ALBUM_ID_DESCRIPTION, value: scrobble.albumMbid });
	}
	if (scrobble.artistMbid) {
		userDefinedText.push({ description: ARTIST_ID_DESCRIPTION, value: scrobble.artistMbid });
	}
	if (userDefinedText.length > 0) {
		tags.userDefinedText = userDefinedText;
	}

	if (Object.keys(tags).length === 0) {
		return false;
	}

	const result = NodeID3.update(tags, filePath);
	if (result instanceof Error) {
		throw new TagWriteError(`Failed to write tags to ${filePath}: ${result.message}`, { cause: result });
	}
	return true;
}

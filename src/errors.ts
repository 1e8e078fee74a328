export class ExtendedScrobblesError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class ConfigError extends ExtendedScrobblesError {}

/**
 * An error object returned by the Last.fm API itself.
 * See https://www.last.fm/api/errorcodes for the list of codes.
 */
export class LastFmApiError extends ExtendedScrobblesError {
	readonly code: number;

	constructor(code: number, message?: string) {
		super(`Last.fm API error ${code}: ${message || "no message"}`);
		this.code = code;
	}

	/** Service offline (11), temporarily unavailable (16) or rate limited (29). */
	get isTransient(): boolean {
		return [11, 16, 29].includes(this.code);
	}
}

/**
 * The Last.fm response was valid JSON, but did not have the structure we expect.
 */
export class LastFmStructureError extends ExtendedScrobblesError {}

export class MusicBrainzError extends ExtendedScrobblesError {}

export class ArchiveError extends ExtendedScrobblesError {}

export class SpreadsheetWriteError extends ExtendedScrobblesError {}

export class TagWriteError extends ExtendedScrobblesError {}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

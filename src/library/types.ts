/**
 * An audio file of the local music library with the tags we match against.
 */
export interface LibraryFile {
	filePath: string;
	/** Seconds. */
	trackLength: number;
	artistName?: string;
	artistMbid?: string;
	albumName?: string;
	albumMbid?: string;
	trackTitle?: string;
	trackMbid?: string;
	genres: string[];
}

export type LibraryFileReader = (filePath: string) => Promise<LibraryFile>;

export interface LibraryScanFailure {
	filePath: string;
	error: string;
}

export interface LibraryScanResult {
	files: LibraryFile[];
	failures: LibraryScanFailure[];
}

export interface LibraryIndex {
	files: LibraryFile[];
	byTrackMbid: Map<string, LibraryFile>;
	byTitle: Map<string, LibraryFile[]>;
	byArtist: Map<string, LibraryFile[]>;
	byAlbum: Map<string, LibraryFile[]>;
	artistNames: string[];
	albumNames: string[];
	trackTitles: string[];
}

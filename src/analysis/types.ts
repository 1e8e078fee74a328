export const TRACK_SOURCES = [
	"local_library_mbid",
	"local_library_metadata",
	"musicbrainz",
	"youtube",
	"basic",
] as const;

/** Where the extended data of a scrobble came from, in order of preference. */
export type TrackSource = (typeof TRACK_SOURCES)[number];

/**
 * A scrobble enriched with length, identifiers and genres.
 */
export interface ExtendedScrobble {
	/** Unix seconds. */
	scrobbledAt: number;
	source: TrackSource;
	artistName: string;
	artistMbid?: string;
	albumName?: string;
	albumMbid?: string;
	trackTitle: string;
	trackMbid?: string;
	/** Seconds. */
	trackLength?: number;
	genres?: string[];
	/** The matched local file, for local sources. */
	filePath?: string;
}

export type SourceCounts = Record<TrackSource, number>;

export interface AnalysisSummary {
	totalScrobbles: number;
	processed: number;
	failed: number;
	counts: SourceCounts;
	/** Share of processed scrobbles per source, one decimal. */
	percentages: Record<TrackSource, number>;
	outputPath: string;
	taggedFiles: number;
	/** Milliseconds. */
	duration: number;
}

export { loadConfig, getDefaultConfigPath, requireLastFmApiKey, type Config } from "./config.js";
export { configureLogging, createLogger, type LogLevel } from "./logger.js";
export * from "./errors.js";

export { LastFmClient, type LastFmClientOptions } from "./lastfm/client.js";
export { parseUserRecentTracks, parseScrobbledTrack } from "./lastfm/parse.js";
export type * from "./lastfm/types.js";

export { downloadScrobbles, loadRawScrobblePages, type DownloadOptions, type DownloadResult } from "./scrobbles/download.js";
export { loadArchivedScrobbles, scanArchives, saveArchive, archiveDirectoryForUser } from "./scrobbles/archive.js";
export { computeMissingTimeSpans, type TimeSpan } from "./scrobbles/spans.js";

export { ensureLibraryIndex, createLibraryIndex } from "./library/cache.js";
export { findAudioFiles, readLibraryFile } from "./library/scanner.js";
export type { LibraryFile, LibraryIndex } from "./library/types.js";

export { MusicBrainzClient } from "./musicbrainz/client.js";
export { YouTubeMatcher, buildYouTubeQuery } from "./youtube/search.js";
export { ensureGenreData, loadGenreData, type GenreData } from "./genres/data.js";
export { GenreResolver, type GenreResolverOptions } from "./genres/resolver.js";

export { LibraryMatcher } from "./analysis/matcher.js";
export { ScrobbleEnricher, runAnalysis, type AnalysisOptions } from "./analysis/analysis.js";
export type { ExtendedScrobble, AnalysisSummary, TrackSource } from "./analysis/types.js";
export { writeSpreadsheet, buildWorkbook } from "./export/spreadsheet.js";
export { writeResolvedTags } from "./tags/tagger.js";

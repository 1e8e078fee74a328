import fs from "fs";
import path from "path";
import pc from "picocolors";
import { z } from "zod";
import { errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import type { AnalysisSummary } from "./types.js";

const failureLogSchema = z.array(
	z.object({
		timestamp: z.string(),
		scrobbledAt: z.number(),
		artist: z.string(),
		track: z.string(),
		filePath: z.string().optional(),
		error: z.string(),
		type: z.enum(["enrich", "tag_write"]),
	})
);

export type FailureLogEntry = z.infer<typeof failureLogSchema>[number];

const MAX_FAILURE_LOG_ENTRIES = 1000;

const log = createLogger("analysis");

/**
 * Scrobbles that could not be enriched or tagged in earlier runs. A log
 * that is missing or doesn't match the expected shape reads as empty.
 */
export function loadFailureLog(logPath: string): FailureLogEntry[] {
	if (!fs.existsSync(logPath)) {
		return [];
	}

	try {
		const parsed = failureLogSchema.safeParse(JSON.parse(fs.readFileSync(logPath, "utf-8")));
		return parsed.success ? parsed.data : [];
	} catch (error) {
		log.warn(`Ignoring unreadable failure log ${logPath}: ${errorMessage(error)}`);
		return [];
	}
}

/** Timestamps `entry` and keeps only the newest entries. */
export function writeFailureLog(logPath: string, entry: Omit<FailureLogEntry, "timestamp">): void {
	fs.mkdirSync(path.dirname(logPath), { recursive: true });

	const existing = loadFailureLog(logPath);
	existing.push({ ...entry, timestamp: new Date().toISOString() });

	try {
		fs.writeFileSync(logPath, JSON.stringify(existing.slice(-MAX_FAILURE_LOG_ENTRIES), null, 2), "utf-8");
	} catch (error) {
		log.error(`Could not write failure log ${logPath}: ${errorMessage(error)}`);
	}
}

export function clearFailureLog(logPath: string): void {
	fs.rmSync(logPath, { force: true });
}

const RULE = "═══════════════════════════════════════════════════════════";

export function logAnalysisStart(options: { username?: string; scrobbles: number; libraryFiles: number }): void {
	console.log();
	console.log(RULE);
	console.log("  Analysing Scrobbles");
	console.log(RULE);
	if (options.username) {
		console.log(`  User: ${options.username}`);
	}
	console.log(`  Scrobbles: ${options.scrobbles}`);
	console.log(`  Library Files: ${options.libraryFiles}`);
	console.log(RULE);
	console.log();
}

export function logAnalysisComplete(summary: AnalysisSummary): void {
	const { counts, percentages } = summary;

	console.log();
	console.log(RULE);
	console.log(pc.green("  Analysis Complete"));
	console.log(RULE);
	console.log(`  Scrobbles Processed: ${summary.processed}/${summary.totalScrobbles}`);
	if (summary.failed > 0) {
		console.log(pc.red(`  Scrobbles Failed: ${summary.failed}`));
	}
	console.log("  Sources:");
	console.log(`    Local library (MBID): ${counts.local_library_mbid} (${percentages.local_library_mbid}%)`);
	console.log(
		`    Local library (metadata): ${counts.local_library_metadata} (${percentages.local_library_metadata}%)`
	);
	console.log(`    MusicBrainz: ${counts.musicbrainz} (${percentages.musicbrainz}%)`);
	console.log(`    YouTube: ${counts.youtube} (${percentages.youtube}%)`);
	console.log(`    Basic data only: ${counts.basic} (${percentages.basic}%)`);
	if (summary.taggedFiles > 0) {
		console.log(`  Files Tagged: ${summary.taggedFiles}`);
	}
	console.log(`  Spreadsheet: ${summary.outputPath}`);
	console.log(`  Duration: ${(summary.duration / 1000).toFixed(1)}s`);
	console.log(RULE);
	console.log();
}

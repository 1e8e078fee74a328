import fs from "fs";
import path from "path";
import ExcelJS from "exceljs";
import type { ExtendedScrobble } from "../analysis/types.js";
import { SpreadsheetWriteError, errorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { sleep } from "../utils/index.js";

export const SHEET_NAME = "Data";

export const SPREADSHEET_HEADER = [
	"Scrobbled At (UTC)",
	"Scrobbled At (Unix)",
	"Artist",
	"Artist MBID",
	"Album",
	"Album MBID",
	"Track",
	"Track MBID",
	"Track Length (s)",
	"Genres",
	"Source",
] as const;

export type SpreadsheetCell = string | number | null;

const RETRYABLE_CODES = ["EACCES", "EPERM", "EBUSY"];

const log = createLogger("spreadsheet");

/** "2023-11-14 22:13:20" */
export function formatUtc(unixSeconds: number): string {
	return new Date(unixSeconds * 1000).toISOString().slice(0, 19).replace("T", " ");
}

export function spreadsheetRow(scrobble: ExtendedScrobble): SpreadsheetCell[] {
	return [
		formatUtc(scrobble.scrobbledAt),
		scrobble.scrobbledAt,
		scrobble.artistName,
		scrobble.artistMbid ?? null,
		scrobble.albumName ?? null,
		scrobble.albumMbid ?? null,
		scrobble.trackTitle,
		scrobble.trackMbid ?? null,
		scrobble.trackLength ?? null,
		scrobble.genres && scrobble.genres.length > 0 ? scrobble.genres.join(", ") : null,
		scrobble.source,
	];
}

export function buildWorkbook(scrobbles: ExtendedScrobble[]): ExcelJS.Workbook {
	const workbook = new ExcelJS.Workbook();
	const sheet = workbook.addWorksheet(SHEET_NAME);

	sheet.addRow([...SPREADSHEET_HEADER]);
	for (const scrobble of scrobbles) {
		sheet.addRow(spreadsheetRow(scrobble));
	}
	return workbook;
}

function isRetryable(error: unknown): boolean {
	return error instanceof Error && "code" in error && RETRYABLE_CODES.includes(String(error.code));
}

export interface WriteSpreadsheetOptions {
	retries?: number;
	retryDelayMs?: number;
	save?: (workbook: ExcelJS.Workbook, filePath: string) => Promise<void>;
}

/**
 * Write the scrobbles to an .xlsx file. A file locked by another program
 * (typically open in a spreadsheet application) is retried a few times.
 */
export async function writeSpreadsheet(
	filePath: string,
	scrobbles: ExtendedScrobble[],
	options: WriteSpreadsheetOptions = {}
): Promise<void> {
	const {
		retries = 5,
		retryDelayMs = 5000,
		save = (workbook, target) => workbook.xlsx.writeFile(target),
	} = options;

	const workbook = buildWorkbook(scrobbles);
	fs.mkdirSync(path.dirname(filePath), { recursive: true });

	for (let attempt = 1; ; attempt++) {
		try {
			await save(workbook, filePath);
			log.info(`Spreadsheet saved to ${filePath}`);
			return;
		} catch (error) {
			if (!isRetryable(error)) {
				throw new SpreadsheetWriteError(`Failed to write spreadsheet ${filePath}: ${errorMessage(error)}`, {
					cause: error,
				});
			}
			if (attempt >= retries) {
				throw new SpreadsheetWriteError(`Failed to write spreadsheet ${filePath} after ${retries} attempts`, {
					cause: error,
				});
			}
			log.warn(`${errorMessage(error)} while writing the spreadsheet, retrying in ${retryDelayMs}ms`);
			await sleep(retryDelayMs);
		}
	}
}

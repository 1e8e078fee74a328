import ora from "ora";
import pc from "picocolors";
import { requireLastFmApiKey } from "../config.js";
import { LastFmClient } from "../lastfm/client.js";
import { downloadScrobbles } from "../scrobbles/download.js";
import { createProgressBar, loadCommandConfig, printConfig, printHeader, printSummary, promptUsername } from "./output.js";

export interface DownloadCommandOptions {
	username?: string;
	until?: Date;
}

export async function downloadScrobblesCommand(options: DownloadCommandOptions, configPath?: string) {
	printHeader("Download Scrobbles");

	const { config } = loadCommandConfig(configPath);
	const apiKey = requireLastFmApiKey(config);
	const username = options.username ?? (await promptUsername());

	printConfig([
		["User", username],
		["Archives", config.paths.scrobbleArchiveDir],
		["Until", (options.until ?? new Date()).toISOString()],
	]);

	const client = new LastFmClient({
		apiKey,
		requestIntervalMs: config.lastfm.requestIntervalMs,
	});

	const spinner = ora({
		text: pc.dim("Checking existing archives..."),
		prefixText: " ",
		color: "magenta",
	}).start();

	const bar = createProgressBar("pages");
	let currentSpan = -1;

	try {
		const result = await downloadScrobbles(client, {
			username,
			archiveRoot: config.paths.scrobbleArchiveDir,
			until: options.until,
			onProgress: (progress) => {
				if (progress.spanIndex !== currentSpan) {
					if (currentSpan === -1) {
						spinner.succeed(pc.green(`${progress.spanCount} time span(s) to download`));
					} else {
						bar.stop();
					}
					currentSpan = progress.spanIndex;
					console.log(
						pc.dim(
							`  Span ${progress.spanIndex + 1}/${progress.spanCount}: ` +
								`${new Date(progress.span.from * 1000).toISOString()} → ` +
								`${new Date(progress.span.to * 1000).toISOString()}`
						)
					);
					bar.start(progress.totalPages, 0);
				}
				bar.setTotal(progress.totalPages);
				bar.update(progress.page);
			},
		});

		if (currentSpan === -1) {
			spinner.succeed(pc.green("Archives are up to date"));
		} else {
			bar.stop();
		}

		printSummary("Download Summary", [
			{ text: `Missing spans:    ${result.missingSpans.length}` },
			{ text: `Archives written: ${result.archivePaths.length}`, color: pc.green },
			{ text: `Scrobbles saved:  ${result.scrobbleCount}`, color: pc.green },
		]);
		console.log(pc.dim(`  Archive directory: ${result.directory}`));
		console.log();
	} catch (error) {
		if (currentSpan === -1) {
			spinner.fail(pc.red("Download failed"));
		} else {
			bar.stop();
		}
		throw error;
	}
}

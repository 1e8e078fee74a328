import ora from "ora";
import pc from "picocolors";
import { ensureLibraryIndex } from "../library/cache.js";
import { createProgressBar, loadCommandConfig, printConfig, printHeader, printSummary } from "./output.js";

export async function libraryCommand(configPath?: string) {
	printHeader("Library Cache");

	const { config } = loadCommandConfig(configPath);
	const root = config.paths.musicLibraryRoot;
	if (!root) {
		console.error(pc.red("  ✗ No music library configured (paths.music_library_root or MUSIC_LIBRARY_ROOT)."));
		process.exit(1);
	}

	printConfig([
		["Library", root],
		["Cache", config.paths.libraryCacheFile],
	]);

	const spinner = ora({
		text: pc.dim("Finding audio files..."),
		prefixText: " ",
		color: "magenta",
	}).start();

	const bar = createProgressBar("files");
	let started = false;

	const { index, failures } = await ensureLibraryIndex(config, {
		rebuild: true,
		onProgress: (done, total) => {
			if (!started) {
				spinner.succeed(pc.green(`Found ${total} audio files`));
				bar.start(total, 0);
				started = true;
			}
			bar.update(done);
		},
	});

	if (started) {
		bar.stop();
	} else {
		spinner.succeed(pc.green("No audio files found"));
	}

	const withMbid = index.files.filter((file) => file.trackMbid !== undefined).length;
	printSummary("Library Summary", [
		{ text: `Files cached:     ${index.files.length}`, color: pc.green },
		{ text: `With track MBID:  ${withMbid}` },
		{ text: `Artists:          ${index.artistNames.length}` },
		{ text: `Albums:           ${index.albumNames.length}` },
		{ text: `Unreadable files: ${failures.length}`, color: failures.length > 0 ? pc.red : pc.dim },
	]);

	if (failures.length > 0) {
		console.log(pc.red("  Unreadable files:"));
		for (const failure of failures.slice(0, 10)) {
			console.log(pc.red(`    ✗ ${failure.filePath}: ${failure.error}`));
		}
		if (failures.length > 10) {
			console.log(pc.dim(`    ... and ${failures.length - 10} more`));
		}
		console.log();
	}
}

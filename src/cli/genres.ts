import ora from "ora";
import pc from "picocolors";
import { ensureGenreData, loadGenreData } from "../genres/data.js";
import { loadCommandConfig, printHeader, printSummary } from "./output.js";

export async function genresCommand(options: { force?: boolean }, configPath?: string) {
	printHeader("Genre Data");

	const { config } = loadCommandConfig(configPath);
	const spinner = ora({
		text: pc.dim("Fetching genre whitelist and tree..."),
		prefixText: " ",
		color: "magenta",
	}).start();

	let downloaded: boolean;
	try {
		downloaded = await ensureGenreData(config.paths.cacheDir, { force: options.force ?? true });
	} catch (error) {
		spinner.fail(pc.red("Failed to download genre data"));
		throw error;
	}
	spinner.succeed(pc.green(downloaded ? "Genre data downloaded" : "Genre data already cached"));

	const data = loadGenreData(config.paths.cacheDir);
	const leaves = data.tree.filter((genre) => genre.isLeaf).length;
	printSummary("Genre Summary", [
		{ text: `Whitelisted genres: ${data.whitelist.size}`, color: pc.green },
		{ text: `Tree nodes:         ${data.tree.length}` },
		{ text: `Leaf genres:        ${leaves}` },
	]);
	console.log(pc.dim(`  Cache directory: ${config.paths.cacheDir}`));
	console.log();
}

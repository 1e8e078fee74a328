import * as readline from "node:readline/promises";
import { InvalidArgumentError } from "commander";
import cliProgress from "cli-progress";
import pc from "picocolors";
import { loadConfig, getDefaultConfigPath, type Config } from "../config.js";
import { configureLogging } from "../logger.js";

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function printHeader(title: string) {
	const label = `  🎵 extended-scrobbles • ${title}`;
	const width = Math.max(35, label.length + 2);
	console.log();
	console.log(pc.bold(pc.magenta(`  ╭${"─".repeat(width)}╮`)));
	console.log(pc.bold(pc.magenta("  │")) + pc.bold(pc.white(label.padEnd(width - 1))) + pc.bold(pc.magenta("│")));
	console.log(pc.bold(pc.magenta(`  ╰${"─".repeat(width)}╯`)));
	console.log();
}

export function printConfig(entries: Array<[string, string]>) {
	const labelWidth = Math.max(...entries.map(([label]) => label.length)) + 1;
	console.log(pc.dim("  ┌─ Config ─────────────────────────────────"));
	for (const [label, value] of entries) {
		console.log(pc.dim("  │ ") + pc.cyan(`${label}:`.padEnd(labelWidth + 1)) + pc.white(value));
	}
	console.log(pc.dim("  └────────────────────────────────────────────"));
	console.log();
}

export function printSummary(title: string, lines: Array<{ text: string; color?: (text: string) => string }>) {
	const width = Math.max(33, title.length + 6, ...lines.map((line) => line.text.length + 2));
	const border = (text: string) => pc.bold(pc.white(text));

	console.log();
	console.log(border(`  ╭${"─".repeat(width)}╮`));
	console.log(border("  │") + pc.bold(`  📊 ${title}`.padEnd(width - 1)) + border("│"));
	console.log(border(`  ├${"─".repeat(width)}┤`));
	for (const line of lines) {
		const color = line.color ?? pc.white;
		console.log(border("  │") + color(` ${line.text}`.padEnd(width)) + border("│"));
	}
	console.log(border(`  ╰${"─".repeat(width)}╯`));
	console.log();
}

export function createProgressBar(unit: string) {
	return new cliProgress.SingleBar({
		format:
			pc.dim("  │ ") +
			pc.cyan("{bar}") +
			pc.dim(" │ ") +
			pc.white("{percentage}%") +
			pc.dim(" │ ") +
			pc.dim(`{value}/{total} ${unit}`),
		barCompleteChar: "█",
		barIncompleteChar: "░",
		hideCursor: true,
		clearOnComplete: false,
		barsize: 25,
	});
}

/**
 * Load the configuration for a command and set up logging from it.
 */
export function loadCommandConfig(configPath?: string): { config: Config; configPath: string } {
	const resolved = configPath ?? getDefaultConfigPath();
	const config = loadConfig(resolved);
	configureLogging({ level: config.logging.level, filePath: config.logging.logFile });
	return { config, configPath: resolved };
}

export async function promptUsername(): Promise<string> {
	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	const username = await rl.question(pc.cyan("  Last.fm username: "));
	rl.close();

	if (!username || username.trim().length === 0) {
		console.error(pc.red("\n  ✗ No username provided. Exiting."));
		process.exit(1);
	}
	return username.trim();
}

/** commander argument parser for --from/--to. */
export function parseDateOption(value: string): Date {
	const date = new Date(value);
	if (Number.isNaN(date.getTime())) {
		throw new InvalidArgumentError(`"${value}" is not a valid date (expected e.g. 2023-01-31).`);
	}
	return date;
}

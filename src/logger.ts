import fs from "fs";
import path from "path";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_LABELS: Record<LogLevel, string> = {
	debug: pc.dim("DEBUG"),
	info: pc.cyan(" INFO"),
	warn: pc.yellow(" WARN"),
	error: pc.red("ERROR"),
};

interface LoggingSettings {
	level: LogLevel;
	filePath?: string;
}

let settings: LoggingSettings = { level: "info" };

/**
 * Set the minimum level for every logger, and optionally mirror all
 * log lines (uncoloured) into a file.
 */
export function configureLogging(options: { level?: LogLevel; filePath?: string }): void {
	settings = {
		level: options.level ?? settings.level,
		filePath: options.filePath,
	};

	if (settings.filePath) {
		fs.mkdirSync(path.dirname(settings.filePath), { recursive: true });
	}
}

function isEnabled(level: LogLevel): boolean {
	return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(settings.level);
}

export class Logger {
	constructor(private readonly scope: string) {}

	log(level: LogLevel, message: string): void {
		if (!isEnabled(level)) return;

		const timestamp = new Date().toISOString();
		const line = `${pc.dim(timestamp)} ${LEVEL_LABELS[level]} ${pc.magenta(this.scope)} ${message}`;

		if (level === "error") {
			console.error(line);
		} else if (level === "warn") {
			console.warn(line);
		} else {
			console.log(line);
		}

		if (settings.filePath) {
			const plain = `${timestamp} ${level.toUpperCase().padStart(5)} ${this.scope} ${message}\n`;
			try {
				fs.appendFileSync(settings.filePath, plain, "utf-8");
			} catch (error) {
				console.error(`Error writing log file: ${error}`);
			}
		}
	}

	debug(message: string): void {
		this.log("debug", message);
	}

	info(message: string): void {
		this.log("info", message);
	}

	warn(message: string): void {
		this.log("warn", message);
	}

	error(message: string): void {
		this.log("error", message);
	}
}

export function createLogger(scope: string): Logger {
	return new Logger(scope);
}

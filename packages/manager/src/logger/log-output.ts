import * as fs from "node:fs";
import * as path from "node:path";
import { LOG_LEVELS, type LogLevel, resolveLogLevel } from "./log-level.js";

export interface LogOutputOptions {
	level: LogLevel;
	/** File every emitted line is appended to; console only when omitted */
	filePath?: string;
	/** Console writer, replaceable for tests */
	write?: (line: string) => void;
}

/**
 * Destination shared by all loggers of one manager: level filter, console and log file.
 */
export class LogOutput {
	readonly level: LogLevel;
	private readonly filePath: string | undefined;
	private readonly write: (line: string) => void;
	private fileReady = false;

	constructor(options: LogOutputOptions) {
		this.level = options.level;
		this.filePath = options.filePath;
		this.write = options.write ?? ((line: string) => console.log(line));
	}

	isEnabled(level: LogLevel): boolean {
		return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
	}

	emit(line: string): void {
		this.write(line);
		if (this.filePath) {
			this.appendToFile(this.filePath, line);
		}
	}

	private appendToFile(filePath: string, line: string): void {
		try {
			if (!this.fileReady) {
				fs.mkdirSync(path.dirname(filePath), { recursive: true });
				this.fileReady = true;
			}
			fs.appendFileSync(filePath, `${line}\n`, "utf-8");
		} catch (err) {
			// The console copy of the line has already been written
			console.error(`Failed to write log file ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
		}
	}
}

/**
 * Console-only output at the environment's level, used before configuration is loaded.
 */
export function createConsoleOutput(): LogOutput {
	return new LogOutput({ level: resolveLogLevel(false) });
}

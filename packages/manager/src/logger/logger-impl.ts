import type { Logger } from "../types/index.js";
import type { LogLevel } from "./log-level.js";
import { LogOutput, createConsoleOutput } from "./log-output.js";

function formatTimestamp(): string {
	return new Date().toISOString();
}

export class LoggerImpl implements Logger {
	private readonly output: LogOutput;

	constructor(
		private readonly prefix: string,
		output?: LogOutput,
	) {
		this.output = output ?? createConsoleOutput();
	}

	private log(level: LogLevel, message: string): void {
		if (this.output.isEnabled(level)) {
			const timestamp = formatTimestamp();
			const levelStr = level.toUpperCase().padEnd(5);
			this.output.emit(`[${timestamp}] [${levelStr}] [${this.prefix}] ${message}`);
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

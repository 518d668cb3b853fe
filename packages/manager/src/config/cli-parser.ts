/**
 * CLI argument parsing for manager configuration.
 */

export interface ParsedArgs {
	configPath?: string;
	envFile?: string;
	logFile?: string;
	intervalSeconds?: number;
	debug?: boolean;
}

export function parseCliArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = {};

	for (const arg of args) {
		if (arg.startsWith("--config=")) {
			parsed.configPath = arg.slice("--config=".length);
		} else if (arg.startsWith("--env-file=")) {
			parsed.envFile = arg.slice("--env-file=".length);
		} else if (arg.startsWith("--log-file=")) {
			parsed.logFile = arg.slice("--log-file=".length);
		} else if (arg.startsWith("--interval-seconds=")) {
			const value = parseInt(arg.slice("--interval-seconds=".length), 10);
			if (!isNaN(value)) {
				parsed.intervalSeconds = value;
			}
		} else if (arg === "--debug") {
			parsed.debug = true;
		}
	}

	return parsed;
}

export const LOG_LEVELS = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
	silent: 4,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string | undefined): value is LogLevel {
	return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Debug mode wins; otherwise LOG_LEVEL, falling back to info.
 */
export function resolveLogLevel(debug: boolean, envLevel: string | undefined = process.env.LOG_LEVEL): LogLevel {
	if (debug) {
		return "debug";
	}
	return isLogLevel(envLevel) ? envLevel : "info";
}

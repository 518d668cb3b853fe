/**
 * Environment variable parsing for manager configuration.
 */

export interface ParsedEnv {
	configPath?: string;
	envFile?: string;
	logFile?: string;
	javaHome?: string;
}

export function parseEnvVars(env: NodeJS.ProcessEnv = process.env): ParsedEnv {
	return {
		configPath: env.AGENT_KEEPER_CONFIG || undefined,
		envFile: env.AGENT_KEEPER_ENV_FILE || undefined,
		logFile: env.AGENT_KEEPER_LOG_FILE || undefined,
		javaHome: env.JAVA_HOME || undefined,
	};
}

/**
 * Manager configuration module.
 *
 * Load configuration from CLI arguments, environment variables, the config file and defaults.
 * Priority: CLI > Environment > Config file > Defaults
 */

import { PLATFORM, type Platform } from "@agent-keeper/shared";
import type { ManagerConfig, ManagerSettings } from "../types/index.js";
import { type ParsedArgs, parseCliArgs } from "./cli-parser.js";
import { normalizeAgentDetails, readConfigFile } from "./config-file.js";
import {
	DEFAULT_COMMAND_RETRIES,
	DEFAULT_COMMAND_RETRY_DELAY_SECONDS,
	DEFAULT_COMMAND_TIMEOUT_SECONDS,
	DEFAULT_CONFIG_PATH,
	DEFAULT_ENV_FILE,
	DEFAULT_LOG_FILE,
	DEFAULT_UNIT_DIR,
	MAX_TIMER_SECONDS,
	defaultArtifactDir,
	defaultJavaPath,
	defaultServiceUser,
} from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";
import { loadSecrets, readEnvFile } from "./secrets.js";
import { ConfigurationError } from "../errors/index.js";

export interface LoadConfigOptions {
	env?: NodeJS.ProcessEnv;
	/** Node.js platform identifier used for platform-dependent defaults */
	hostPlatform?: string;
}

function defaultsPlatform(hostPlatform: string): Platform {
	return hostPlatform === "win32" ? PLATFORM.WINDOWS : PLATFORM.LINUX;
}

/**
 * Load the manager configuration.
 * @throws ConfigurationError on a missing or invalid config file.
 */
export function loadConfig(args: string[] | ParsedArgs, options: LoadConfigOptions = {}): ManagerConfig {
	const cli = Array.isArray(args) ? parseCliArgs(args) : args;
	const env = parseEnvVars(options.env);
	const configPath = cli.configPath ?? env.configPath ?? DEFAULT_CONFIG_PATH;
	const file = readConfigFile(configPath);
	const platform = defaultsPlatform(options.hostPlatform ?? process.platform);

	const intervalSeconds = cli.intervalSeconds ?? file.MONITORING_INTERVAL;
	if (!Number.isInteger(intervalSeconds) || intervalSeconds <= 0 || intervalSeconds > MAX_TIMER_SECONDS) {
		throw new ConfigurationError(
			`Monitoring interval must be an integer between 1 and ${MAX_TIMER_SECONDS} seconds, got ${intervalSeconds}`,
		);
	}

	// Merge with priority: CLI > Environment > Config file > Defaults
	return {
		serverUrl: file.JENKINS_SERVER_URL.replace(/\/+$/, ""),
		agents: normalizeAgentDetails(file.AGENT_DETAILS, configPath),
		alert: {
			email: file.ALERT_SETTINGS.EMAIL,
			smtpServer: file.ALERT_SETTINGS.SMTP_SERVER,
			smtpPort: file.ALERT_SETTINGS.SMTP_PORT,
			smtpUsername: file.ALERT_SETTINGS.SMTP_USERNAME,
		},
		intervalSeconds,
		debug: cli.debug ?? file.DEBUG_MODE,
		alertPolicy: file.ALERT_ON_EVERY_FAILURE ? "every-tick" : "once-per-outage",
		notifyOnRecovery: file.NOTIFY_ON_RECOVERY,
		commandRetries: file.COMMAND_RETRIES ?? DEFAULT_COMMAND_RETRIES,
		commandRetryDelayMs: (file.COMMAND_RETRY_DELAY_SECONDS ?? DEFAULT_COMMAND_RETRY_DELAY_SECONDS) * 1000,
		commandTimeoutMs: (file.COMMAND_TIMEOUT_SECONDS ?? DEFAULT_COMMAND_TIMEOUT_SECONDS) * 1000,
		serviceUser: file.SERVICE_USER ?? defaultServiceUser(),
		javaPath: file.JAVA_PATH ?? defaultJavaPath(platform, env.javaHome),
		artifactDir: file.AGENT_JAR_DIR ?? defaultArtifactDir(platform),
		unitDir: file.SYSTEMD_UNIT_DIR ?? DEFAULT_UNIT_DIR,
		logFile: cli.logFile ?? env.logFile ?? DEFAULT_LOG_FILE,
	};
}

/**
 * Load configuration and secrets together.
 * @throws ConfigurationError on invalid configuration or a missing SMTP password.
 */
export function loadSettings(args: string[], options: LoadConfigOptions = {}): ManagerSettings {
	const cli = parseCliArgs(args);
	const processEnv = options.env ?? process.env;
	const config = loadConfig(cli, { ...options, env: processEnv });
	const envFile = cli.envFile ?? parseEnvVars(processEnv).envFile ?? DEFAULT_ENV_FILE;
	const secrets = loadSecrets(readEnvFile(envFile, processEnv));
	return { config, secrets };
}

export { parseCliArgs, type ParsedArgs } from "./cli-parser.js";
export { parseEnvVars, type ParsedEnv } from "./env-parser.js";
export { ConfigFileSchema, type ConfigFile, normalizeAgentDetails, readConfigFile } from "./config-file.js";
export { agentSecretKey, loadSecrets, readEnvFile } from "./secrets.js";
export {
	DEFAULT_CONFIG_PATH,
	DEFAULT_ENV_FILE,
	DEFAULT_LOG_FILE,
	defaultArtifactDir,
	defaultJavaPath,
	defaultServiceUser,
} from "./defaults.js";

/**
 * Default configuration values for the manager.
 */

import * as os from "node:os";
import * as path from "node:path";
import { COMMAND_DEFAULTS, PLATFORM, type Platform, SYSTEMD } from "@agent-keeper/shared";

export const DEFAULT_CONFIG_PATH = "config.json";
export const DEFAULT_ENV_FILE = ".env";
export const DEFAULT_LOG_FILE = path.join("logs", "agent-keeper.log");

export const DEFAULT_COMMAND_RETRIES = COMMAND_DEFAULTS.RETRIES;
export const DEFAULT_COMMAND_RETRY_DELAY_SECONDS = COMMAND_DEFAULTS.RETRY_DELAY_MS / 1000;
export const DEFAULT_COMMAND_TIMEOUT_SECONDS = COMMAND_DEFAULTS.TIMEOUT_MS / 1000;
export const DEFAULT_UNIT_DIR = SYSTEMD.UNIT_DIR;

/** Longest delay in seconds a Node.js timer can wait (2^31 - 1 ms) */
export const MAX_TIMER_SECONDS = Math.floor(2_147_483_647 / 1000);

/**
 * Java executable for the platform: /usr/bin/java on Linux, JAVA_HOME's java.exe on Windows.
 */
export function defaultJavaPath(platform: Platform, javaHome: string | undefined): string {
	if (platform === PLATFORM.LINUX) {
		return "/usr/bin/java";
	}
	return javaHome ? path.win32.join(javaHome, "bin", "java.exe") : "java";
}

/**
 * Directory the agent jar is downloaded into.
 */
export function defaultArtifactDir(platform: Platform, homeDir: string = os.homedir()): string {
	if (platform === PLATFORM.WINDOWS) {
		return path.win32.join("D:\\", "jenkins", "agent");
	}
	return path.posix.join(homeDir, "jenkins");
}

/**
 * Account the systemd unit runs under.
 */
export function defaultServiceUser(): string {
	try {
		return os.userInfo().username;
	} catch {
		return "root";
	}
}

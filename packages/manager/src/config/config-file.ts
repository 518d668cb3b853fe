/**
 * Config file schema and parsing.
 *
 * Keys follow the format of existing host config files, e.g.
 * { "JENKINS_SERVER_URL": "...", "AGENT_DETAILS": { "LINUX": { "AGENT_NAME": "...", "AGENT_WORKDIR": "..." } }, ... }
 */

import * as fs from "node:fs";
import { z } from "zod";
import type { Platform } from "@agent-keeper/shared";
import { ConfigurationError } from "../errors/index.js";
import { MAX_TIMER_SECONDS } from "./defaults.js";

const nonEmpty = z.string().trim().min(1);

const AgentDetailsSchema = z.object({
	AGENT_NAME: nonEmpty,
	AGENT_WORKDIR: nonEmpty,
});

const AlertSettingsSchema = z.object({
	EMAIL: z.string().trim().email(),
	SMTP_SERVER: nonEmpty,
	SMTP_PORT: z.coerce.number().int().min(1).max(65535),
	SMTP_USERNAME: nonEmpty,
});

export const ConfigFileSchema = z.object({
	JENKINS_SERVER_URL: z.string().trim().url(),
	AGENT_DETAILS: z.record(z.string(), AgentDetailsSchema),
	ALERT_SETTINGS: AlertSettingsSchema,
	MONITORING_INTERVAL: z.number().int().positive().max(MAX_TIMER_SECONDS),
	DEBUG_MODE: z.boolean().default(false),
	COMMAND_RETRIES: z.number().int().positive().optional(),
	COMMAND_RETRY_DELAY_SECONDS: z.number().nonnegative().max(MAX_TIMER_SECONDS).optional(),
	COMMAND_TIMEOUT_SECONDS: z.number().positive().max(MAX_TIMER_SECONDS).optional(),
	ALERT_ON_EVERY_FAILURE: z.boolean().default(false),
	NOTIFY_ON_RECOVERY: z.boolean().default(false),
	SERVICE_USER: nonEmpty.optional(),
	JAVA_PATH: nonEmpty.optional(),
	AGENT_JAR_DIR: nonEmpty.optional(),
	SYSTEMD_UNIT_DIR: nonEmpty.optional(),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface AgentDetails {
	name: string;
	workdir: string;
}

const PLATFORM_KEYS: Record<string, Platform> = {
	linux: "linux",
	windows: "windows",
};

/**
 * Normalize AGENT_DETAILS keys (LINUX, Linux, linux, ...) to platforms.
 * Unknown keys are rejected so a typo does not silently drop an agent.
 */
export function normalizeAgentDetails(
	details: ConfigFile["AGENT_DETAILS"],
	filePath: string,
): Partial<Record<Platform, AgentDetails>> {
	const agents: Partial<Record<Platform, AgentDetails>> = {};
	for (const [key, value] of Object.entries(details)) {
		const platform = PLATFORM_KEYS[key.toLowerCase()];
		if (!platform) {
			throw new ConfigurationError(`${filePath}: AGENT_DETAILS has unknown platform key '${key}' (expected LINUX or WINDOWS)`);
		}
		if (agents[platform]) {
			throw new ConfigurationError(`${filePath}: AGENT_DETAILS defines platform '${platform}' more than once`);
		}
		agents[platform] = { name: value.AGENT_NAME, workdir: value.AGENT_WORKDIR };
	}
	if (!agents.linux && !agents.windows) {
		throw new ConfigurationError(`${filePath}: AGENT_DETAILS must contain an entry for LINUX or WINDOWS`);
	}
	return agents;
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
		.join("; ");
}

/**
 * Read and validate a config file.
 * @throws ConfigurationError when the file is missing, not JSON, or fails validation.
 */
export function readConfigFile(filePath: string): ConfigFile {
	let raw: string;
	try {
		raw = fs.readFileSync(filePath, "utf-8");
	} catch (err) {
		const code = err instanceof Error && "code" in err ? String(err.code) : "";
		throw new ConfigurationError(
			code === "ENOENT" ? `Config file not found: ${filePath}` : `Cannot read config file ${filePath}: ${String(err)}`,
		);
	}

	let json: unknown;
	try {
		json = JSON.parse(raw);
	} catch {
		throw new ConfigurationError(`Config file contains invalid JSON: ${filePath}`);
	}

	const result = ConfigFileSchema.safeParse(json);
	if (!result.success) {
		throw new ConfigurationError(`Invalid config file ${filePath}: ${formatIssues(result.error)}`);
	}
	return result.data;
}

/**
 * Secret loading from an env file layered under the process environment.
 */

import * as fs from "node:fs";
import * as dotenv from "dotenv";
import type { Platform } from "@agent-keeper/shared";
import type { ManagerSecrets } from "../types/index.js";
import { ConfigurationError } from "../errors/index.js";

/**
 * Read the env file, if present, without touching process.env.
 * Values already set in the process environment take precedence.
 */
export function readEnvFile(envFile: string, env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
	let fromFile: Record<string, string> = {};
	if (fs.existsSync(envFile)) {
		try {
			fromFile = dotenv.parse(fs.readFileSync(envFile));
		} catch (err) {
			throw new ConfigurationError(`Failed to load env file ${envFile}: ${err instanceof Error ? err.message : String(err)}`);
		}
	}
	return { ...fromFile, ...env };
}

function secretValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
	const value = env[key]?.trim();
	return value ? value : undefined;
}

/**
 * Collect agent tokens and the SMTP password.
 * Agent tokens are checked per platform by the orchestrator; the SMTP password is always required.
 */
export function loadSecrets(env: NodeJS.ProcessEnv): ManagerSecrets {
	const smtpPassword = secretValue(env, "SMTP_PASSWORD");
	if (!smtpPassword) {
		throw new ConfigurationError("Missing SMTP_PASSWORD in the environment or env file");
	}

	return {
		agentSecrets: {
			linux: secretValue(env, "LINUX_AGENT_SECRET"),
			windows: secretValue(env, "WINDOWS_AGENT_SECRET"),
		},
		smtpPassword,
	};
}

/**
 * Environment key holding the agent token for a platform.
 */
export function agentSecretKey(platform: Platform): string {
	return platform === "linux" ? "LINUX_AGENT_SECRET" : "WINDOWS_AGENT_SECRET";
}

import * as path from "node:path";
import { AGENT_ARTIFACT_FILE, AGENT_ARTIFACT_PATH, PLATFORM, type Platform, type ServiceDescriptor } from "@agent-keeper/shared";
import type { AgentDescriptor, ManagerConfig, ManagerSecrets } from "./types/index.js";
import { agentSecretKey } from "./config/index.js";
import { ConfigurationError } from "./errors/index.js";

export interface ResolvedAgent {
	agent: AgentDescriptor;
	secret: string;
}

/**
 * Pick the agent entry and secret for the host platform.
 * @throws ConfigurationError when either is missing.
 */
export function resolveAgent(config: ManagerConfig, secrets: ManagerSecrets, platform: Platform): ResolvedAgent {
	const agent = config.agents[platform];
	if (!agent) {
		throw new ConfigurationError(`No agent configured for platform '${platform}' in AGENT_DETAILS`);
	}
	const secret = secrets.agentSecrets[platform];
	if (!secret) {
		throw new ConfigurationError(`${agentSecretKey(platform)} is not set in the environment or env file`);
	}
	return { agent, secret };
}

export function artifactUrl(serverUrl: string): string {
	return `${serverUrl}${AGENT_ARTIFACT_PATH}`;
}

/**
 * Local path of the agent jar, joined with the separator of the target platform.
 */
export function artifactDestination(artifactDir: string, platform: Platform): string {
	const join = platform === PLATFORM.WINDOWS ? path.win32.join : path.posix.join;
	return join(artifactDir, AGENT_ARTIFACT_FILE);
}

export function buildServiceDescriptor(
	config: ManagerConfig,
	platform: Platform,
	resolved: ResolvedAgent,
	artifactPath: string,
): ServiceDescriptor {
	return {
		name: resolved.agent.name,
		platform,
		javaPath: config.javaPath,
		artifactPath,
		serverUrl: config.serverUrl,
		secret: resolved.secret,
		workdir: resolved.agent.workdir,
		user: config.serviceUser,
	};
}

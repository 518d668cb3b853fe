import type { Platform } from "@agent-keeper/shared";

/**
 * Agent identity for one platform.
 */
export interface AgentDescriptor {
	name: string;
	workdir: string;
}

/**
 * SMTP alert channel settings. The password lives with the secrets.
 */
export interface AlertSettings {
	email: string;
	smtpServer: string;
	smtpPort: number;
	smtpUsername: string;
}

/**
 * How repeated down checks are reported.
 * - once-per-outage: alert on the first down check of an outage
 * - every-tick: alert on every down check
 */
export type AlertPolicy = "once-per-outage" | "every-tick";

/**
 * Manager configuration, loaded once and shared read-only by all components.
 * Values are populated from CLI arguments, environment variables, the config file or defaults.
 */
export interface ManagerConfig {
	serverUrl: string;
	agents: Partial<Record<Platform, AgentDescriptor>>;
	alert: AlertSettings;
	intervalSeconds: number;
	debug: boolean;
	alertPolicy: AlertPolicy;
	notifyOnRecovery: boolean;
	commandRetries: number;
	commandRetryDelayMs: number;
	commandTimeoutMs: number;
	serviceUser: string;
	javaPath: string;
	artifactDir: string;
	unitDir: string;
	logFile: string;
}

/**
 * Secrets read from the env file and process environment. Never logged.
 */
export interface ManagerSecrets {
	agentSecrets: Partial<Record<Platform, string>>;
	smtpPassword: string;
}

/**
 * Everything the composition root needs to build a manager.
 */
export interface ManagerSettings {
	config: ManagerConfig;
	secrets: ManagerSecrets;
}

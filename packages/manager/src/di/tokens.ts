/**
 * Injection tokens (identifiers) for all dependencies in the manager package.
 * Uses inversify-style Symbol identifiers for type-safe dependency injection.
 */

import type { Platform } from "@agent-keeper/shared";
import type {
	AlertDispatcher,
	ArtifactFetcher,
	CommandRunner,
	HealthMonitor,
	Logger,
	MailTransport,
	ManagerSettings,
	Orchestrator,
	PlatformInstaller,
	ProcessExecutor,
	ServiceFileWriter,
	ServiceStatusProbe,
	SignalSource,
} from "../types/index.js";
import type { LogOutput } from "../logger/index.js";

/**
 * Token type for identifying dependencies in the container.
 * Using symbols ensures type safety and avoids string collision.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Token for the loaded configuration and secrets.
 */
export const SETTINGS = createToken<ManagerSettings>("ManagerSettings");

// ============================================================================
// Logging
// ============================================================================

/**
 * Token for the shared log destination (level, console, log file).
 */
export const LOG_OUTPUT = createToken<LogOutput>("LogOutput");

/**
 * Token for a logger factory that creates prefixed loggers.
 */
export type LoggerFactory = (prefix: string) => Logger;
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

/**
 * Token for the main logger instance.
 */
export const LOGGER = createToken<Logger>("Logger");

// ============================================================================
// Host Collaborators (replaceable)
// ============================================================================

/**
 * Token for the function that launches host processes.
 */
export const PROCESS_EXECUTOR = createToken<ProcessExecutor>("ProcessExecutor");

/**
 * Token for the Node.js platform identifier of the host (process.platform).
 */
export const HOST_PLATFORM = createToken<string>("HostPlatform");

/**
 * Token for the host name reported in alerts.
 */
export const HOSTNAME = createToken<string>("Hostname");

/**
 * Token for the shutdown signal source.
 */
export const SIGNAL_SOURCE = createToken<SignalSource>("SignalSource");

/**
 * Token for the writer of service definition files.
 */
export const SERVICE_FILE_WRITER = createToken<ServiceFileWriter>("ServiceFileWriter");

/**
 * Token for the mail transport behind the alert dispatcher.
 */
export const MAIL_TRANSPORT = createToken<MailTransport>("MailTransport");

/**
 * Token for the artifact downloader.
 */
export const ARTIFACT_FETCHER = createToken<ArtifactFetcher>("ArtifactFetcher");

// ============================================================================
// Core Services
// ============================================================================

/**
 * Token for the retrying command runner.
 */
export const COMMAND_RUNNER = createToken<CommandRunner>("CommandRunner");

/**
 * Token for the alert dispatcher.
 */
export const ALERT_DISPATCHER = createToken<AlertDispatcher>("AlertDispatcher");

/**
 * Token for the installer factory, called once with the detected platform.
 */
export type InstallerFactory = (platform: Platform) => PlatformInstaller;
export const INSTALLER_FACTORY = createToken<InstallerFactory>("InstallerFactory");

/**
 * Token for the health monitor factory, called once the service is installed.
 */
export type MonitorFactory = (probe: ServiceStatusProbe, serviceName: string, platform: Platform) => HealthMonitor;
export const MONITOR_FACTORY = createToken<MonitorFactory>("MonitorFactory");

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Token for the orchestrator instance.
 */
export const ORCHESTRATOR = createToken<Orchestrator>("Orchestrator");

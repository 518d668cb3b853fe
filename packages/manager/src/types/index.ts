/**
 * Type definitions for the manager package.
 */
export type { AlertDispatcher, MailMessage, MailTransport } from "./alerting.js";
export type { ArtifactFetcher } from "./artifact-fetcher.js";
export type { CommandOutput, CommandRunner, RunOptions } from "./command-runner.js";
export type { HealthMonitor, TickResult } from "./health-monitor.js";
export type { Logger } from "./logger.js";
export type {
	AgentDescriptor,
	AlertPolicy,
	AlertSettings,
	ManagerConfig,
	ManagerSecrets,
	ManagerSettings,
} from "./manager-config.js";
export type { Orchestrator } from "./orchestrator.js";
export type { PlatformInstaller, ServiceStatusProbe } from "./platform-installer.js";
export type { ProcessExecOptions, ProcessExecutor, ProcessOutcome } from "./process-executor.js";
export type { ServiceFileWriter } from "./service-file-writer.js";
export type { SignalSource } from "./signal-source.js";

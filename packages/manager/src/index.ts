/**
 * Manager package public API
 *
 * This module exports the orchestrator factory, its building blocks and configuration types.
 */

// Entry point
export { main } from "./cli.js";
export { OrchestratorImpl, type OrchestratorDependencies } from "./orchestrator.js";

// Configuration
export { loadConfig, loadSettings, parseCliArgs } from "./config/index.js";
export type { ParsedArgs } from "./config/index.js";

// Class implementations
export { CommandRunnerImpl, type CommandRunnerOptions } from "./command-runner.js";
export { HealthMonitorImpl, type HealthMonitorOptions } from "./health-monitor.js";
export { HttpArtifactFetcher } from "./artifact-fetcher.js";
export { ProcessSignalSource } from "./shutdown.js";
export { EmailAlertDispatcher, SmtpMailTransport } from "./alerting/index.js";
export {
	LinuxServiceInstaller,
	PrivilegedServiceFileWriter,
	WindowsServiceInstaller,
	createPlatformInstaller,
	detectPlatform,
} from "./installers/index.js";
export { LogOutput, LoggerImpl } from "./logger/index.js";
export { execProcess } from "./process/index.js";

// Errors
export {
	AlertTransportError,
	CommandError,
	ConfigurationError,
	DownloadError,
	InstallationError,
	ManagerError,
	UnsupportedPlatformError,
	describeFatal,
	exitCodeFor,
} from "./errors/index.js";

// Interface types
export type * from "./types/index.js";

// Dependency Injection
export {
	ContainerImpl,
	createContainer,
	createToken,
	createOrchestrator,
	createManagerContainer,
	configureContainer,
} from "./di/index.js";
export type { Container, Factory, Token, InstallerFactory, LoggerFactory, MonitorFactory } from "./di/index.js";

/**
 * Dependency Injection module exports.
 */

// Re-export reflect-metadata to ensure it's loaded
import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	ALERT_DISPATCHER,
	ARTIFACT_FETCHER,
	COMMAND_RUNNER,
	HOSTNAME,
	HOST_PLATFORM,
	INSTALLER_FACTORY,
	LOGGER,
	LOGGER_FACTORY,
	LOG_OUTPUT,
	MAIL_TRANSPORT,
	MONITOR_FACTORY,
	ORCHESTRATOR,
	PROCESS_EXECUTOR,
	SERVICE_FILE_WRITER,
	SETTINGS,
	SIGNAL_SOURCE,
	createToken,
	type InstallerFactory,
	type LoggerFactory,
	type MonitorFactory,
	type Token,
} from "./tokens.js";
export { configureContainer, createManagerContainer, createOrchestrator } from "./composition-root.js";

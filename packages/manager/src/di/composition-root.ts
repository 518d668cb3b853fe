/**
 * Composition root for the manager package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import * as os from "node:os";
import type { ManagerSettings, Orchestrator } from "../types/index.js";
import { EmailAlertDispatcher, SmtpMailTransport } from "../alerting/index.js";
import { HttpArtifactFetcher } from "../artifact-fetcher.js";
import { CommandRunnerImpl } from "../command-runner.js";
import { HealthMonitorImpl } from "../health-monitor.js";
import { PrivilegedServiceFileWriter, createPlatformInstaller } from "../installers/index.js";
import { LogOutput, LoggerImpl, resolveLogLevel } from "../logger/index.js";
import { OrchestratorImpl } from "../orchestrator.js";
import { execProcess } from "../process/index.js";
import { ProcessSignalSource } from "../shutdown.js";
import { type Container, createContainer } from "./container.js";
import {
	ALERT_DISPATCHER,
	ARTIFACT_FETCHER,
	COMMAND_RUNNER,
	HOSTNAME,
	HOST_PLATFORM,
	INSTALLER_FACTORY,
	type InstallerFactory,
	LOGGER,
	LOGGER_FACTORY,
	LOG_OUTPUT,
	type LoggerFactory,
	MAIL_TRANSPORT,
	MONITOR_FACTORY,
	type MonitorFactory,
	ORCHESTRATOR,
	PROCESS_EXECUTOR,
	SERVICE_FILE_WRITER,
	SETTINGS,
	SIGNAL_SOURCE,
} from "./tokens.js";

/** Directory mode for the downloaded artifact on Linux */
const ARTIFACT_DIR_MODE = 0o755;

/**
 * Configure all dependencies in the container.
 * This is the single place where all wiring happens. Host collaborators that are
 * already registered are kept, so tests can substitute them beforehand.
 */
export function configureContainer(container: Container, settings: ManagerSettings): void {
	// Register configuration
	container.instance(SETTINGS, settings);

	// Host collaborators
	container.singletonIfAbsent(LOG_OUTPUT, (c: Container) => {
		const { config } = c.resolve(SETTINGS);
		return new LogOutput({ level: resolveLogLevel(config.debug), filePath: config.logFile });
	});
	container.singletonIfAbsent(PROCESS_EXECUTOR, () => execProcess);
	container.singletonIfAbsent(HOST_PLATFORM, () => process.platform);
	container.singletonIfAbsent(HOSTNAME, () => os.hostname());
	container.singletonIfAbsent(SIGNAL_SOURCE, () => new ProcessSignalSource());

	// Register logger factory
	container.singleton<LoggerFactory>(LOGGER_FACTORY, (c: Container) => {
		const output = c.resolve(LOG_OUTPUT);
		return (prefix: string) => new LoggerImpl(prefix, output);
	});

	// Register main logger
	container.singleton(LOGGER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return factory("keeper");
	});

	// Register command runner
	container.singleton(COMMAND_RUNNER, (c: Container) => {
		const { config } = c.resolve(SETTINGS);
		const factory = c.resolve(LOGGER_FACTORY);
		return new CommandRunnerImpl(
			{
				retries: config.commandRetries,
				retryDelayMs: config.commandRetryDelayMs,
				timeoutMs: config.commandTimeoutMs,
			},
			c.resolve(PROCESS_EXECUTOR),
			factory("command"),
		);
	});

	container.singletonIfAbsent(SERVICE_FILE_WRITER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return new PrivilegedServiceFileWriter(c.resolve(COMMAND_RUNNER), factory("service-file"));
	});

	container.singletonIfAbsent(MAIL_TRANSPORT, (c: Container) => {
		const { config, secrets } = c.resolve(SETTINGS);
		return new SmtpMailTransport(config.alert, secrets.smtpPassword);
	});

	container.singletonIfAbsent(ARTIFACT_FETCHER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		const directoryMode = c.resolve(HOST_PLATFORM) === "win32" ? undefined : ARTIFACT_DIR_MODE;
		return new HttpArtifactFetcher({ directoryMode }, factory("artifact"));
	});

	// Register alert dispatcher
	container.singleton(ALERT_DISPATCHER, (c: Container) => {
		const { config } = c.resolve(SETTINGS);
		const factory = c.resolve(LOGGER_FACTORY);
		return new EmailAlertDispatcher(c.resolve(MAIL_TRANSPORT), config.alert, factory("alert"));
	});

	// Register installer factory
	container.singleton<InstallerFactory>(INSTALLER_FACTORY, (c: Container) => {
		const { config } = c.resolve(SETTINGS);
		return platform => createPlatformInstaller(platform, {
			runner: c.resolve(COMMAND_RUNNER),
			fileWriter: c.resolve(SERVICE_FILE_WRITER),
			unitDir: config.unitDir,
			loggerFactory: c.resolve(LOGGER_FACTORY),
		});
	});

	// Register monitor factory
	container.singleton<MonitorFactory>(MONITOR_FACTORY, (c: Container) => {
		const { config } = c.resolve(SETTINGS);
		const factory = c.resolve(LOGGER_FACTORY);
		return (probe, serviceName, platform) => new HealthMonitorImpl(
			probe,
			c.resolve(ALERT_DISPATCHER),
			{
				serviceName,
				platform,
				hostname: c.resolve(HOSTNAME),
				intervalMs: config.intervalSeconds * 1000,
				alertPolicy: config.alertPolicy,
				notifyOnRecovery: config.notifyOnRecovery,
			},
			factory("monitor"),
		);
	});

	// Register orchestrator
	container.singleton(ORCHESTRATOR, (c: Container) => {
		return new OrchestratorImpl({
			settings: c.resolve(SETTINGS),
			hostPlatform: c.resolve(HOST_PLATFORM),
			artifactFetcher: c.resolve(ARTIFACT_FETCHER),
			signals: c.resolve(SIGNAL_SOURCE),
			createInstaller: c.resolve(INSTALLER_FACTORY),
			createMonitor: c.resolve(MONITOR_FACTORY),
			logger: c.resolve(LOGGER),
		});
	});
}

/**
 * Create and configure a container with all dependencies for the given settings.
 */
export function createManagerContainer(settings: ManagerSettings): Container {
	const container = createContainer();
	configureContainer(container, settings);
	return container;
}

/**
 * Create and return the orchestrator from a fully configured container.
 */
export function createOrchestrator(settings: ManagerSettings): Orchestrator {
	const container = createManagerContainer(settings);
	return container.resolve(ORCHESTRATOR);
}

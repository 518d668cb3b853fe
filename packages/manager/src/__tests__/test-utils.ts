/**
 * Shared test utilities for manager tests
 *
 * Provides:
 * - Temp directory helpers and config file writers
 * - Default config, secrets and descriptor factories
 * - Mock Logger, scripted process executor and recording command runner
 * - A signal source that tests can fire by hand
 */

import { vi } from "vitest";
import { EventEmitter } from "node:events";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { ServiceDescriptor } from "@agent-keeper/shared";
import type {
	CommandOutput,
	CommandRunner,
	Logger,
	ManagerConfig,
	ManagerSecrets,
	ManagerSettings,
	ProcessExecOptions,
	ProcessOutcome,
	RunOptions,
	SignalSource,
} from "../types/index.js";
import { CommandError } from "../errors/index.js";

// =============================================================================
// Temp Directory Management
// =============================================================================

/**
 * Creates a temporary directory for test isolation.
 */
export function createTempDir(prefix = "keeper-test-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Cleans up a temporary directory created during tests.
 * Silently ignores errors if the directory doesn't exist or can't be removed.
 */
export function cleanupTempDir(dirPath: string): void {
	try {
		fs.rmSync(dirPath, { recursive: true, force: true });
	} catch {
		// Ignore cleanup errors
	}
}

// =============================================================================
// Fetch Mock Context
// =============================================================================

export interface FetchMockContext {
	/** The original global.fetch function before mocking */
	originalFetch: typeof global.fetch;
	/** Restores the original fetch function */
	restore: () => void;
}

/**
 * Captures the current global.fetch and returns a context for restoration.
 * Call this in beforeEach to save the original fetch before mocking.
 */
export function captureFetchContext(): FetchMockContext {
	const originalFetch = global.fetch;
	return {
		originalFetch,
		restore: () => {
			global.fetch = originalFetch;
		},
	};
}

// =============================================================================
// Configuration Factories
// =============================================================================

/**
 * Creates a ManagerConfig with a Linux agent "agent-1" in /var/jenkins.
 * All values can be overridden via the overrides parameter.
 */
export function createTestConfig(overrides?: Partial<ManagerConfig>): ManagerConfig {
	return {
		serverUrl: "http://ci.example.test",
		agents: {
			linux: { name: "agent-1", workdir: "/var/jenkins" },
		},
		alert: {
			email: "ops@example.test",
			smtpServer: "smtp.example.test",
			smtpPort: 587,
			smtpUsername: "keeper@example.test",
		},
		intervalSeconds: 30,
		debug: false,
		alertPolicy: "once-per-outage",
		notifyOnRecovery: false,
		commandRetries: 3,
		commandRetryDelayMs: 0,
		commandTimeoutMs: 1000,
		serviceUser: "builder",
		javaPath: "/usr/bin/java",
		artifactDir: "/home/builder/jenkins",
		unitDir: "/etc/systemd/system",
		logFile: "logs/test.log",
		...overrides,
	};
}

export function createTestSecrets(overrides?: Partial<ManagerSecrets>): ManagerSecrets {
	return {
		agentSecrets: { linux: "tok123" },
		smtpPassword: "test-secret",
		...overrides,
	};
}

export function createTestSettings(
	config?: Partial<ManagerConfig>,
	secrets?: Partial<ManagerSecrets>,
): ManagerSettings {
	return { config: createTestConfig(config), secrets: createTestSecrets(secrets) };
}

export function createTestDescriptor(overrides?: Partial<ServiceDescriptor>): ServiceDescriptor {
	return {
		name: "agent-1",
		platform: "linux",
		javaPath: "/usr/bin/java",
		artifactPath: "/home/builder/jenkins/agent.jar",
		serverUrl: "http://ci.example.test",
		secret: "tok123",
		workdir: "/var/jenkins",
		user: "builder",
		...overrides,
	};
}

/**
 * Raw config file contents in the on-disk key format.
 */
export function createConfigFileContents(overrides?: Record<string, unknown>): Record<string, unknown> {
	return {
		JENKINS_SERVER_URL: "http://ci.example.test/",
		AGENT_DETAILS: {
			LINUX: { AGENT_NAME: "agent-1", AGENT_WORKDIR: "/var/jenkins" },
		},
		ALERT_SETTINGS: {
			EMAIL: "ops@example.test",
			SMTP_SERVER: "smtp.example.test",
			SMTP_PORT: 587,
			SMTP_USERNAME: "keeper@example.test",
		},
		MONITORING_INTERVAL: 30,
		DEBUG_MODE: false,
		...overrides,
	};
}

/**
 * Writes a config file into the directory and returns its path.
 */
export function writeConfigFile(dir: string, contents: Record<string, unknown> | string, name = "config.json"): string {
	const filePath = path.join(dir, name);
	fs.writeFileSync(filePath, typeof contents === "string" ? contents : JSON.stringify(contents, null, 2));
	return filePath;
}

// =============================================================================
// Mock Implementations
// =============================================================================

/**
 * Creates a mock Logger with all methods as vi.fn().
 */
export function createMockLogger(): Logger {
	return {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
	};
}

/**
 * All messages passed to one level of a mock logger.
 */
export function loggedMessages(logger: Logger, level: keyof Logger): string[] {
	return vi.mocked(logger[level]).mock.calls.map(call => call[0]);
}

export function outcome(overrides?: Partial<ProcessOutcome>): ProcessOutcome {
	return { exitCode: 0, stdout: "", stderr: "", timedOut: false, ...overrides };
}

export interface ExecutorCall {
	file: string;
	args: readonly string[];
	options: ProcessExecOptions;
}

/**
 * Process executor that replays scripted outcomes and records every call.
 * The last outcome repeats once the script is exhausted.
 */
export function createScriptedExecutor(script: ProcessOutcome[]) {
	const calls: ExecutorCall[] = [];
	const execute = vi.fn(async (file: string, args: readonly string[], options: ProcessExecOptions) => {
		calls.push({ file, args, options });
		const next = script[Math.min(calls.length - 1, script.length - 1)];
		return next ?? outcome();
	});
	return { execute, calls };
}

export interface RecordedCommand {
	argv: readonly string[];
	errorContext: string;
	options: RunOptions | undefined;
}

export type CommandResponder = (argv: readonly string[]) => Partial<CommandOutput> | Error;

/**
 * Command runner that records commands instead of running them.
 * The responder decides the output; returning an Error rejects the run.
 */
export class RecordingRunner implements CommandRunner {
	readonly commands: RecordedCommand[] = [];

	constructor(private readonly responder: CommandResponder = () => ({})) {}

	async run(command: readonly string[], errorContext: string, options?: RunOptions): Promise<CommandOutput> {
		this.commands.push({ argv: [...command], errorContext, options });
		const response = this.responder(command);
		if (response instanceof Error) {
			throw response;
		}
		return { stdout: "", stderr: "", exitCode: 0, attempts: 1, ...response };
	}

	argvs(): string[][] {
		return this.commands.map(command => [...command.argv]);
	}
}

export function commandFailure(context: string, command: readonly string[]): CommandError {
	return new CommandError(context, {
		command: command.join(" "),
		attempts: 3,
		exitCode: 1,
		lastStdout: "",
		lastStderr: "boom",
	});
}

/**
 * Signal source that tests fire by hand.
 */
export class ManualSignalSource implements SignalSource {
	private readonly emitter = new EventEmitter();

	onShutdown(listener: (signal: NodeJS.Signals) => void): () => void {
		this.emitter.on("signal", listener);
		return () => {
			this.emitter.off("signal", listener);
		};
	}

	fire(signal: NodeJS.Signals = "SIGTERM"): void {
		this.emitter.emit("signal", signal);
	}

	listenerCount(): number {
		return this.emitter.listenerCount("signal");
	}
}

// =============================================================================
// DI Test Helpers
// =============================================================================

let tokenCounter = 0;

/**
 * Creates a unique token name to avoid Symbol.for collisions between tests.
 */
export function createUniqueTokenName(baseName: string): string {
	tokenCounter++;
	return `${baseName}-${tokenCounter}`;
}

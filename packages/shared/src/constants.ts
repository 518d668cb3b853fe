/**
 * Shared constants for the manager and its host commands.
 *
 * Constants are organized into domain-specific groups for easier discovery.
 */

// =============================================================================
// Platforms and States
// =============================================================================

/**
 * Supported host platforms as a const object.
 * Use these constants instead of string literals for type safety.
 */
export const PLATFORM = {
	LINUX: "linux",
	WINDOWS: "windows",
} as const;

/**
 * Service states observed by a status query.
 * - ACTIVE: the host service manager reports the agent as running
 * - INACTIVE: any other reported state
 * - UNKNOWN: the status query itself failed
 */
export const SERVICE_STATE = {
	ACTIVE: "ACTIVE",
	INACTIVE: "INACTIVE",
	UNKNOWN: "UNKNOWN",
} as const;

// =============================================================================
// Command Execution
// =============================================================================

/**
 * Retry and timeout defaults for host commands.
 */
export const COMMAND_DEFAULTS = {
	/** Total attempts before a command is reported as failed */
	RETRIES: 3,
	/** Pause between attempts in milliseconds */
	RETRY_DELAY_MS: 5_000,
	/** Upper bound for a single attempt in milliseconds */
	TIMEOUT_MS: 120_000,
} as const;

// =============================================================================
// Host Service Managers
// =============================================================================

/**
 * systemd specifics.
 */
export const SYSTEMD = {
	/** Directory holding system unit files */
	UNIT_DIR: "/etc/systemd/system",
	/** Output of `systemctl is-active` for a running unit */
	ACTIVE_TOKEN: "active",
	/** Exit code of `systemctl is-active` for a unit that is not running */
	NOT_RUNNING_EXIT_CODE: 3,
} as const;

/**
 * Windows service control manager specifics.
 */
export const SERVICE_CONTROL = {
	/** Marker in `sc.exe query` output for a running service */
	RUNNING_TOKEN: "RUNNING",
	/** `sc.exe create` exit code when the service is already registered */
	SERVICE_EXISTS_EXIT_CODE: 1073,
	/** `sc.exe start` exit code when the service is already running */
	ALREADY_RUNNING_EXIT_CODE: 1056,
} as const;

// =============================================================================
// Agent Artifact
// =============================================================================

/** Path of the agent jar relative to the build server URL */
export const AGENT_ARTIFACT_PATH = "/jnlpJars/agent.jar";

/** File name the downloaded agent jar is stored under */
export const AGENT_ARTIFACT_FILE = "agent.jar";

// =============================================================================
// Platform and State Types
// =============================================================================

/**
 * Host platform the agent is installed on.
 * - linux: registered as a systemd unit
 * - windows: registered with the service control manager
 */
export type Platform = "linux" | "windows";

/**
 * State of the agent service as seen by one status query.
 */
export type ServiceState = "ACTIVE" | "INACTIVE" | "UNKNOWN";

// =============================================================================
// Service Definition
// =============================================================================

/**
 * Everything needed to register the agent as a host service.
 * Derived once per run from configuration, secret and the downloaded artifact.
 */
export interface ServiceDescriptor {
	/** Service (and agent) name */
	name: string;
	platform: Platform;
	/** Java executable used to launch the agent jar */
	javaPath: string;
	/** Local path of the downloaded agent jar */
	artifactPath: string;
	/** Build server URL the agent connects to */
	serverUrl: string;
	/** Agent authentication token; never logged */
	secret: string;
	/** Agent work directory */
	workdir: string;
	/** Account the Linux unit runs under */
	user: string;
}

// =============================================================================
// Host Commands
// =============================================================================

/**
 * A host command as an argument vector plus the exit codes that count as success.
 */
export interface ServiceCommand {
	argv: readonly string[];
	/** Exit codes treated as success; defaults to [0] when omitted */
	successExitCodes?: readonly number[];
}

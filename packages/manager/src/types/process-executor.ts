/**
 * Outcome of one process execution. A non-zero exit is an outcome, not a rejection.
 */
export interface ProcessOutcome {
	/** Exit code, or null when the process could not be started or was killed */
	exitCode: number | null;
	stdout: string;
	stderr: string;
	timedOut: boolean;
}

export interface ProcessExecOptions {
	timeoutMs: number;
}

/**
 * Launches a host process and waits for it to exit.
 */
export type ProcessExecutor = (
	file: string,
	args: readonly string[],
	options: ProcessExecOptions,
) => Promise<ProcessOutcome>;

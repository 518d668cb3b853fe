/**
 * Options for a single host command run.
 */
export interface RunOptions {
	/** Exit codes treated as success; defaults to [0] */
	successExitCodes?: readonly number[];
	/** Values replaced with *** in logs and error messages */
	sensitive?: readonly string[];
}

/**
 * Captured output of a successful command run.
 */
export interface CommandOutput {
	stdout: string;
	stderr: string;
	exitCode: number;
	/** 1-based attempt that succeeded */
	attempts: number;
}

/**
 * Executes host commands with bounded retries.
 * Rejects with CommandError only after every attempt has failed.
 */
export interface CommandRunner {
	run(command: readonly string[], errorContext: string, options?: RunOptions): Promise<CommandOutput>;
}

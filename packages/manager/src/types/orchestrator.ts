/**
 * Top-level sequence: validate, download, install, then monitor until shutdown.
 */
export interface Orchestrator {
	/**
	 * @returns The process exit code: 0 on clean shutdown, non-zero on a fatal error.
	 */
	run(): Promise<number>;
}

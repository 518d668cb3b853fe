import { formatError } from "../utils/format-error.js";
import { ManagerError } from "./manager-error.js";

/**
 * Process exit code for a fatal error. Errors outside the taxonomy exit with 1.
 */
export function exitCodeFor(err: unknown): number {
	return err instanceof ManagerError ? err.exitCode : 1;
}

/**
 * Final log line for a fatal error, distinguishable from a clean shutdown.
 */
export function describeFatal(err: unknown): string {
	const name = err instanceof Error ? err.name : "Error";
	return `Fatal ${name}: ${formatError(err)} (exit code ${exitCodeFor(err)})`;
}

/**
 * Base class for manager errors
 *
 * Includes the process exit code and a category so the entry point can report
 * a fatal failure without inspecting concrete error types.
 */
export class ManagerError extends Error {
	readonly exitCode: number;
	readonly category: string;

	constructor(message: string, category: string, exitCode: number = 1, options?: ErrorOptions) {
		super(message, options);
		this.name = this.constructor.name;
		this.category = category;
		this.exitCode = exitCode;
	}
}

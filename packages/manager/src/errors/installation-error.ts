import { ManagerError } from "./manager-error.js";

/**
 * Thrown when the service definition cannot be written
 */
export class InstallationError extends ManagerError {
	constructor(message: string, options?: ErrorOptions) {
		super(message, "installation", 6, options);
	}
}

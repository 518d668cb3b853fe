import { ManagerError } from "./manager-error.js";

/**
 * Thrown when configuration or a required secret is missing or invalid
 */
export class ConfigurationError extends ManagerError {
	constructor(message: string) {
		super(message, "configuration", 2);
	}
}

import { ManagerError } from "./manager-error.js";

/**
 * Thrown by a mail transport when an alert cannot be delivered.
 * Absorbed by the alert dispatcher; never reaches the entry point.
 */
export class AlertTransportError extends ManagerError {
	constructor(message: string) {
		super(message, "alert-transport");
	}
}

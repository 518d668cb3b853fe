import { ManagerError } from "./manager-error.js";

/**
 * Thrown when the host is neither Linux nor Windows
 */
export class UnsupportedPlatformError extends ManagerError {
	readonly hostPlatform: string;

	constructor(hostPlatform: string) {
		super(`Unsupported platform: ${hostPlatform}. Only Linux and Windows are supported`, "platform", 3);
		this.hostPlatform = hostPlatform;
	}
}

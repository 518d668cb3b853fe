import { ManagerError } from "./manager-error.js";

/**
 * Thrown when the agent artifact cannot be downloaded
 */
export class DownloadError extends ManagerError {
	readonly url: string;
	readonly status: number | null;

	constructor(url: string, reason: string, status: number | null = null) {
		super(`Failed to download ${url}: ${reason}`, "download", 4);
		this.url = url;
		this.status = status;
	}
}

/**
 * Downloads a binary artifact to a local file.
 */
export interface ArtifactFetcher {
	/**
	 * @returns The local path the artifact was written to.
	 * @throws DownloadError on a non-2xx response, transport failure, timeout or abort.
	 */
	fetch(url: string, destinationPath: string, signal?: AbortSignal): Promise<string>;
}

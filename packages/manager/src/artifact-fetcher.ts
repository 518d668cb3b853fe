import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ArtifactFetcher, Logger } from "./types/index.js";
import { DownloadError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { formatError } from "./utils/index.js";

/** Request timeout for the artifact download */
export const ARTIFACT_DOWNLOAD_TIMEOUT_MS = 120_000;

export interface HttpArtifactFetcherOptions {
	timeoutMs?: number;
	/** Mode applied to the destination directory; skipped when undefined */
	directoryMode?: number;
}

/**
 * Downloads the agent artifact over HTTP(S) with the global fetch API.
 */
export class HttpArtifactFetcher implements ArtifactFetcher {
	private readonly logger: Logger;
	private readonly timeoutMs: number;
	private readonly directoryMode: number | undefined;

	constructor(options: HttpArtifactFetcherOptions = {}, logger?: Logger) {
		this.timeoutMs = options.timeoutMs ?? ARTIFACT_DOWNLOAD_TIMEOUT_MS;
		this.directoryMode = options.directoryMode;
		this.logger = logger ?? new LoggerImpl("artifact");
	}

	async fetch(url: string, destinationPath: string, signal?: AbortSignal): Promise<string> {
		this.logger.info(`Downloading agent artifact from ${url}`);

		const directory = path.dirname(destinationPath);
		try {
			await fs.mkdir(directory, { recursive: true });
			if (this.directoryMode !== undefined) {
				await fs.chmod(directory, this.directoryMode);
			}
		} catch (err) {
			throw new DownloadError(url, `cannot prepare ${directory}: ${formatError(err)}`);
		}

		if (signal?.aborted) {
			throw new DownloadError(url, "aborted by shutdown");
		}

		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
		const onAbort = () => controller.abort();
		signal?.addEventListener("abort", onAbort, { once: true });

		try {
			const response = await fetch(url, { method: "GET", signal: controller.signal });
			if (!response.ok) {
				throw new DownloadError(url, `HTTP ${response.status} ${response.statusText}`.trim(), response.status);
			}
			const body = Buffer.from(await response.arrayBuffer());
			await fs.writeFile(destinationPath, body);
			this.logger.info(`Agent artifact downloaded to ${destinationPath} (${body.length} bytes)`);
			return destinationPath;
		} catch (err) {
			if (err instanceof DownloadError) {
				throw err;
			}
			if (err instanceof Error && err.name === "AbortError") {
				throw new DownloadError(url, signal?.aborted ? "aborted by shutdown" : `timed out after ${this.timeoutMs}ms`);
			}
			throw new DownloadError(url, formatError(err));
		} finally {
			clearTimeout(timeoutId);
			signal?.removeEventListener("abort", onAbort);
		}
	}
}

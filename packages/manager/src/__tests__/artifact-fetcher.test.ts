/**
 * Tests for HttpArtifactFetcher
 *
 * global.fetch is replaced per test; files land in a temp directory.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { HttpArtifactFetcher } from "../artifact-fetcher";
import { DownloadError } from "../errors";
import { type FetchMockContext, captureFetchContext, cleanupTempDir, createMockLogger, createTempDir } from "./test-utils";

const ARTIFACT_URL = "http://ci.example.test/jnlpJars/agent.jar";

function hangingFetch() {
	return vi.fn((_input: unknown, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
		if (init?.signal?.aborted) {
			reject(new DOMException("This operation was aborted", "AbortError"));
			return;
		}
		init?.signal?.addEventListener("abort", () => reject(new DOMException("This operation was aborted", "AbortError")));
	}));
}

describe("HttpArtifactFetcher", () => {
	let fetchContext: FetchMockContext;
	let tempDir: string;
	let destination: string;

	beforeEach(() => {
		fetchContext = captureFetchContext();
		tempDir = createTempDir("artifact-test-");
		destination = path.join(tempDir, "jenkins", "agent.jar");
	});

	afterEach(() => {
		fetchContext.restore();
		cleanupTempDir(tempDir);
	});

	it("downloads the artifact into a freshly created directory", async () => {
		const mockFetch = vi.fn().mockResolvedValue({
			ok: true,
			status: 200,
			statusText: "OK",
			arrayBuffer: async () => new TextEncoder().encode("jar-bytes").buffer,
		});
		global.fetch = mockFetch;
		const fetcher = new HttpArtifactFetcher({}, createMockLogger());

		const written = await fetcher.fetch(ARTIFACT_URL, destination);

		expect(written).toBe(destination);
		expect(fs.readFileSync(destination, "utf-8")).toBe("jar-bytes");
		expect(mockFetch).toHaveBeenCalledWith(ARTIFACT_URL, expect.objectContaining({ method: "GET", signal: expect.any(AbortSignal) }));
	});

	it("applies the directory mode when configured", async () => {
		global.fetch = vi.fn().mockResolvedValue({
			ok: true,
			status: 200,
			statusText: "OK",
			arrayBuffer: async () => new ArrayBuffer(0),
		});
		const fetcher = new HttpArtifactFetcher({ directoryMode: 0o755 }, createMockLogger());

		await fetcher.fetch(ARTIFACT_URL, destination);

		expect(fs.statSync(path.dirname(destination)).mode & 0o777).toBe(0o755);
	});

	it("fails on a non-2xx response", async () => {
		global.fetch = vi.fn().mockResolvedValue({ ok: false, status: 404, statusText: "Not Found" });
		const fetcher = new HttpArtifactFetcher({}, createMockLogger());

		const error = await fetcher.fetch(ARTIFACT_URL, destination).catch((err: unknown) => err);

		expect(error).toBeInstanceOf(DownloadError);
		expect(error).toMatchObject({
			message: `Failed to download ${ARTIFACT_URL}: HTTP 404 Not Found`,
			status: 404,
			exitCode: 4,
		});
		expect(fs.existsSync(destination)).toBe(false);
	});

	it("fails on a transport error", async () => {
		global.fetch = vi.fn().mockRejectedValue(new Error("connect ECONNREFUSED 127.0.0.1:8080"));
		const fetcher = new HttpArtifactFetcher({}, createMockLogger());

		await expect(fetcher.fetch(ARTIFACT_URL, destination)).rejects.toThrow(
			`Failed to download ${ARTIFACT_URL}: connect ECONNREFUSED 127.0.0.1:8080`,
		);
	});

	it("gives up after the request timeout", async () => {
		global.fetch = hangingFetch();
		const fetcher = new HttpArtifactFetcher({ timeoutMs: 20 }, createMockLogger());

		await expect(fetcher.fetch(ARTIFACT_URL, destination)).rejects.toThrow(`Failed to download ${ARTIFACT_URL}: timed out after 20ms`);
	});

	it("does not start a download once the caller has aborted", async () => {
		const mockFetch = hangingFetch();
		global.fetch = mockFetch;
		const controller = new AbortController();
		controller.abort();
		const fetcher = new HttpArtifactFetcher({}, createMockLogger());

		await expect(fetcher.fetch(ARTIFACT_URL, destination, controller.signal)).rejects.toThrow("aborted by shutdown");
		expect(mockFetch).not.toHaveBeenCalled();
	});

	it("stops when the caller aborts", async () => {
		global.fetch = hangingFetch();
		const controller = new AbortController();
		const fetcher = new HttpArtifactFetcher({}, createMockLogger());

		const download = fetcher.fetch(ARTIFACT_URL, destination, controller.signal);
		controller.abort();

		await expect(download).rejects.toThrow(`Failed to download ${ARTIFACT_URL}: aborted by shutdown`);
	});
});

/**
 * Tests for PrivilegedServiceFileWriter
 *
 * The escalation commands go to a recording runner; the file itself is
 * written to a temp directory.
 */

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { PrivilegedServiceFileWriter } from "../installers";
import { InstallationError } from "../errors";
import { RecordingRunner, cleanupTempDir, commandFailure, createMockLogger, createTempDir } from "./test-utils";

describe("PrivilegedServiceFileWriter", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = createTempDir("unit-dir-");
	});

	afterEach(() => {
		cleanupTempDir(tempDir);
	});

	it("writes the file between granting and reverting directory access", async () => {
		const runner = new RecordingRunner();
		const writer = new PrivilegedServiceFileWriter(runner, createMockLogger());

		const written = await writer.write(tempDir, "agent-1.service", "[Unit]\n");

		expect(written).toBe(path.join(tempDir, "agent-1.service"));
		expect(fs.readFileSync(written, "utf-8")).toBe("[Unit]\n");
		expect(runner.argvs()).toEqual([
			["sudo", "chmod", "o+w", tempDir],
			["sudo", "chmod", "o-w", tempDir],
		]);
	});

	it("creates the file readable by everyone and writable by the owner only", async () => {
		const writer = new PrivilegedServiceFileWriter(new RecordingRunner(), createMockLogger());

		const written = await writer.write(tempDir, "agent-1.service", "[Unit]\n");

		expect(fs.statSync(written).mode & 0o777).toBe(0o644);
	});

	it("reverts directory access even when the write fails", async () => {
		const runner = new RecordingRunner();
		const writer = new PrivilegedServiceFileWriter(runner, createMockLogger());
		const missingDir = path.join(tempDir, "missing");

		await expect(writer.write(missingDir, "agent-1.service", "[Unit]\n")).rejects.toBeInstanceOf(InstallationError);
		expect(runner.argvs()).toEqual([
			["sudo", "chmod", "o+w", missingDir],
			["sudo", "chmod", "o-w", missingDir],
		]);
	});

	it("keeps the write failure when reverting access also fails", async () => {
		const runner = new RecordingRunner(argv => argv.includes("o-w") ? commandFailure("Failed to revert", argv) : {});
		const writer = new PrivilegedServiceFileWriter(runner, createMockLogger());
		const missingDir = path.join(tempDir, "missing");

		let caught: unknown;
		try {
			await writer.write(missingDir, "agent-1.service", "[Unit]\n");
		} catch (err) {
			caught = err;
		}

		expect(caught).toBeInstanceOf(InstallationError);
		const error = caught instanceof InstallationError ? caught : null;
		expect(error?.message).toMatch(/^Failed to write service file .*agent-1\.service: ENOENT/);
		expect(error?.message).toContain(
			`; reverting access also failed: Failed to revert: \`sudo chmod o-w ${missingDir}\` failed after 3 attempt(s): boom`,
		);
		expect(error?.cause).toMatchObject({ code: "ENOENT" });
	});

	it("reports a failed revert after a successful write", async () => {
		const runner = new RecordingRunner(argv => argv.includes("o-w") ? commandFailure("Failed to revert", argv) : {});
		const writer = new PrivilegedServiceFileWriter(runner, createMockLogger());

		await expect(writer.write(tempDir, "agent-1.service", "[Unit]\n")).rejects.toThrow("Failed to revert");
	});

	it("does not write when access cannot be granted", async () => {
		const runner = new RecordingRunner(argv => argv.includes("o+w") ? commandFailure("Failed to grant", argv) : {});
		const writer = new PrivilegedServiceFileWriter(runner, createMockLogger());

		await expect(writer.write(tempDir, "agent-1.service", "[Unit]\n")).rejects.toThrow("Failed to grant");
		expect(fs.existsSync(path.join(tempDir, "agent-1.service"))).toBe(false);
		expect(runner.commands).toHaveLength(1);
	});

	it("uses the configured escalation prefix", async () => {
		const runner = new RecordingRunner();
		const writer = new PrivilegedServiceFileWriter(runner, createMockLogger(), []);

		await writer.write(tempDir, "agent-1.service", "");

		expect(runner.argvs()[0]).toEqual(["chmod", "o+w", tempDir]);
	});
});

import { describe, expect, it } from "vitest";
import {
	AlertTransportError,
	CommandError,
	ConfigurationError,
	DownloadError,
	InstallationError,
	ManagerError,
	UnsupportedPlatformError,
	describeFatal,
	exitCodeFor,
} from "../errors";

describe("error taxonomy", () => {
	it.each([
		[new ConfigurationError("bad"), 2],
		[new UnsupportedPlatformError("darwin"), 3],
		[new DownloadError("http://ci.example.test/jnlpJars/agent.jar", "HTTP 500"), 4],
		[new CommandError("ctx", { command: "x", attempts: 3, exitCode: 1, lastStdout: "", lastStderr: "" }), 5],
		[new InstallationError("bad"), 6],
		[new Error("plain"), 1],
		["thrown string", 1],
	])("maps %s to exit code %i", (err, code) => {
		expect(exitCodeFor(err)).toBe(code);
	});

	it("names errors after their class", () => {
		const err = new InstallationError("Failed to write service file");

		expect(err).toBeInstanceOf(ManagerError);
		expect(err.name).toBe("InstallationError");
		expect(new AlertTransportError("x").name).toBe("AlertTransportError");
	});

	it("describes a fatal error on one line", () => {
		expect(describeFatal(new ConfigurationError("Missing SMTP_PASSWORD"))).toBe(
			"Fatal ConfigurationError: Missing SMTP_PASSWORD (exit code 2)",
		);
		expect(describeFatal("boom")).toBe("Fatal Error: boom (exit code 1)");
	});

	it("includes the cause of a wrapped error", () => {
		const err = new Error("download failed", { cause: new Error("ECONNRESET") });

		expect(describeFatal(err)).toBe("Fatal Error: download failed (caused by: ECONNRESET) (exit code 1)");
	});
});

/**
 * Tests for WindowsServiceInstaller
 */

import { describe, expect, it } from "vitest";
import { WindowsServiceInstaller } from "../installers";
import { ConfigurationError } from "../errors";
import { RecordingRunner, createMockLogger, createTestDescriptor, loggedMessages } from "./test-utils";

const windowsDescriptor = () => createTestDescriptor({
	platform: "windows",
	javaPath: "java",
	artifactPath: "D:\\jenkins\\agent\\agent.jar",
	workdir: "D:\\jenkins",
});

describe("WindowsServiceInstaller", () => {
	it("creates an auto-start service and starts it", async () => {
		const runner = new RecordingRunner();
		const installer = new WindowsServiceInstaller(runner, createMockLogger());

		await installer.install(windowsDescriptor());

		expect(runner.argvs()).toEqual([
			[
				"sc.exe", "create", "agent-1",
				"binPath=", "java -jar D:\\jenkins\\agent\\agent.jar -url http://ci.example.test -secret tok123 -name agent-1 -workDir D:\\jenkins",
				"start=", "auto",
			],
			["sc.exe", "start", "agent-1"],
		]);
	});

	it("marks the secret as sensitive for the create command", async () => {
		const runner = new RecordingRunner();
		const installer = new WindowsServiceInstaller(runner, createMockLogger());

		await installer.install(windowsDescriptor());

		expect(runner.commands[0]?.options).toEqual({ successExitCodes: [0, 1073], sensitive: ["tok123"] });
	});

	it("updates the definition of an existing service and starts it", async () => {
		const runner = new RecordingRunner(argv => argv[1] === "create" ? { exitCode: 1073 } : {});
		const installer = new WindowsServiceInstaller(runner, createMockLogger());

		await installer.install(windowsDescriptor());

		const binPath = "java -jar D:\\jenkins\\agent\\agent.jar -url http://ci.example.test -secret tok123 -name agent-1 -workDir D:\\jenkins";
		expect(runner.argvs()).toEqual([
			["sc.exe", "create", "agent-1", "binPath=", binPath, "start=", "auto"],
			["sc.exe", "config", "agent-1", "binPath=", binPath, "start=", "auto"],
			["sc.exe", "start", "agent-1"],
		]);
		expect(runner.commands[1]?.options).toEqual({ sensitive: ["tok123"] });
	});

	it("accepts a service that is already running", async () => {
		const runner = new RecordingRunner(argv => argv[1] === "start" ? { exitCode: 1056 } : {});
		const logger = createMockLogger();
		const installer = new WindowsServiceInstaller(runner, logger);

		await installer.install(windowsDescriptor());

		expect(runner.commands[1]?.options).toEqual({ successExitCodes: [0, 1056] });
		expect(loggedMessages(logger, "info")).toContain("Windows service 'agent-1' is already running");
	});

	it("rejects an empty agent name without running sc.exe", async () => {
		const runner = new RecordingRunner();
		const installer = new WindowsServiceInstaller(runner, createMockLogger());

		await expect(installer.install(createTestDescriptor({ platform: "windows", name: "" }))).rejects.toBeInstanceOf(
			ConfigurationError,
		);
		expect(runner.commands).toEqual([]);
	});

	it("reports ACTIVE when the query output contains RUNNING", async () => {
		const runner = new RecordingRunner(() => ({ stdout: "STATE              : 4  RUNNING\r\n" }));
		const installer = new WindowsServiceInstaller(runner, createMockLogger());

		await expect(installer.queryStatus("agent-1")).resolves.toBe("ACTIVE");
		expect(runner.argvs()).toEqual([["sc.exe", "query", "agent-1"]]);
	});

	it("reports INACTIVE for a stopped service", async () => {
		const runner = new RecordingRunner(() => ({ stdout: "STATE              : 1  STOPPED\r\n" }));
		const installer = new WindowsServiceInstaller(runner, createMockLogger());

		await expect(installer.queryStatus("agent-1")).resolves.toBe("INACTIVE");
	});
});

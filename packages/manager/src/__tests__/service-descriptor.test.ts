import { describe, expect, it } from "vitest";
import { artifactDestination, artifactUrl, buildServiceDescriptor, resolveAgent } from "../service-descriptor";
import { ConfigurationError } from "../errors";
import { createTestConfig, createTestSecrets } from "./test-utils";

describe("service descriptor", () => {
	it("resolves the agent and secret for the platform", () => {
		expect(resolveAgent(createTestConfig(), createTestSecrets(), "linux")).toEqual({
			agent: { name: "agent-1", workdir: "/var/jenkins" },
			secret: "tok123",
		});
	});

	it("rejects a platform without an agent entry", () => {
		expect(() => resolveAgent(createTestConfig(), createTestSecrets(), "windows")).toThrow(ConfigurationError);
	});

	it("rejects a platform without a secret", () => {
		expect(() => resolveAgent(createTestConfig(), createTestSecrets({ agentSecrets: {} }), "linux")).toThrow(
			"LINUX_AGENT_SECRET is not set in the environment or env file",
		);
	});

	it("builds the artifact location from the server URL and platform", () => {
		expect(artifactUrl("http://ci.example.test")).toBe("http://ci.example.test/jnlpJars/agent.jar");
		expect(artifactDestination("/home/builder/jenkins", "linux")).toBe("/home/builder/jenkins/agent.jar");
		expect(artifactDestination("D:\\jenkins\\agent", "windows")).toBe("D:\\jenkins\\agent\\agent.jar");
	});

	it("combines configuration, agent and artifact into a descriptor", () => {
		const config = createTestConfig();
		const resolved = resolveAgent(config, createTestSecrets(), "linux");

		expect(buildServiceDescriptor(config, "linux", resolved, "/home/builder/jenkins/agent.jar")).toEqual({
			name: "agent-1",
			platform: "linux",
			javaPath: "/usr/bin/java",
			artifactPath: "/home/builder/jenkins/agent.jar",
			serverUrl: "http://ci.example.test",
			secret: "tok123",
			workdir: "/var/jenkins",
			user: "builder",
		});
	});
});

import {
	PLATFORM,
	type ServiceDescriptor,
	type ServiceState,
	parseSystemctlState,
	systemctlDaemonReload,
	systemctlEnable,
	systemctlIsActive,
	systemctlStart,
} from "@agent-keeper/shared";
import type { CommandRunner, Logger, PlatformInstaller, ServiceFileWriter } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { renderUnitFile, unitFileName } from "./unit-file.js";
import { validateDescriptor } from "./validate-descriptor.js";

/**
 * Installs the agent as a systemd unit.
 * Every step is fatal on failure; there is no partial-success continuation.
 */
export class LinuxServiceInstaller implements PlatformInstaller {
	readonly platform = PLATFORM.LINUX;
	private readonly logger: Logger;

	constructor(
		private readonly runner: CommandRunner,
		private readonly fileWriter: ServiceFileWriter,
		private readonly unitDir: string,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("linux-installer");
	}

	async install(descriptor: ServiceDescriptor): Promise<void> {
		validateDescriptor(descriptor);
		const { name } = descriptor;

		this.logger.info(`Configuring agent '${name}' as a systemd service`);
		const unitPath = await this.fileWriter.write(this.unitDir, unitFileName(name), renderUnitFile(descriptor));
		this.logger.info(`Unit file written to ${unitPath}`);

		await this.runStep(systemctlDaemonReload().argv, "Failed to reload systemd configuration");
		await this.runStep(systemctlEnable(name).argv, `Failed to enable service '${name}'`);
		await this.runStep(systemctlStart(name).argv, `Failed to start service '${name}'`);

		this.logger.info(`Agent service '${name}' installed and started`);
	}

	async queryStatus(serviceName: string): Promise<ServiceState> {
		const { argv, successExitCodes } = systemctlIsActive(serviceName);
		const output = await this.runner.run(argv, `Failed to check status for service '${serviceName}'`, {
			successExitCodes,
		});
		return parseSystemctlState(output.stdout);
	}

	private async runStep(argv: readonly string[], errorContext: string): Promise<void> {
		await this.runner.run(argv, errorContext);
	}
}

import {
	PLATFORM,
	SERVICE_CONTROL,
	type ServiceDescriptor,
	type ServiceState,
	parseScQueryState,
	scConfig,
	scCreate,
	scQuery,
	scStart,
	windowsBinPath,
} from "@agent-keeper/shared";
import type { CommandRunner, Logger, PlatformInstaller } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { validateDescriptor } from "./validate-descriptor.js";

/**
 * Installs the agent as an auto-start Windows service through sc.exe.
 */
export class WindowsServiceInstaller implements PlatformInstaller {
	readonly platform = PLATFORM.WINDOWS;
	private readonly logger: Logger;

	constructor(
		private readonly runner: CommandRunner,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("windows-installer");
	}

	async install(descriptor: ServiceDescriptor): Promise<void> {
		validateDescriptor(descriptor);
		const { name, secret } = descriptor;
		const binPath = windowsBinPath(descriptor);

		this.logger.info(`Registering agent as a Windows service with name '${name}'`);
		const create = scCreate(name, binPath);
		const created = await this.runner.run(create.argv, `Failed to create Windows service '${name}'`, {
			successExitCodes: create.successExitCodes,
			sensitive: [secret],
		});
		if (created.exitCode === SERVICE_CONTROL.SERVICE_EXISTS_EXIT_CODE) {
			this.logger.info(`Windows service '${name}' already exists, updating its definition`);
			await this.runner.run(scConfig(name, binPath).argv, `Failed to update Windows service '${name}'`, {
				sensitive: [secret],
			});
		}

		const start = scStart(name);
		const started = await this.runner.run(start.argv, `Failed to start Windows service '${name}'`, {
			successExitCodes: start.successExitCodes,
		});
		if (started.exitCode === SERVICE_CONTROL.ALREADY_RUNNING_EXIT_CODE) {
			this.logger.info(`Windows service '${name}' is already running`);
		}

		this.logger.info(`Agent service '${name}' installed and started`);
	}

	async queryStatus(serviceName: string): Promise<ServiceState> {
		const output = await this.runner.run(
			scQuery(serviceName).argv,
			`Failed to check status for Windows service '${serviceName}'`,
		);
		return parseScQueryState(output.stdout);
	}
}

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { CommandRunner, Logger, ServiceFileWriter } from "../types/index.js";
import { InstallationError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError } from "../utils/index.js";

/**
 * Writes unit files into the system service directory, which is only
 * world-writable between the grant and revert commands.
 */
export class PrivilegedServiceFileWriter implements ServiceFileWriter {
	private readonly logger: Logger;

	constructor(
		private readonly runner: CommandRunner,
		logger?: Logger,
		private readonly escalation: readonly string[] = ["sudo"],
	) {
		this.logger = logger ?? new LoggerImpl("service-file");
	}

	async write(directory: string, fileName: string, content: string): Promise<string> {
		const filePath = path.join(directory, fileName);

		this.logger.info(`Granting write permission to ${directory}`);
		await this.runner.run(
			[...this.escalation, "chmod", "o+w", directory],
			`Failed to grant write permission to ${directory}`,
		);

		let writeError: unknown = null;
		try {
			this.logger.info(`Writing service file ${filePath}`);
			await fs.writeFile(filePath, content, { encoding: "utf-8", mode: 0o644 });
		} catch (err) {
			writeError = err;
		}

		this.logger.info(`Reverting write permission for ${directory}`);
		let revertError: unknown = null;
		try {
			await this.runner.run(
				[...this.escalation, "chmod", "o-w", directory],
				`Failed to revert write permission for ${directory}`,
			);
		} catch (err) {
			if (writeError === null) {
				throw err;
			}
			revertError = err;
		}

		if (writeError !== null) {
			const reverted = revertError === null ? "" : `; reverting access also failed: ${formatError(revertError)}`;
			throw new InstallationError(
				`Failed to write service file ${filePath}: ${formatError(writeError)}${reverted}`,
				{ cause: writeError },
			);
		}

		this.logger.info("Service file written successfully");
		return filePath;
	}
}

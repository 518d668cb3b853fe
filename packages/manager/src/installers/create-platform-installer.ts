import { PLATFORM, type Platform } from "@agent-keeper/shared";
import type { CommandRunner, PlatformInstaller, ServiceFileWriter } from "../types/index.js";
import type { LoggerFactory } from "../di/tokens.js";
import { UnsupportedPlatformError } from "../errors/index.js";
import { LinuxServiceInstaller } from "./linux-installer.js";
import { WindowsServiceInstaller } from "./windows-installer.js";

/**
 * Map a Node.js platform identifier to a supported platform.
 * @throws UnsupportedPlatformError for anything other than Linux and Windows.
 */
export function detectPlatform(hostPlatform: string): Platform {
	switch (hostPlatform) {
		case "linux":
			return PLATFORM.LINUX;
		case "win32":
			return PLATFORM.WINDOWS;
		default:
			throw new UnsupportedPlatformError(hostPlatform);
	}
}

export interface InstallerDependencies {
	runner: CommandRunner;
	fileWriter: ServiceFileWriter;
	unitDir: string;
	loggerFactory: LoggerFactory;
}

/**
 * Select the installer variant once at startup.
 */
export function createPlatformInstaller(platform: Platform, deps: InstallerDependencies): PlatformInstaller {
	switch (platform) {
		case PLATFORM.LINUX:
			return new LinuxServiceInstaller(deps.runner, deps.fileWriter, deps.unitDir, deps.loggerFactory("linux-installer"));
		case PLATFORM.WINDOWS:
			return new WindowsServiceInstaller(deps.runner, deps.loggerFactory("windows-installer"));
	}
}

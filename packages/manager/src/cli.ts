/**
 * CLI entry point for the manager.
 * This module handles command-line execution of the manager.
 */

import { pathToFileURL } from "node:url";
import { loadSettings } from "./config/index.js";
import { createOrchestrator } from "./di/index.js";
import { describeFatal, exitCodeFor } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import type { ManagerSettings } from "./types/index.js";

/**
 * Load settings, then run the orchestrator to completion.
 * @returns The process exit code.
 */
export async function main(args: string[]): Promise<number> {
	let settings: ManagerSettings;
	try {
		settings = loadSettings(args);
	} catch (err) {
		new LoggerImpl("keeper").error(describeFatal(err));
		return exitCodeFor(err);
	}
	return createOrchestrator(settings).run();
}

/**
 * Check if this module is being run directly (as CLI entry point).
 */
function isMainModule(): boolean {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		return false;
	}
	return import.meta.url === pathToFileURL(scriptPath).href;
}

// CLI entry point
if (isMainModule()) {
	main(process.argv.slice(2))
		.then(code => process.exit(code))
		.catch((err: unknown) => {
			console.error("Agent keeper failed:", err);
			process.exit(1);
		});
}

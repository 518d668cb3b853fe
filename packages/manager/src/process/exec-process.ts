import { execFile } from "node:child_process";
import type { ProcessExecOptions, ProcessOutcome } from "../types/index.js";

/** Enough for verbose `sc.exe` and `systemctl` output */
const MAX_OUTPUT_BYTES = 1024 * 1024;

/**
 * Run a process without a shell and resolve with its outcome.
 * Never rejects: spawn failures, kills and non-zero exits are reported in the outcome.
 */
export function execProcess(
	file: string,
	args: readonly string[],
	options: ProcessExecOptions,
): Promise<ProcessOutcome> {
	return new Promise(resolve => {
		execFile(
			file,
			[...args],
			{
				timeout: options.timeoutMs,
				maxBuffer: MAX_OUTPUT_BYTES,
				windowsHide: true,
				// sc.exe writes in the console code page, not UTF-8
				encoding: "latin1",
			},
			(error, stdout, stderr) => {
				if (!error) {
					resolve({ exitCode: 0, stdout, stderr, timedOut: false });
					return;
				}
				const timedOut = error.killed === true && error.signal === "SIGTERM";
				resolve({
					exitCode: typeof error.code === "number" ? error.code : null,
					stdout,
					stderr: stderr || error.message,
					timedOut,
				});
			},
		);
	});
}

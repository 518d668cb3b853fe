import { ManagerError } from "./manager-error.js";

export interface CommandErrorDetails {
	/** Command line with sensitive values redacted */
	command: string;
	attempts: number;
	exitCode: number | null;
	lastStdout: string;
	lastStderr: string;
}

/**
 * Thrown when a host command still fails after all retry attempts
 */
export class CommandError extends ManagerError {
	readonly context: string;
	readonly command: string;
	readonly attempts: number;
	/** Exit code of the last attempt; null when it was killed or never started */
	readonly commandExitCode: number | null;
	readonly lastStdout: string;
	readonly lastStderr: string;

	constructor(context: string, details: CommandErrorDetails) {
		const stderr = details.lastStderr.trim();
		super(
			`${context}: \`${details.command}\` failed after ${details.attempts} attempt(s)${stderr ? `: ${stderr}` : ""}`,
			"command",
			5,
		);
		this.context = context;
		this.command = details.command;
		this.attempts = details.attempts;
		this.commandExitCode = details.exitCode;
		this.lastStdout = details.lastStdout;
		this.lastStderr = details.lastStderr;
	}
}

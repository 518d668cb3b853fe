import { COMMAND_DEFAULTS } from "@agent-keeper/shared";
import type { CommandOutput, CommandRunner, Logger, ProcessExecutor, ProcessOutcome, RunOptions } from "./types/index.js";
import { CommandError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { redact, sleep } from "./utils/index.js";
import { execProcess } from "./process/index.js";

export interface CommandRunnerOptions {
	/** Total attempts, at least 1 */
	retries: number;
	/** Pause between attempts */
	retryDelayMs: number;
	/** Upper bound for one attempt */
	timeoutMs: number;
}

const DEFAULT_OPTIONS: CommandRunnerOptions = {
	retries: COMMAND_DEFAULTS.RETRIES,
	retryDelayMs: COMMAND_DEFAULTS.RETRY_DELAY_MS,
	timeoutMs: COMMAND_DEFAULTS.TIMEOUT_MS,
};

/**
 * Command runner that retries failed host commands a bounded number of times.
 * Every attempt is logged with its captured output.
 */
export class CommandRunnerImpl implements CommandRunner {
	private readonly options: CommandRunnerOptions;
	private readonly logger: Logger;

	constructor(
		options: Partial<CommandRunnerOptions> = {},
		private readonly execute: ProcessExecutor = execProcess,
		logger?: Logger,
		private readonly delay: (ms: number) => Promise<void> = sleep,
	) {
		this.options = { ...DEFAULT_OPTIONS, ...options };
		this.options.retries = Math.max(1, Math.floor(this.options.retries));
		this.logger = logger ?? new LoggerImpl("command");
	}

	async run(command: readonly string[], errorContext: string, options: RunOptions = {}): Promise<CommandOutput> {
		const [file, ...args] = command;
		if (!file) {
			throw new CommandError(errorContext, {
				command: "",
				attempts: 0,
				exitCode: null,
				lastStdout: "",
				lastStderr: "empty command",
			});
		}

		const { retries, retryDelayMs, timeoutMs } = this.options;
		const successExitCodes = options.successExitCodes ?? [0];
		const sensitive = options.sensitive ?? [];
		const display = redact(command.join(" "), sensitive);

		let last: ProcessOutcome | null = null;
		for (let attempt = 1; attempt <= retries; attempt++) {
			this.logger.debug(`Running \`${display}\` (attempt ${attempt}/${retries})`);
			const outcome = await this.execute(file, args, { timeoutMs });
			last = outcome;

			const stdout = redact(outcome.stdout.trim(), sensitive);
			const stderr = redact(outcome.stderr.trim(), sensitive);

			if (outcome.exitCode !== null && successExitCodes.includes(outcome.exitCode)) {
				this.logger.info(`\`${display}\` succeeded (exit ${outcome.exitCode}, attempt ${attempt}/${retries})`);
				this.logger.debug(`stdout: ${stdout || "<empty>"}`);
				this.logger.debug(`stderr: ${stderr || "<empty>"}`);
				return {
					stdout: outcome.stdout,
					stderr: outcome.stderr,
					exitCode: outcome.exitCode,
					attempts: attempt,
				};
			}

			const reason = outcome.timedOut ? `timed out after ${timeoutMs}ms` : `exit ${outcome.exitCode ?? "none"}`;
			this.logger.error(`${errorContext}: \`${display}\` failed (${reason}). Attempt ${attempt}/${retries}`);
			this.logger.error(`stdout: ${stdout || "<empty>"}`);
			this.logger.error(`stderr: ${stderr || "<empty>"}`);

			if (attempt < retries) {
				await this.delay(retryDelayMs);
			}
		}

		this.logger.error(`Command failed after ${retries} attempts: \`${display}\``);
		throw new CommandError(errorContext, {
			command: display,
			attempts: retries,
			exitCode: last?.exitCode ?? null,
			lastStdout: redact(last?.stdout ?? "", sensitive),
			lastStderr: redact(last?.stderr ?? "", sensitive),
		});
	}
}

import type { AlertDispatcher, AlertSettings, Logger, MailTransport } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError } from "../utils/index.js";

/**
 * Email alert dispatcher.
 *
 * This is the one place where failures are absorbed instead of surfaced:
 * the monitor loop depends on it, so a broken alert channel only produces
 * an error log entry.
 */
export class EmailAlertDispatcher implements AlertDispatcher {
	private readonly logger: Logger;

	constructor(
		private readonly transport: MailTransport,
		private readonly settings: AlertSettings,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("alert");
	}

	async send(subject: string, body: string): Promise<void> {
		this.logger.info(`Sending alert email with subject: ${subject}`);
		try {
			await this.transport.send({
				from: this.settings.smtpUsername,
				to: this.settings.email,
				subject,
				text: body,
			});
			this.logger.info(`Alert email sent to ${this.settings.email}`);
		} catch (err) {
			this.logger.error(`Failed to send alert email: ${formatError(err)}`);
		}
	}
}

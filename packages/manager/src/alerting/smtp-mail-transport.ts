import nodemailer, { type Transporter } from "nodemailer";
import type { AlertSettings, MailMessage, MailTransport } from "../types/index.js";
import { AlertTransportError } from "../errors/index.js";
import { formatError } from "../utils/index.js";

/** Port on which SMTP uses implicit TLS instead of STARTTLS */
const SMTPS_PORT = 465;

/** Connection, greeting and socket timeout for one delivery */
const SMTP_TIMEOUT_MS = 30_000;

/**
 * Mail transport that submits messages to an SMTP server with STARTTLS
 * and username/password authentication.
 */
export class SmtpMailTransport implements MailTransport {
	private readonly transporter: Transporter;

	constructor(settings: AlertSettings, password: string) {
		const implicitTls = settings.smtpPort === SMTPS_PORT;
		this.transporter = nodemailer.createTransport({
			host: settings.smtpServer,
			port: settings.smtpPort,
			secure: implicitTls,
			requireTLS: !implicitTls,
			auth: {
				user: settings.smtpUsername,
				pass: password,
			},
			connectionTimeout: SMTP_TIMEOUT_MS,
			greetingTimeout: SMTP_TIMEOUT_MS,
			socketTimeout: SMTP_TIMEOUT_MS,
		});
	}

	async send(message: MailMessage): Promise<void> {
		try {
			await this.transporter.sendMail({
				from: message.from,
				to: message.to,
				subject: message.subject,
				text: message.text,
			});
		} catch (err) {
			throw new AlertTransportError(`SMTP delivery to ${message.to} failed: ${formatError(err)}`);
		}
	}
}

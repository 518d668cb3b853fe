/**
 * One outgoing email.
 */
export interface MailMessage {
	from: string;
	to: string;
	subject: string;
	text: string;
}

/**
 * Delivers mail. Rejects with AlertTransportError on any delivery failure.
 */
export interface MailTransport {
	send(message: MailMessage): Promise<void>;
}

/**
 * Sends operator alerts. Never rejects: delivery failures are logged and absorbed.
 */
export interface AlertDispatcher {
	send(subject: string, body: string): Promise<void>;
}

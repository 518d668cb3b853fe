import type { Platform, ServiceState } from "@agent-keeper/shared";

export interface AlertContext {
	serviceName: string;
	platform: Platform;
	hostname: string;
	state: ServiceState;
	observedAt: Date;
}

export interface AlertMessage {
	subject: string;
	body: string;
}

export function downAlert(context: AlertContext): AlertMessage {
	return {
		subject: `Agent service down: ${context.serviceName}`,
		body: [
			`ALERT: agent service '${context.serviceName}' is down.`,
			"",
			`Host: ${context.hostname} (${context.platform})`,
			`Observed state: ${context.state}`,
			`Observed at: ${context.observedAt.toISOString()}`,
		].join("\n"),
	};
}

export function recoveryNotice(context: AlertContext): AlertMessage {
	return {
		subject: `Agent service recovered: ${context.serviceName}`,
		body: [
			`Agent service '${context.serviceName}' is running again.`,
			"",
			`Host: ${context.hostname} (${context.platform})`,
			`Observed at: ${context.observedAt.toISOString()}`,
		].join("\n"),
	};
}

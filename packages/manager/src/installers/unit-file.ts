import { type ServiceDescriptor, linuxExecStart } from "@agent-keeper/shared";

/**
 * Render the systemd unit that keeps the agent running.
 * The result embeds the agent secret and must not be logged.
 */
export function renderUnitFile(descriptor: ServiceDescriptor): string {
	return [
		"[Unit]",
		`Description=Jenkins Agent (${descriptor.name})`,
		"After=network.target",
		"",
		"[Service]",
		`ExecStart=${linuxExecStart(descriptor)}`,
		"Restart=always",
		`User=${descriptor.user}`,
		"",
		"[Install]",
		"WantedBy=multi-user.target",
		"",
	].join("\n");
}

export function unitFileName(serviceName: string): string {
	return `${serviceName}.service`;
}

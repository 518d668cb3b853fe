/**
 * Host service manager commands.
 *
 * The argument vectors here are reproduced verbatim for compatibility with
 * existing host tooling; change them only together with that tooling.
 */

import { SERVICE_CONTROL, SERVICE_STATE, SYSTEMD } from "./constants.js";
import type { ServiceCommand, ServiceDescriptor, ServiceState } from "./types/service.js";

// =============================================================================
// systemd
// =============================================================================

export function systemctlDaemonReload(): ServiceCommand {
	return { argv: ["systemctl", "daemon-reload"] };
}

export function systemctlEnable(name: string): ServiceCommand {
	return { argv: ["systemctl", "enable", name] };
}

export function systemctlStart(name: string): ServiceCommand {
	return { argv: ["systemctl", "start", name] };
}

/**
 * `systemctl is-active` exits non-zero for a stopped unit while still printing
 * its state, so that exit code is accepted as an answer rather than a failure.
 */
export function systemctlIsActive(name: string): ServiceCommand {
	return {
		argv: ["systemctl", "is-active", name],
		successExitCodes: [0, SYSTEMD.NOT_RUNNING_EXIT_CODE],
	};
}

/**
 * Map `systemctl is-active` output to a service state.
 * Only the exact "active" token counts as running.
 */
export function parseSystemctlState(stdout: string): ServiceState {
	return stdout.trim() === SYSTEMD.ACTIVE_TOKEN ? SERVICE_STATE.ACTIVE : SERVICE_STATE.INACTIVE;
}

// =============================================================================
// Windows service control
// =============================================================================

/**
 * Register an auto-start service. `binPath` carries the whole agent invocation
 * as one argument; the process layer quotes it on the command line.
 * An existing registration is reported through its exit code, not as a failure.
 */
export function scCreate(name: string, binPath: string): ServiceCommand {
	return {
		argv: ["sc.exe", "create", name, "binPath=", binPath, "start=", "auto"],
		successExitCodes: [0, SERVICE_CONTROL.SERVICE_EXISTS_EXIT_CODE],
	};
}

/**
 * Overwrite the definition of an already registered service.
 */
export function scConfig(name: string, binPath: string): ServiceCommand {
	return { argv: ["sc.exe", "config", name, "binPath=", binPath, "start=", "auto"] };
}

/**
 * Starting a service that is already running counts as success.
 */
export function scStart(name: string): ServiceCommand {
	return {
		argv: ["sc.exe", "start", name],
		successExitCodes: [0, SERVICE_CONTROL.ALREADY_RUNNING_EXIT_CODE],
	};
}

export function scQuery(name: string): ServiceCommand {
	return { argv: ["sc.exe", "query", name] };
}

/**
 * Map `sc.exe query` output to a service state by looking for the RUNNING marker.
 */
export function parseScQueryState(stdout: string): ServiceState {
	return stdout.includes(SERVICE_CONTROL.RUNNING_TOKEN) ? SERVICE_STATE.ACTIVE : SERVICE_STATE.INACTIVE;
}

// =============================================================================
// Agent invocation
// =============================================================================

/**
 * ExecStart line for the systemd unit. Name and work directory are quoted.
 */
export function linuxExecStart(descriptor: ServiceDescriptor): string {
	const { javaPath, artifactPath, serverUrl, secret, name, workdir } = descriptor;
	return `${javaPath} -jar ${artifactPath} -url ${serverUrl} -secret ${secret} -name "${name}" -workDir "${workdir}"`;
}

function quoteIfSpaced(value: string): string {
	return value.includes(" ") ? `"${value}"` : value;
}

/**
 * Command line stored as the Windows service binPath.
 * Paths containing spaces are quoted.
 */
export function windowsBinPath(descriptor: ServiceDescriptor): string {
	const { javaPath, artifactPath, serverUrl, secret, name, workdir } = descriptor;
	return `${quoteIfSpaced(javaPath)} -jar ${quoteIfSpaced(artifactPath)} -url ${serverUrl} -secret ${secret} -name ${name} -workDir ${quoteIfSpaced(workdir)}`;
}

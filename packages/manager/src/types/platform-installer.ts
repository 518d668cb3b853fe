import type { Platform, ServiceDescriptor, ServiceState } from "@agent-keeper/shared";

/**
 * Reports the live state of a host service.
 * Rejects with CommandError when the status query cannot be answered.
 */
export interface ServiceStatusProbe {
	queryStatus(serviceName: string): Promise<ServiceState>;
}

/**
 * Registers the agent as an auto-starting host service and starts it.
 * Re-running on an installed service overwrites the definition and restarts it.
 */
export interface PlatformInstaller extends ServiceStatusProbe {
	readonly platform: Platform;
	install(descriptor: ServiceDescriptor): Promise<void>;
}

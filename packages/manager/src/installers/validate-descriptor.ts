import type { ServiceDescriptor } from "@agent-keeper/shared";
import { ConfigurationError } from "../errors/index.js";

/**
 * Reject a descriptor that cannot produce a working service.
 * Runs before any file or service registry is touched.
 */
export function validateDescriptor(descriptor: ServiceDescriptor): void {
	if (!descriptor.secret.trim()) {
		throw new ConfigurationError(`Agent secret for ${descriptor.platform} is missing`);
	}
	if (!descriptor.name.trim()) {
		throw new ConfigurationError("Agent name must not be empty");
	}
	if (!descriptor.workdir.trim()) {
		throw new ConfigurationError(`Work directory for agent '${descriptor.name}' must not be empty`);
	}
	if (!descriptor.artifactPath.trim()) {
		throw new ConfigurationError("Agent artifact path must not be empty");
	}
}

/**
 * Shared types, constants and host commands for the agent keeper packages.
 */

export * from "./constants.js";
export * from "./host-commands.js";
export type { Platform, ServiceCommand, ServiceDescriptor, ServiceState } from "./types/service.js";

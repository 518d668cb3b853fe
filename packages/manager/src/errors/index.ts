export { ManagerError } from "./manager-error.js";
export { ConfigurationError } from "./configuration-error.js";
export { UnsupportedPlatformError } from "./unsupported-platform-error.js";
export { DownloadError } from "./download-error.js";
export { CommandError, type CommandErrorDetails } from "./command-error.js";
export { InstallationError } from "./installation-error.js";
export { AlertTransportError } from "./alert-transport-error.js";
export { describeFatal, exitCodeFor } from "./exit-codes.js";

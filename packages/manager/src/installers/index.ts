export { LinuxServiceInstaller } from "./linux-installer.js";
export { WindowsServiceInstaller } from "./windows-installer.js";
export { PrivilegedServiceFileWriter } from "./service-file-writer.js";
export { renderUnitFile, unitFileName } from "./unit-file.js";
export { validateDescriptor } from "./validate-descriptor.js";
export { type InstallerDependencies, createPlatformInstaller, detectPlatform } from "./create-platform-installer.js";

export { LOG_LEVELS, type LogLevel, isLogLevel, resolveLogLevel } from "./log-level.js";
export { LogOutput, type LogOutputOptions, createConsoleOutput } from "./log-output.js";
export { LoggerImpl } from "./logger-impl.js";

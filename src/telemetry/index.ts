/**
 * Telemetry (cross-cutting observability).
 *
 * Lives outside `runtime/`: the registry, run store and CLI all take a
 * `Logger` instance from here, constructed once by the process entry point.
 */

export type { LogEntry, LogEntryType, LogLevel, LoggerOptions } from "./logging/logger.js";
export { Logger, createLogger } from "./logging/logger.js";

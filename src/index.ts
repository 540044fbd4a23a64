export * from "./runtime/task/index.js";
export * from "./runtime/run/index.js";
export { Logger, createLogger, type LogEntry, type LogLevel } from "./telemetry/index.js";
export {
  ConfigValidationError,
  loadPipelineConfig,
  parsePipelineConfig,
  type PipelineConfig,
  type TaskConfig,
} from "./config/config.js";
export { buildRuntime, registerConfiguredTasks, type PipelineRuntime } from "./bootstrap.js";
export { registerPipelineTasks } from "./pipeline/tasks.js";
export type { PipelineServices } from "./pipeline/types.js";
export { createProgram } from "./program.js";

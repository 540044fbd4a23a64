export type {
  JsonObject,
  JsonValue,
  RegisterTaskOptions,
  TaskBody,
  TaskBodyResult,
  TaskDefinition,
  TaskOutcome,
  TaskSummary,
} from "./types.js";
export {
  TaskCycleError,
  TaskDefinitionError,
  TaskFailedError,
  UnknownTaskError,
} from "./errors.js";
export { ExecutionSet, TaskRegistry, createTaskRegistry, type TaskRegistryOptions } from "./registry.js";
export { invokeTaskBody, formatTaskError, describeTaskError } from "./body.js";
export {
  createCommandTask,
  execaCommandRunner,
  CommandFailedError,
  type CommandResult,
  type CommandRunOptions,
  type CommandRunner,
  type CommandTaskSpec,
} from "./command.js";

import { ConfigValidationError } from "../config/config.js";
import { RunStoreError } from "../runtime/run/index.js";
import {
  TaskCycleError,
  TaskDefinitionError,
  TaskFailedError,
  UnknownTaskError,
} from "../runtime/task/index.js";
import type { OutputStream } from "./types/command.js";

/**
 * Print a failure the way the CLI surfaces it and return the exit code.
 * Errors outside the orchestrator's taxonomy are re-thrown.
 */
export function reportCommandError(stderr: OutputStream, error: unknown): number {
  if (error instanceof TaskFailedError) {
    stderr.write(`Task ${error.taskName} failed (run_id=${error.runId}): ${error.reason}\n`);
    return 1;
  }
  if (
    error instanceof UnknownTaskError ||
    error instanceof TaskCycleError ||
    error instanceof TaskDefinitionError ||
    error instanceof RunStoreError ||
    error instanceof ConfigValidationError
  ) {
    stderr.write(`${error.message}\n`);
    return 1;
  }
  throw error;
}

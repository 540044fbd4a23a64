import type { RunStatus, RunStore } from "../../runtime/run/index.js";
import type { TaskRegistry } from "../../runtime/task/index.js";

export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * Everything a command needs; commands return an exit code instead of
 * touching `process` directly.
 */
export interface CommandContext {
  registry: TaskRegistry;
  store: RunStore;
  stdout: OutputStream;
  stderr: OutputStream;
}

export type GlobalOptions = {
  cwd: string;
  config?: string;
};

export interface RunsOptions {
  task?: string;
  status?: RunStatus[];
  limit?: number;
}

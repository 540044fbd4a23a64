/**
 * Process-scoped wiring: config -> logger -> run store -> registry.
 *
 * Everything is constructed here and passed down explicitly; no module keeps
 * a global store or registry.
 */

import type { PipelineConfig } from "./config/config.js";
import { registerPipelineTasks } from "./pipeline/tasks.js";
import type { PipelineServices } from "./pipeline/types.js";
import { FileRunStore, type RunStore } from "./runtime/run/index.js";
import { TaskRegistry, createCommandTask, type CommandRunner } from "./runtime/task/index.js";
import { createLogger, type Logger } from "./telemetry/index.js";

export function registerConfiguredTasks(
  registry: TaskRegistry,
  config: PipelineConfig,
  logger: Logger,
  runner?: CommandRunner,
): void {
  for (const task of config.tasks) {
    registry.register(
      task.name,
      createCommandTask(
        {
          name: task.name,
          command: task.command,
          cwd: task.cwd,
          env: task.env,
          timeoutMs: task.timeoutMs,
        },
        { projectRoot: config.projectRoot, logger, runner },
      ),
      {
        dependencies: task.dependencies,
        cadence: task.cadence,
        description: task.description,
      },
    );
  }
}

export interface PipelineRuntime {
  config: PipelineConfig;
  logger: Logger;
  store: RunStore;
  registry: TaskRegistry;
}

export interface BuildRuntimeOptions {
  logger?: Logger;
  store?: RunStore;
  /** Registers the trading pipeline tasks on top of the configured ones. */
  services?: PipelineServices;
  now?: () => Date;
  /** Executes configured command tasks. Default: execa through the shell. */
  commandRunner?: CommandRunner;
}

export function buildRuntime(config: PipelineConfig, options: BuildRuntimeOptions = {}): PipelineRuntime {
  const logger =
    options.logger ?? createLogger({ logsDir: config.paths.logsDir, logLevel: config.logLevel });
  const store =
    options.store ?? new FileRunStore(config.paths.runsDir, { lock: config.lock, logger });
  const registry = new TaskRegistry({ store, logger, now: options.now });

  if (options.services) registerPipelineTasks(registry, options.services);
  registerConfiguredTasks(registry, config, logger, options.commandRunner);

  return { config, logger, store, registry };
}

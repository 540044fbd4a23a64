import { createLogger, type Logger } from "../../telemetry/index.js";
import { formatDuration, generateRunId } from "../../utils.js";
import type { RunStore, TerminalRunStatus } from "../run/index.js";
import {
  describeTaskError,
  formatTaskError,
  invokeTaskBody,
  serializeArtifacts,
} from "./body.js";
import {
  TaskCycleError,
  TaskDefinitionError,
  TaskFailedError,
  UnknownTaskError,
} from "./errors.js";
import type {
  RegisterTaskOptions,
  TaskBody,
  TaskDefinition,
  TaskSummary,
} from "./types.js";

/**
 * Names of tasks that already completed within one top-level `run` call,
 * each with the id of the run that satisfied it.
 */
export class ExecutionSet {
  private readonly completed: Map<string, string> = new Map();

  has(taskName: string): boolean {
    return this.completed.has(taskName);
  }

  runIdOf(taskName: string): string | undefined {
    return this.completed.get(taskName);
  }

  add(taskName: string, runId: string): void {
    this.completed.set(taskName, runId);
  }

  names(): string[] {
    return Array.from(this.completed.keys());
  }

  get size(): number {
    return this.completed.size;
  }
}

function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
  return left.length - right.length;
}

export interface TaskRegistryOptions {
  store: RunStore;
  logger?: Logger;
  /** Clock used for run timestamps. */
  now?: () => Date;
}

/**
 * Holds task definitions and runs them in dependency order, writing one run
 * record per body invocation through the injected `RunStore`.
 *
 * Execution is strictly sequential: dependencies complete, in declared order,
 * before the dependent body starts. Nothing is retried.
 */
export class TaskRegistry {
  private readonly tasks: Map<string, TaskDefinition> = new Map();
  private readonly store: RunStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TaskRegistryOptions) {
    this.store = options.store;
    this.logger = options.logger ?? createLogger({ logsDir: null, logLevel: "silent" });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Add or replace a task. Dependencies are not checked here, so tasks may be
   * registered in any order; unknown names fail at run time.
   */
  register(name: string, body: TaskBody, options: RegisterTaskOptions = {}): TaskDefinition {
    const taskName = String(name ?? "");
    if (!taskName.trim()) throw new TaskDefinitionError("Task name is required");
    if (typeof body !== "function") {
      throw new TaskDefinitionError(`Task ${taskName} has no executable body`);
    }

    const definition: TaskDefinition = Object.freeze({
      name: taskName,
      dependencies: Object.freeze([...(options.dependencies ?? [])]),
      cadence: options.cadence ?? null,
      description: options.description ?? "",
      body,
    });

    if (this.tasks.has(taskName)) this.logger.debug(`Replacing task definition: ${taskName}`);
    this.tasks.set(taskName, definition);
    return definition;
  }

  /** Registered names in ascending code-point order. */
  list(): string[] {
    return Array.from(this.tasks.keys()).sort(compareCodePoints);
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  get(name: string): TaskDefinition {
    const task = this.tasks.get(name);
    if (!task) throw new UnknownTaskError(name);
    return task;
  }

  describe(): TaskSummary[] {
    return this.list().map((name) => {
      const task = this.get(name);
      return {
        name,
        description: task.description,
        dependencies: [...task.dependencies],
        cadence: task.cadence,
      };
    });
  }

  /**
   * Run `name` after its transitive dependencies and return the run id.
   *
   * Tasks already in `executed` are not run again; a fresh set per call means
   * separate calls re-run shared dependencies.
   *
   * @throws UnknownTaskError when `name` or any dependency is not registered
   * @throws TaskFailedError when this task or a dependency failed
   * @throws TaskCycleError when the dependency graph loops back on itself
   * @throws RunStoreError when a run record cannot be written
   */
  async run(name: string, executed: ExecutionSet = new ExecutionSet()): Promise<string> {
    return this.resolve(name, executed, []);
  }

  private async resolve(name: string, executed: ExecutionSet, chain: string[]): Promise<string> {
    const previousRunId = executed.runIdOf(name);
    if (previousRunId !== undefined) return previousRunId;

    const task = this.get(name);

    if (chain.includes(name)) {
      throw new TaskCycleError([...chain.slice(chain.indexOf(name)), name]);
    }

    const nextChain = [...chain, name];
    for (const dependency of task.dependencies) {
      await this.resolve(dependency, executed, nextChain);
    }

    const runId = await this.execute(task);
    executed.add(task.name, runId);
    return runId;
  }

  private async execute(task: TaskDefinition): Promise<string> {
    const runId = generateRunId();
    const triggeredAt = this.now();

    await this.store.insertRunning({
      runId,
      taskName: task.name,
      triggeredAt: triggeredAt.toISOString(),
    });
    this.logger.action(`Starting task: ${task.name}`, { runId });

    let status: TerminalRunStatus = "FAILED";
    let artifacts: string | null = null;
    let reason = "Task body did not complete";
    let error: string | null = reason;

    try {
      const outcome = await invokeTaskBody(task.body);
      if (outcome.ok) {
        artifacts = serializeArtifacts(outcome.value);
        status = "SUCCESS";
        error = null;
      } else {
        reason = describeTaskError(outcome.error);
        error = formatTaskError(outcome.error);
      }
    } catch (serializationError) {
      reason = describeTaskError(serializationError);
      error = formatTaskError(serializationError);
    } finally {
      await this.store.finalize({
        runId,
        status,
        completedAt: this.now().toISOString(),
        artifacts,
        error,
      });
    }

    const durationMs = Math.max(0, this.now().getTime() - triggeredAt.getTime());
    if (status === "FAILED") {
      this.logger.error(`Task failed: ${task.name}`, { runId, error: reason });
      throw new TaskFailedError(task.name, runId, reason);
    }

    this.logger.info(`Task completed: ${task.name} (${formatDuration(durationMs)})`, { runId });
    return runId;
  }
}

export function createTaskRegistry(options: TaskRegistryOptions): TaskRegistry {
  return new TaskRegistry(options);
}

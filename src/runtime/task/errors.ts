export class UnknownTaskError extends Error {
  constructor(public readonly taskName: string) {
    super(`Unknown task: ${taskName}`);
    this.name = "UnknownTaskError";
  }
}

/**
 * A task body failed. Dependents re-throw the same instance, so `runId`
 * always points at the run that actually failed.
 */
export class TaskFailedError extends Error {
  constructor(
    public readonly taskName: string,
    public readonly runId: string,
    public readonly reason: string,
  ) {
    super(`Task ${taskName} failed; run_id=${runId}: ${reason}`);
    this.name = "TaskFailedError";
  }
}

export class TaskCycleError extends Error {
  constructor(public readonly cycle: readonly string[]) {
    super(`Dependency cycle detected: ${cycle.join(" -> ")}`);
    this.name = "TaskCycleError";
  }
}

export class TaskDefinitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TaskDefinitionError";
  }
}

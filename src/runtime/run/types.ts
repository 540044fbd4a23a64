import { z } from "zod";

export type RunStatus = "RUNNING" | "SUCCESS" | "FAILED";

export type TerminalRunStatus = Exclude<RunStatus, "RUNNING">;

/**
 * One execution attempt of a task.
 *
 * Timestamps are ISO-8601 UTC strings. `artifacts` holds the serialized
 * (JSON) result of the task body, `error` the failure message plus trace.
 */
export interface RunRecord {
  runId: string;
  taskName: string;
  status: RunStatus;
  triggeredAt: string;
  completedAt: string | null;
  artifacts: string | null;
  error: string | null;
}

/**
 * Stored and reported shape of a run: the run-table columns
 * `run_id, task_name, status, triggered_at, completed_at, artifacts, error`.
 */
export interface RunRow {
  run_id: string;
  task_name: string;
  status: RunStatus;
  triggered_at: string;
  completed_at: string | null;
  artifacts: string | null;
  error: string | null;
}

export const RunRowSchema = z.object({
  run_id: z.string().min(1),
  task_name: z.string().min(1),
  status: z.enum(["RUNNING", "SUCCESS", "FAILED"]),
  triggered_at: z.string().datetime(),
  completed_at: z.string().datetime().nullable(),
  artifacts: z.string().nullable(),
  error: z.string().nullable(),
});

export function toRunRow(record: RunRecord): RunRow {
  return {
    run_id: record.runId,
    task_name: record.taskName,
    status: record.status,
    triggered_at: record.triggeredAt,
    completed_at: record.completedAt,
    artifacts: record.artifacts,
    error: record.error,
  };
}

export function fromRunRow(row: RunRow): RunRecord {
  return {
    runId: row.run_id,
    taskName: row.task_name,
    status: row.status,
    triggeredAt: row.triggered_at,
    completedAt: row.completed_at,
    artifacts: row.artifacts,
    error: row.error,
  };
}

/** Validates a stored row and yields the in-memory record. */
export const RunRecordSchema = RunRowSchema.transform(fromRunRow);

export interface InsertRunningParams {
  runId: string;
  taskName: string;
  triggeredAt: string;
}

export interface FinalizeRunParams {
  runId: string;
  status: TerminalRunStatus;
  completedAt: string;
  artifacts: string | null;
  error: string | null;
}

export interface ListRunsOptions {
  limit?: number;
  taskName?: string;
  statuses?: RunStatus[];
}

/**
 * Persistence boundary for run records. The registry only ever calls
 * `insertRunning` and `finalize`; the read accessors serve reporting tools.
 *
 * Implementations must serialize writes themselves: independent processes may
 * write records concurrently.
 */
export interface RunStore {
  insertRunning(params: InsertRunningParams): Promise<RunRecord>;
  /** No-op when the record is already in the requested terminal status. */
  finalize(params: FinalizeRunParams): Promise<RunRecord>;
  get(runId: string): Promise<RunRecord | null>;
  listRecent(options?: ListRunsOptions): Promise<RunRecord[]>;
}

export const DEFAULT_LIST_LIMIT = 10;

export function isTerminalStatus(status: RunStatus): status is TerminalRunStatus {
  return status !== "RUNNING";
}

export function normalizeListLimit(limit: number | undefined): number {
  return typeof limit === "number" && limit > 0 ? Math.floor(limit) : DEFAULT_LIST_LIMIT;
}

/**
 * Newest first; ties broken by run id so the order is stable.
 */
export function compareRunsNewestFirst(a: RunRecord, b: RunRecord): number {
  if (a.triggeredAt !== b.triggeredAt) return a.triggeredAt < b.triggeredAt ? 1 : -1;
  if (a.runId === b.runId) return 0;
  return a.runId < b.runId ? 1 : -1;
}

export function matchesListOptions(run: RunRecord, options: ListRunsOptions | undefined): boolean {
  if (options?.taskName && run.taskName !== options.taskName) return false;
  if (options?.statuses && options.statuses.length > 0 && !options.statuses.includes(run.status)) {
    return false;
  }
  return true;
}

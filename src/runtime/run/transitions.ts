import { RunStoreError } from "./errors.js";
import type { FinalizeRunParams, InsertRunningParams, RunRecord } from "./types.js";

export function createRunningRecord(params: InsertRunningParams): RunRecord {
  return {
    runId: params.runId,
    taskName: params.taskName,
    status: "RUNNING",
    triggeredAt: params.triggeredAt,
    completedAt: null,
    artifacts: null,
    error: null,
  };
}

/**
 * RUNNING -> SUCCESS | FAILED, exactly once.
 *
 * Repeating the same terminal status returns the stored record untouched
 * (`changed: false`); any other transition is rejected.
 */
export function applyFinalize(
  existing: RunRecord | null,
  params: FinalizeRunParams,
): { record: RunRecord; changed: boolean } {
  if (!existing) {
    throw new RunStoreError(`Run not found: ${params.runId}`, { runId: params.runId });
  }

  if (existing.status !== "RUNNING") {
    if (existing.status === params.status) return { record: existing, changed: false };
    throw new RunStoreError(
      `Run ${params.runId} is already ${existing.status}; cannot finalize as ${params.status}`,
      { runId: params.runId },
    );
  }

  const completedAt =
    params.completedAt < existing.triggeredAt ? existing.triggeredAt : params.completedAt;

  return {
    record: {
      ...existing,
      status: params.status,
      completedAt,
      artifacts: params.artifacts,
      error: params.error,
    },
    changed: true,
  };
}

import { RunStoreError } from "./errors.js";
import { applyFinalize, createRunningRecord } from "./transitions.js";
import {
  compareRunsNewestFirst,
  matchesListOptions,
  normalizeListLimit,
  type FinalizeRunParams,
  type InsertRunningParams,
  type ListRunsOptions,
  type RunRecord,
  type RunStore,
} from "./types.js";

/**
 * In-process run store with the same transition rules as `FileRunStore`.
 * Nothing survives the process; meant for tests and embedding.
 */
export class MemoryRunStore implements RunStore {
  private readonly runs: Map<string, RunRecord> = new Map();

  async insertRunning(params: InsertRunningParams): Promise<RunRecord> {
    if (this.runs.has(params.runId)) {
      throw new RunStoreError(`Run already exists: ${params.runId}`, { runId: params.runId });
    }
    const record = createRunningRecord(params);
    this.runs.set(record.runId, record);
    return { ...record };
  }

  async finalize(params: FinalizeRunParams): Promise<RunRecord> {
    const { record } = applyFinalize(this.runs.get(params.runId) ?? null, params);
    this.runs.set(record.runId, record);
    return { ...record };
  }

  async get(runId: string): Promise<RunRecord | null> {
    const record = this.runs.get(runId);
    return record ? { ...record } : null;
  }

  async listRecent(options?: ListRunsOptions): Promise<RunRecord[]> {
    return Array.from(this.runs.values())
      .filter((run) => matchesListOptions(run, options))
      .sort(compareRunsNewestFirst)
      .slice(0, normalizeListLimit(options?.limit))
      .map((run) => ({ ...run }));
  }

  /** Every record in insertion order. */
  all(): RunRecord[] {
    return Array.from(this.runs.values(), (run) => ({ ...run }));
  }
}

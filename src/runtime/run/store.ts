import fs from "fs-extra";
import path from "path";
import type { Logger } from "../../telemetry/index.js";
import { generateId } from "../../utils.js";
import { RunStoreError } from "./errors.js";
import { withFileLock, type FileLockOptions } from "./lock.js";
import { applyFinalize, createRunningRecord } from "./transitions.js";
import {
  RunRecordSchema,
  compareRunsNewestFirst,
  matchesListOptions,
  normalizeListLimit,
  toRunRow,
  type FinalizeRunParams,
  type InsertRunningParams,
  type ListRunsOptions,
  type RunRecord,
  type RunStore,
} from "./types.js";

const RUN_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

export interface FileRunStoreOptions {
  lock?: FileLockOptions;
  /** Receives a warning for every unreadable record skipped by `listRecent`. */
  logger?: Logger;
}

/**
 * Disk-backed run store.
 *
 * Layout: `<runsDir>/<runId>.json`, one run-table row (snake_case columns)
 * per file, plus `<runsDir>/.lock` held for the duration of every write. Records land through
 * write-temp-then-rename, so a reader never sees a half-written file.
 */
export class FileRunStore implements RunStore {
  private readonly runsDir: string;
  private readonly lockPath: string;
  private readonly lockOptions?: FileLockOptions;
  private readonly logger?: Logger;

  constructor(runsDir: string, options: FileRunStoreOptions = {}) {
    this.runsDir = path.resolve(runsDir);
    this.lockPath = path.join(this.runsDir, ".lock");
    this.lockOptions = options.lock;
    this.logger = options.logger;
  }

  getRunsDir(): string {
    return this.runsDir;
  }

  getRunPath(runId: string): string {
    if (!RUN_ID_PATTERN.test(runId)) {
      throw new RunStoreError(`Invalid run id: "${runId}"`, { runId });
    }
    return path.join(this.runsDir, `${runId}.json`);
  }

  async insertRunning(params: InsertRunningParams): Promise<RunRecord> {
    const runPath = this.getRunPath(params.runId);
    return this.withWriteLock(params.runId, "insert", async () => {
      if (await fs.pathExists(runPath)) {
        throw new RunStoreError(`Run already exists: ${params.runId}`, { runId: params.runId });
      }
      const record = createRunningRecord(params);
      await this.writeRecord(runPath, record);
      return record;
    });
  }

  async finalize(params: FinalizeRunParams): Promise<RunRecord> {
    const runPath = this.getRunPath(params.runId);
    return this.withWriteLock(params.runId, "finalize", async () => {
      const existing = await this.readRecord(runPath, params.runId);
      const { record, changed } = applyFinalize(existing, params);
      if (changed) await this.writeRecord(runPath, record);
      return record;
    });
  }

  async get(runId: string): Promise<RunRecord | null> {
    const runPath = this.getRunPath(runId);
    try {
      return await this.readRecord(runPath, runId);
    } catch (error) {
      throw this.toStoreError(error, `Failed to read run ${runId}`, runId);
    }
  }

  async listRecent(options?: ListRunsOptions): Promise<RunRecord[]> {
    let files: string[];
    try {
      await fs.ensureDir(this.runsDir);
      files = (await fs.readdir(this.runsDir)).filter((f) => f.endsWith(".json"));
    } catch (error) {
      throw this.toStoreError(error, `Failed to list runs in ${this.runsDir}`);
    }

    const runs: RunRecord[] = [];
    for (const file of files) {
      const runId = file.replace(/\.json$/, "");
      try {
        const run = await this.readRecord(path.join(this.runsDir, file), runId);
        if (run && matchesListOptions(run, options)) runs.push(run);
      } catch (error) {
        this.logger?.warn(`Skipping unreadable run record: ${file}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    runs.sort(compareRunsNewestFirst);
    return runs.slice(0, normalizeListLimit(options?.limit));
  }

  private async withWriteLock<T>(runId: string, action: string, fn: () => Promise<T>): Promise<T> {
    try {
      await fs.ensureDir(this.runsDir);
      return await withFileLock(this.lockPath, fn, this.lockOptions);
    } catch (error) {
      throw this.toStoreError(error, `Failed to ${action} run ${runId}`, runId);
    }
  }

  private async readRecord(runPath: string, runId: string): Promise<RunRecord | null> {
    if (!(await fs.pathExists(runPath))) return null;
    const raw: unknown = await fs.readJson(runPath);
    const parsed = RunRecordSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RunStoreError(`Corrupted run record ${runId}: ${parsed.error.message}`, { runId });
    }
    return parsed.data;
  }

  private async writeRecord(runPath: string, record: RunRecord): Promise<void> {
    const tempFilePath = `${runPath}.tmp.${generateId()}`;
    try {
      await fs.writeJson(tempFilePath, toRunRow(record), { spaces: 2 });
      await fs.rename(tempFilePath, runPath);
    } catch (error) {
      await fs.remove(tempFilePath);
      throw error;
    }
  }

  private toStoreError(error: unknown, message: string, runId?: string): RunStoreError {
    if (error instanceof RunStoreError) return error;
    const detail = error instanceof Error ? error.message : String(error);
    return new RunStoreError(`${message}: ${detail}`, { runId, cause: error });
  }
}

export function createFileRunStore(runsDir: string, options?: FileRunStoreOptions): FileRunStore {
  return new FileRunStore(runsDir, options);
}

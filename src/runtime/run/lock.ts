import fs from "fs-extra";
import { generateId } from "../../utils.js";
import { RunStoreError } from "./errors.js";

export interface FileLockOptions {
  /** Delay between acquisition attempts. Default: 25ms */
  retryDelayMs?: number;
  /**
   * Give up (RunStoreError) after this long. Default: 60s. Keep it above
   * `staleMs` so a waiter outlives a lock abandoned by a crashed writer.
   */
  timeoutMs?: number;
  /** A lock file older than this is treated as abandoned. Default: 30s */
  staleMs?: number;
}

export const DEFAULT_LOCK_OPTIONS: Required<FileLockOptions> = {
  retryDelayMs: 25,
  timeoutMs: 60_000,
  staleMs: 30_000,
};

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Acquire an exclusive lock file.
 *
 * Creation uses `flag: "wx"`, so concurrent processes race safely: exactly one
 * creates the file, the others wait and retry. Returns the owner token that
 * must be handed back to `releaseFileLock`.
 */
export async function acquireFileLock(
  lockPath: string,
  options: FileLockOptions = {},
): Promise<string> {
  const { retryDelayMs, timeoutMs, staleMs } = { ...DEFAULT_LOCK_OPTIONS, ...options };
  const token = generateId();
  const startedAt = Date.now();

  for (;;) {
    try {
      await fs.writeFile(
        lockPath,
        JSON.stringify({ token, pid: process.pid, acquiredAt: new Date().toISOString() }),
        { encoding: "utf8", flag: "wx" },
      );
      return token;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== "EEXIST") {
        throw new RunStoreError(`Failed to acquire lock ${lockPath}`, { cause: error });
      }
    }

    await breakStaleLock(lockPath, staleMs);

    if (Date.now() - startedAt >= timeoutMs) {
      throw new RunStoreError(`Timed out after ${timeoutMs}ms waiting for lock ${lockPath}`);
    }
    await sleep(retryDelayMs);
  }
}

async function breakStaleLock(lockPath: string, staleMs: number): Promise<void> {
  let mtimeMs: number;
  try {
    mtimeMs = (await fs.stat(lockPath)).mtimeMs;
  } catch (error) {
    // released between our create attempt and the stat
    if (isErrnoException(error) && error.code === "ENOENT") return;
    throw new RunStoreError(`Failed to inspect lock ${lockPath}`, { cause: error });
  }
  if (Date.now() - mtimeMs > staleMs) {
    await fs.remove(lockPath);
  }
}

/**
 * Remove the lock file if it is still ours. A lock broken as stale and
 * re-acquired by another process is left alone.
 */
export async function releaseFileLock(lockPath: string, token: string): Promise<void> {
  let raw: string;
  try {
    raw = await fs.readFile(lockPath, "utf8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") return;
    throw new RunStoreError(`Failed to release lock ${lockPath}`, { cause: error });
  }
  if (!raw.includes(`"token":"${token}"`)) return;
  await fs.remove(lockPath);
}

export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options?: FileLockOptions,
): Promise<T> {
  const token = await acquireFileLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await releaseFileLock(lockPath, token);
  }
}

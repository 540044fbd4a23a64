export type {
  FinalizeRunParams,
  InsertRunningParams,
  ListRunsOptions,
  RunRecord,
  RunRow,
  RunStatus,
  RunStore,
  TerminalRunStatus,
} from "./types.js";
export {
  RunRecordSchema,
  RunRowSchema,
  DEFAULT_LIST_LIMIT,
  fromRunRow,
  isTerminalStatus,
  toRunRow,
} from "./types.js";
export { RunStoreError } from "./errors.js";
export { FileRunStore, createFileRunStore, type FileRunStoreOptions } from "./store.js";
export { MemoryRunStore } from "./memory-store.js";
export { withFileLock, DEFAULT_LOCK_OPTIONS, type FileLockOptions } from "./lock.js";

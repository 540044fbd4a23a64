/**
 * The run store is unreachable or rejected a write. Always fatal for the
 * `run` call that hit it.
 */
export class RunStoreError extends Error {
  public readonly runId?: string;

  constructor(message: string, options?: { runId?: string; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "RunStoreError";
    this.runId = options?.runId;
  }
}

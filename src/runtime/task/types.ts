export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * What a task body may hand back. `undefined` (or no return) means "no
 * artifacts"; anything else is serialized into the run record.
 */
export type TaskBodyResult = JsonValue | undefined | void;

/**
 * The executable part of a task: invoked with no arguments, either returns
 * an optional result or fails by throwing / rejecting. Bodies needing input
 * close over it.
 */
export type TaskBody = () => TaskBodyResult | Promise<TaskBodyResult>;

/**
 * Result of invoking a body, with thrown errors folded into a variant.
 */
export type TaskOutcome =
  | { ok: true; value: JsonValue | undefined }
  | { ok: false; error: unknown };

export interface TaskDefinition {
  readonly name: string;
  readonly dependencies: readonly string[];
  /** Opaque scheduling hint, never interpreted by the registry. */
  readonly cadence: string | null;
  readonly description: string;
  readonly body: TaskBody;
}

export interface RegisterTaskOptions {
  dependencies?: readonly string[];
  cadence?: string | null;
  description?: string;
}

export interface TaskSummary {
  name: string;
  description: string;
  dependencies: string[];
  cadence: string | null;
}

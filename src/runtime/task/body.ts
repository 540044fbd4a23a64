import type { JsonValue, TaskBody, TaskBodyResult, TaskOutcome } from "./types.js";

function isJsonValue(value: TaskBodyResult): value is JsonValue {
  return value !== undefined;
}

/**
 * Invoke a body and fold whatever it does (return, throw, reject) into a
 * `TaskOutcome`. Never throws.
 */
export async function invokeTaskBody(body: TaskBody): Promise<TaskOutcome> {
  try {
    const value = await body();
    return { ok: true, value: isJsonValue(value) && value !== null ? value : undefined };
  } catch (error) {
    return { ok: false, error };
  }
}

export function serializeArtifacts(value: JsonValue | undefined): string | null {
  if (value === undefined) return null;
  const text: unknown = JSON.stringify(value);
  if (typeof text !== "string") {
    throw new TypeError("Task result is not JSON-serializable");
  }
  return text;
}

export function describeTaskError(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

/**
 * Message plus full trace, as stored in a run record's `error` field.
 */
export function formatTaskError(error: unknown): string {
  const message = describeTaskError(error);
  if (!(error instanceof Error) || !error.stack) return message;
  return `${message}\n${error.stack}`;
}

import { describe, expect, it } from "vitest";
import { describeTaskError, formatTaskError, invokeTaskBody, serializeArtifacts } from "./body.js";

describe("invokeTaskBody", () => {
  it("wraps sync and async return values", async () => {
    expect(await invokeTaskBody(() => 5)).toEqual({ ok: true, value: 5 });
    expect(await invokeTaskBody(async () => ({ rows: 2 }))).toEqual({ ok: true, value: { rows: 2 } });
  });

  it("maps null and undefined to no value", async () => {
    expect(await invokeTaskBody(() => null)).toEqual({ ok: true, value: undefined });
    expect(await invokeTaskBody(() => undefined)).toEqual({ ok: true, value: undefined });
    expect(await invokeTaskBody(async () => {})).toEqual({ ok: true, value: undefined });
  });

  it("captures throws and rejections", async () => {
    const thrown = new Error("sync");
    expect(
      await invokeTaskBody(() => {
        throw thrown;
      }),
    ).toEqual({ ok: false, error: thrown });
    expect(await invokeTaskBody(() => Promise.reject("plain"))).toEqual({ ok: false, error: "plain" });
  });
});

describe("serializeArtifacts", () => {
  it("returns null for no value and JSON text otherwise", () => {
    expect(serializeArtifacts(undefined)).toBeNull();
    expect(serializeArtifacts({ a: [1, "b", false] })).toBe('{"a":[1,"b",false]}');
    expect(serializeArtifacts(0)).toBe("0");
  });
});

describe("describeTaskError / formatTaskError", () => {
  it("uses the message, falling back to the error name", () => {
    expect(describeTaskError(new RangeError("out of range"))).toBe("out of range");
    expect(describeTaskError(new TypeError(""))).toBe("TypeError");
    expect(describeTaskError(42)).toBe("42");
  });

  it("appends the stack trace to the message", () => {
    const error = new Error("boom");
    expect(formatTaskError(error)).toBe(`boom\n${error.stack}`);
    expect(formatTaskError(error).startsWith("boom\nError: boom")).toBe(true);
  });

  it("returns the bare message without a stack", () => {
    const error = new Error("no trace");
    error.stack = undefined;
    expect(formatTaskError(error)).toBe("no trace");
    expect(formatTaskError("text")).toBe("text");
  });
});

import { describe, expect, it } from "vitest";
import { RunStoreError } from "./errors.js";
import { MemoryRunStore } from "./memory-store.js";

const T0 = "2024-03-01T08:00:00.000Z";
const T1 = "2024-03-01T08:00:01.000Z";

describe("MemoryRunStore", () => {
  it("follows the same transitions as the file store", async () => {
    const store = new MemoryRunStore();
    await store.insertRunning({ runId: "r1", taskName: "base", triggeredAt: T0 });

    await expect(
      store.insertRunning({ runId: "r1", taskName: "base", triggeredAt: T0 }),
    ).rejects.toThrow("Run already exists: r1");

    const done = await store.finalize({ runId: "r1", status: "SUCCESS", completedAt: T1, artifacts: "1", error: null });
    expect(done.status).toBe("SUCCESS");
    expect(
      await store.finalize({ runId: "r1", status: "SUCCESS", completedAt: T0, artifacts: null, error: null }),
    ).toEqual(done);
    await expect(
      store.finalize({ runId: "missing", status: "FAILED", completedAt: T1, artifacts: null, error: "x" }),
    ).rejects.toBeInstanceOf(RunStoreError);
  });

  it("hands out copies", async () => {
    const store = new MemoryRunStore();
    const record = await store.insertRunning({ runId: "r1", taskName: "base", triggeredAt: T0 });
    record.status = "FAILED";
    expect((await store.get("r1"))?.status).toBe("RUNNING");
    expect(await store.get("r2")).toBeNull();
  });

  it("lists newest first while all() keeps insertion order", async () => {
    const store = new MemoryRunStore();
    await store.insertRunning({ runId: "a", taskName: "x", triggeredAt: T0 });
    await store.insertRunning({ runId: "b", taskName: "y", triggeredAt: T1 });
    await store.insertRunning({ runId: "c", taskName: "x", triggeredAt: T1 });

    expect((await store.listRecent()).map((r) => r.runId)).toEqual(["c", "b", "a"]);
    expect((await store.listRecent({ taskName: "x", limit: 1 })).map((r) => r.runId)).toEqual(["c"]);
    expect(store.all().map((r) => r.runId)).toEqual(["a", "b", "c"]);
  });
});

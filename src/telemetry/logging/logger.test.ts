import os from "os";
import path from "path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Logger } from "./logger.js";

describe("Logger", () => {
  let logsDir: string;

  beforeEach(async () => {
    logsDir = await fs.mkdtemp(path.join(os.tmpdir(), "pipeline-logs-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(logsDir);
  });

  async function readEntries(): Promise<Array<Record<string, unknown>>> {
    const files = await fs.readdir(logsDir);
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^\d{4}-\d{2}-\d{2}\.jsonl$/);
    const text = await fs.readFile(path.join(logsDir, files[0] ?? ""), "utf8");
    return text
      .trim()
      .split("\n")
      .map((line): Record<string, unknown> => JSON.parse(line));
  }

  it("appends entries as JSON lines and keeps debug off disk at info level", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = new Logger({ logsDir, logLevel: "info" });

    logger.info("Task completed", { runId: "r1" });
    logger.debug("noise");
    logger.action("Starting task");
    await logger.flush();

    const entries = await readEntries();
    expect(entries.map((e) => [e.type, e.message, e.details])).toEqual([
      ["info", "Task completed", { runId: "r1" }],
      ["action", "Starting task", undefined],
    ]);
    expect(logger.getLogs().map((e) => e.type)).toEqual(["info", "debug", "action"]);
  });

  it("persists debug entries at debug level", async () => {
    vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = new Logger({ logsDir, logLevel: "debug" });

    await logger.log("trace", "fine grained");

    expect((await readEntries()).map((e) => e.type)).toEqual(["debug"]);
  });

  it("prints to stderr only at or above the configured level", async () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const logger = new Logger({ logsDir: null, logLevel: "warn" });

    logger.info("quiet");
    logger.warn("careful");
    await logger.flush();

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0])).toContain("[WARN   ] careful");
  });

  it("reports a persistence failure once", async () => {
    const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const blocked = path.join(logsDir, "not-a-dir");
    await fs.writeFile(blocked, "");
    const logger = new Logger({ logsDir: blocked, logLevel: "silent" });

    logger.error("first");
    logger.error("second");
    await logger.flush();

    expect(write).toHaveBeenCalledTimes(1);
    expect(String(write.mock.calls[0]?.[0]).startsWith(`Failed to persist logs to ${blocked}: `)).toBe(true);
  });

  it("normalizes level names and trims recent entries", async () => {
    const logger = new Logger({ logsDir: null, logLevel: "silent" });
    await logger.log("WARNING", "a");
    await logger.log("err", "b");
    await logger.log("whatever", "c");

    expect(logger.getLogs().map((e) => e.type)).toEqual(["warn", "error", "info"]);
    expect(logger.getRecentLogs(1).map((e) => e.message)).toEqual(["c"]);
    expect(logger.getLogsByType("error").map((e) => e.message)).toEqual(["b"]);
    logger.clearLogs();
    expect(logger.getLogs()).toEqual([]);
  });
});

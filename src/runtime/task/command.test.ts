import path from "path";
import { describe, expect, it, vi } from "vitest";
import { createLogger } from "../../telemetry/index.js";
import { MemoryRunStore } from "../run/index.js";
import { CommandFailedError, createCommandTask, type CommandResult, type CommandRunner } from "./command.js";
import { TaskRegistry } from "./registry.js";

const logger = createLogger({ logsDir: null, logLevel: "silent" });
const projectRoot = path.resolve("/srv/project");

function fakeRunner(result: Partial<CommandResult>) {
  return vi.fn<CommandRunner>(async () => ({
    exitCode: 0,
    stdout: "",
    stderr: "",
    timedOut: false,
    ...result,
  }));
}

describe("createCommandTask", () => {
  it("runs the command relative to the project root and returns its output", async () => {
    const runner = fakeRunner({ stdout: "42 rows" });
    const body = createCommandTask(
      { name: "load", command: "make load", cwd: "jobs", env: { MODE: "test" }, timeoutMs: 500 },
      { projectRoot, logger, runner },
    );

    const result = await body();

    expect(runner).toHaveBeenCalledWith("make load", {
      cwd: path.join(projectRoot, "jobs"),
      env: { MODE: "test" },
      timeoutMs: 500,
    });
    expect(result).toMatchObject({ command: "make load", exitCode: 0, stdout: "42 rows" });
  });

  it("defaults cwd to the project root", async () => {
    const runner = fakeRunner({});
    await createCommandTask({ name: "t", command: "true" }, { projectRoot, logger, runner })();
    expect(runner.mock.calls[0]?.[1].cwd).toBe(projectRoot);
  });

  it("fails on a non-zero exit with the stderr tail", async () => {
    const runner = fakeRunner({ exitCode: 2, stderr: `${"x".repeat(5000)}END` });
    const body = createCommandTask({ name: "t", command: "make load" }, { projectRoot, logger, runner });

    const error = await Promise.resolve(body()).then(
      () => null,
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(CommandFailedError);
    if (!(error instanceof CommandFailedError)) return;
    expect(error.exitCode).toBe(2);
    expect(error.stderr).toHaveLength(4000);
    expect(error.stderr.endsWith("END")).toBe(true);
    expect(error.message.split("\n")[0]).toBe("Command exited with code 2: make load");
  });

  it("fails on a timeout", async () => {
    const runner = fakeRunner({ exitCode: undefined, timedOut: true });
    const body = createCommandTask({ name: "t", command: "sleep 10" }, { projectRoot, logger, runner });
    await expect(Promise.resolve(body())).rejects.toThrow("Command timed out: sleep 10");
  });

  it("records a failed command as a FAILED run", async () => {
    const store = new MemoryRunStore();
    const registry = new TaskRegistry({ store });
    const runner = fakeRunner({ exitCode: 1, stderr: "missing input" });
    registry.register("load", createCommandTask({ name: "load", command: "make load" }, { projectRoot, logger, runner }));

    await expect(registry.run("load")).rejects.toThrow(
      "Task load failed; run_id=",
    );
    const [run] = store.all();
    expect(run?.status).toBe("FAILED");
    expect(run?.error?.startsWith("Command exited with code 1: make load\nmissing input\n")).toBe(true);
  });
});

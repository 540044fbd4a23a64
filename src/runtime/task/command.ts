import path from "path";
import { execa } from "execa";
import type { Logger } from "../../telemetry/index.js";
import type { JsonObject, TaskBody } from "./types.js";

export interface CommandTaskSpec {
  name: string;
  command: string;
  /** Relative to the project root. */
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface CommandRunOptions {
  cwd: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number | undefined;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export type CommandRunner = (command: string, options: CommandRunOptions) => Promise<CommandResult>;

/** Runs through the shell; never rejects on a non-zero exit. */
export const execaCommandRunner: CommandRunner = async (command, options) => {
  const result = await execa(command, {
    cwd: options.cwd,
    shell: true,
    reject: false,
    ...(options.env ? { env: options.env } : {}),
    ...(typeof options.timeoutMs === "number" ? { timeout: options.timeoutMs } : {}),
  });
  return {
    exitCode: result.exitCode,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? "",
    timedOut: result.timedOut,
  };
};

const MAX_OUTPUT_CHARS = 4000;

function tail(text: string, maxChars: number): string {
  return text.length > maxChars ? text.slice(-maxChars) : text;
}

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly exitCode: number | undefined,
    public readonly stderr: string,
    timedOut: boolean,
  ) {
    const status = timedOut ? "timed out" : `exited with code ${exitCode ?? "unknown"}`;
    super(stderr ? `Command ${status}: ${command}\n${stderr}` : `Command ${status}: ${command}`);
    this.name = "CommandFailedError";
  }
}

/**
 * Task body that runs a shell command. A non-zero exit (or timeout) fails the
 * task; otherwise the exit code, duration and stdout tail become artifacts.
 */
export function createCommandTask(
  spec: CommandTaskSpec,
  context: { projectRoot: string; logger: Logger; runner?: CommandRunner },
): TaskBody {
  const runner = context.runner ?? execaCommandRunner;
  const cwd = spec.cwd ? path.resolve(context.projectRoot, spec.cwd) : context.projectRoot;

  return async (): Promise<JsonObject> => {
    const startedAt = Date.now();
    context.logger.debug(`Executing command for ${spec.name}: ${spec.command}`, { cwd });

    const result = await runner(spec.command, {
      cwd,
      env: spec.env,
      timeoutMs: spec.timeoutMs,
    });

    if (result.exitCode !== 0 || result.timedOut) {
      throw new CommandFailedError(
        spec.command,
        result.exitCode,
        tail(result.stderr, MAX_OUTPUT_CHARS),
        result.timedOut,
      );
    }

    return {
      command: spec.command,
      exitCode: 0,
      durationMs: Date.now() - startedAt,
      stdout: tail(result.stdout, MAX_OUTPUT_CHARS),
    };
  };
}

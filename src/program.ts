import path from "path";
import { Command, InvalidArgumentError } from "commander";
import { buildRuntime, type BuildRuntimeOptions } from "./bootstrap.js";
import { listCommand } from "./commands/list.js";
import { reportCommandError } from "./commands/report.js";
import { runCommand } from "./commands/run.js";
import { runsCommand, showCommand } from "./commands/runs.js";
import type { CommandContext, GlobalOptions, OutputStream } from "./commands/types/command.js";
import { loadPipelineConfig } from "./config/config.js";
import type { RunStatus } from "./runtime/run/index.js";

export interface ProgramIO {
  stdout: OutputStream;
  stderr: OutputStream;
  setExitCode(code: number): void;
}

export interface CreateProgramOptions {
  version?: string;
  io?: ProgramIO;
  /** Forwarded to `buildRuntime` (tests inject stores, services and clocks). */
  runtime?: BuildRuntimeOptions;
}

const processIO: ProgramIO = {
  stdout: process.stdout,
  stderr: process.stderr,
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

const RUN_STATUSES: readonly RunStatus[] = ["RUNNING", "SUCCESS", "FAILED"];

const parseLimit = (value: string): number => {
  const num = Number.parseInt(value, 10);
  if (!Number.isInteger(num) || num <= 0) {
    throw new InvalidArgumentError(`Invalid limit: ${value}`);
  }
  return num;
};

const parseStatuses = (value: string): RunStatus[] => {
  const statuses: RunStatus[] = [];
  for (const part of value.split(",")) {
    const candidate = part.trim().toUpperCase();
    const status = RUN_STATUSES.find((s) => s === candidate);
    if (!status) throw new InvalidArgumentError(`Invalid status: ${part.trim()}`);
    statuses.push(status);
  }
  return statuses;
};

export function createProgram(options: CreateProgramOptions = {}): Command {
  const io = options.io ?? processIO;
  const program = new Command();

  program
    .name("pipeline")
    .description("Run inter-dependent pipeline tasks in dependency order and record every run")
    .version(options.version ?? "0.0.0", "-v, --version")
    .option("-C, --cwd <path>", "project root", ".")
    .option("-c, --config <path>", "config file (default: <project root>/pipeline.json)")
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  const withContext = async (
    command: Command,
    fn: (ctx: CommandContext) => number | Promise<number>,
  ): Promise<void> => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    const projectRoot = path.resolve(globals.cwd);

    let exitCode: number;
    try {
      const config = await loadPipelineConfig(projectRoot, {
        configPath: globals.config ? path.resolve(projectRoot, globals.config) : undefined,
      });
      const runtime = buildRuntime(config, options.runtime);
      try {
        exitCode = await fn({
          registry: runtime.registry,
          store: runtime.store,
          stdout: io.stdout,
          stderr: io.stderr,
        });
      } finally {
        await runtime.logger.flush();
      }
    } catch (error) {
      exitCode = reportCommandError(io.stderr, error);
    }
    io.setExitCode(exitCode);
  };

  program
    .command("list")
    .description("List registered tasks with their descriptions")
    .action(async (_opts: unknown, command: Command) => {
      await withContext(command, (ctx) => listCommand(ctx));
    });

  program
    .command("run <name>")
    .description("Run a task (and its dependencies) by name")
    .action(async (name: string, _opts: unknown, command: Command) => {
      await withContext(command, (ctx) => runCommand(ctx, name));
    });

  program
    .command("runs")
    .description("Show recent run records, newest first")
    .option("-t, --task <name>", "only runs of this task")
    .option("-s, --status <statuses>", "comma-separated RUNNING,SUCCESS,FAILED", parseStatuses)
    .option("-n, --limit <n>", "maximum number of runs", parseLimit, 10)
    .action(
      async (
        opts: { task?: string; status?: RunStatus[]; limit: number },
        command: Command,
      ) => {
        await withContext(command, (ctx) => runsCommand(ctx, opts));
      },
    );

  program
    .command("show <runId>")
    .description("Show one run record")
    .action(async (runId: string, _opts: unknown, command: Command) => {
      await withContext(command, (ctx) => showCommand(ctx, runId));
    });

  return program;
}

import { toRunRow } from "../runtime/run/index.js";
import { reportCommandError } from "./report.js";
import type { CommandContext, RunsOptions } from "./types/command.js";

/**
 * `pipeline runs`: recent run rows, newest first, one JSON object per line.
 */
export async function runsCommand(ctx: CommandContext, options: RunsOptions = {}): Promise<number> {
  try {
    const runs = await ctx.store.listRecent({
      limit: options.limit,
      taskName: options.task,
      statuses: options.status,
    });
    for (const run of runs) {
      ctx.stdout.write(`${JSON.stringify(toRunRow(run))}\n`);
    }
    return 0;
  } catch (error) {
    return reportCommandError(ctx.stderr, error);
  }
}

/**
 * `pipeline show <runId>`: a single run record, pretty-printed.
 */
export async function showCommand(ctx: CommandContext, runId: string): Promise<number> {
  try {
    const run = await ctx.store.get(runId);
    if (!run) {
      ctx.stderr.write(`Run not found: ${runId}\n`);
      return 1;
    }
    ctx.stdout.write(`${JSON.stringify(toRunRow(run), null, 2)}\n`);
    return 0;
  } catch (error) {
    return reportCommandError(ctx.stderr, error);
  }
}

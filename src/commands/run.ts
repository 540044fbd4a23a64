import { reportCommandError } from "./report.js";
import type { CommandContext } from "./types/command.js";

/**
 * `pipeline run <name>`: run a task after its dependencies.
 *
 * Success prints `{"task":...,"run_id":...}` on stdout. Failure prints the
 * failing run id and reason on stderr and returns 1.
 */
export async function runCommand(ctx: CommandContext, name: string): Promise<number> {
  try {
    const runId = await ctx.registry.run(name);
    ctx.stdout.write(`${JSON.stringify({ task: name, run_id: runId })}\n`);
    return 0;
  } catch (error) {
    return reportCommandError(ctx.stderr, error);
  }
}

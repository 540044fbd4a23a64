import type { CommandContext } from "./types/command.js";

/**
 * `pipeline list`: one `<name>: <description>` line per task, sorted by name.
 */
export function listCommand(ctx: CommandContext): number {
  const tasks = ctx.registry.describe();
  if (tasks.length === 0) {
    ctx.stderr.write("No tasks registered\n");
    return 0;
  }
  for (const task of tasks) {
    ctx.stdout.write(`${task.name}: ${task.description}\n`);
  }
  return 0;
}

/**
 * Project configuration (`pipeline.json`).
 *
 * - `${VAR_NAME}` placeholders are resolved from the environment after the
 *   project's `.env` has been loaded.
 * - `PIPELINE_LOG_LEVEL`, `PIPELINE_RUNS_DIR` and `PIPELINE_LOGS_DIR` override
 *   the file.
 * - Relative paths resolve against the project root.
 */

import fs from "fs-extra";
import path from "path";
import { z } from "zod";
import {
  getLogsDirPath,
  getPipelineJsonPath,
  getRunsDirPath,
  loadProjectDotenv,
} from "../utils.js";

const TASK_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.:-]{0,127}$/;

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const TaskConfigSchema = z.object({
  name: z.string().regex(TASK_NAME_PATTERN, "Invalid task name"),
  description: z.string().default(""),
  dependencies: z.array(z.string().min(1)).default([]),
  cadence: z.string().min(1).nullable().default(null),
  command: z.string().min(1),
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const PipelineConfigSchema = z.object({
  $schema: z.string().optional(),
  name: z.string().min(1).default("pipeline"),
  logLevel: LogLevelSchema.default("info"),
  paths: z
    .object({
      runsDir: z.string().min(1).optional(),
      logsDir: z.string().min(1).optional(),
    })
    .default({}),
  lock: z
    .object({
      retryDelayMs: z.number().int().positive().optional(),
      timeoutMs: z.number().int().positive().optional(),
      staleMs: z.number().int().positive().optional(),
    })
    .default({}),
  tasks: z.array(TaskConfigSchema).default([]),
});

export type TaskConfig = z.infer<typeof TaskConfigSchema>;
export type PipelineFileConfig = z.infer<typeof PipelineConfigSchema>;

export interface PipelineConfig extends Omit<PipelineFileConfig, "paths"> {
  projectRoot: string;
  paths: { runsDir: string; logsDir: string };
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly issues: string[] = [],
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = "ConfigValidationError";
  }
}

export function resolveEnvPlaceholdersDeep(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/gi, (_match, name: string) => env[name] ?? "");
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholdersDeep(item, env));
  }

  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = resolveEnvPlaceholdersDeep(v, env);
    }
    return out;
  }

  return value;
}

function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) return raw;
  const out: Record<string, unknown> = { ...raw };
  const paths: Record<string, unknown> =
    out.paths && typeof out.paths === "object" && !Array.isArray(out.paths) ? { ...out.paths } : {};

  if (env.PIPELINE_LOG_LEVEL) out.logLevel = env.PIPELINE_LOG_LEVEL.trim().toLowerCase();
  if (env.PIPELINE_RUNS_DIR) paths.runsDir = env.PIPELINE_RUNS_DIR;
  if (env.PIPELINE_LOGS_DIR) paths.logsDir = env.PIPELINE_LOGS_DIR;

  out.paths = paths;
  return out;
}

/**
 * Validate an already-parsed config object against the schema.
 */
export function parsePipelineConfig(
  raw: unknown,
  projectRoot: string,
  source: string = "pipeline.json",
): PipelineConfig {
  const parsed = PipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    const first = parsed.error.issues[0];
    throw new ConfigValidationError(
      issues.join("; "),
      first && first.path.length > 0 ? first.path.join(".") : source,
      issues,
    );
  }

  const names = new Set<string>();
  for (const [index, task] of parsed.data.tasks.entries()) {
    if (names.has(task.name)) {
      throw new ConfigValidationError(`Duplicate task name "${task.name}"`, `tasks.${index}.name`);
    }
    names.add(task.name);
  }

  const root = path.resolve(projectRoot);
  const { paths, ...rest } = parsed.data;
  return {
    ...rest,
    projectRoot: root,
    paths: {
      runsDir: paths.runsDir ? path.resolve(root, paths.runsDir) : getRunsDirPath(root),
      logsDir: paths.logsDir ? path.resolve(root, paths.logsDir) : getLogsDirPath(root),
    },
  };
}

export interface LoadConfigOptions {
  /** Default: `<projectRoot>/pipeline.json`. A missing file yields the defaults. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export async function loadPipelineConfig(
  projectRoot: string,
  options: LoadConfigOptions = {},
): Promise<PipelineConfig> {
  const root = path.resolve(projectRoot);
  const env = options.env ?? process.env;
  if (!options.env) loadProjectDotenv(root);

  const configPath = options.configPath ?? getPipelineJsonPath(root);
  let raw: unknown = {};
  if (await fs.pathExists(configPath)) {
    try {
      raw = await fs.readJson(configPath);
    } catch (error) {
      throw new ConfigValidationError(
        `Cannot parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
        path.basename(configPath),
      );
    }
  }

  return parsePipelineConfig(
    applyEnvOverrides(resolveEnvPlaceholdersDeep(raw, env), env),
    root,
    path.basename(configPath),
  );
}

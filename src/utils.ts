import dotenv from "dotenv";
import path from "path";
import { randomUUID } from "node:crypto";
import { nanoid } from "nanoid";

export function loadProjectDotenv(projectRoot: string): void {
  // Only load the project's .env (do not search upwards)
  dotenv.config({ path: path.join(projectRoot, ".env") });
}

export function generateId(): string {
  return nanoid(16);
}

/**
 * Run ids are 128-bit random, hex encoded (32 chars, no dashes).
 */
export function generateRunId(): string {
  return randomUUID().replace(/-/g, "");
}

export function getTimestamp(): string {
  return new Date().toISOString();
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

export function getPipelineJsonPath(cwd: string): string {
  return path.join(cwd, "pipeline.json");
}

export function getPipelineDirPath(cwd: string): string {
  return path.join(cwd, ".pipeline");
}

export function getRunsDirPath(cwd: string): string {
  return path.join(getPipelineDirPath(cwd), "runs");
}

export function getLogsDirPath(cwd: string): string {
  return path.join(getPipelineDirPath(cwd), "logs");
}

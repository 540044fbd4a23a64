import fs from "fs-extra";
import path from "path";
import { generateId, getTimestamp } from "../../utils.js";

/**
 * Runtime logger for the orchestrator.
 *
 * - Persists entries as JSONL to `<logsDir>/<YYYY-MM-DD>.jsonl` (one line per entry).
 * - Console output goes to stderr so command output on stdout stays machine-readable.
 * - `log(level, ...)` is async because it may write to disk; the convenience
 *   methods are fire-and-forget and ordered through a single write chain.
 */
export type LogEntryType = "info" | "warn" | "error" | "debug" | "action";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface LogEntry {
  id: string;
  timestamp: string;
  type: LogEntryType;
  message: string;
  details?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Directory for JSONL files; `null` keeps logs in memory only. */
  logsDir: string | null;
  logLevel?: LogLevel;
}

const ENTRY_RANK: Record<LogEntryType, number> = {
  debug: 10,
  info: 20,
  action: 20,
  warn: 30,
  error: 40,
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

export class Logger {
  private logs: LogEntry[] = [];
  private readonly logsDir: string | null;
  private readonly logLevel: LogLevel;
  private writeChain: Promise<void> = Promise.resolve();
  private writeFailureReported = false;
  private readonly maxInMemoryEntries = 2000;

  constructor(options: LoggerOptions) {
    this.logsDir = options.logsDir;
    this.logLevel = options.logLevel ?? "info";
  }

  async log(level: string, message: string, details?: Record<string, unknown>): Promise<void> {
    await this.emit(this.normalizeType(level), message, details);
  }

  info(message: string, details?: Record<string, unknown>): void {
    void this.emit("info", message, details);
  }

  warn(message: string, details?: Record<string, unknown>): void {
    void this.emit("warn", message, details);
  }

  error(message: string, details?: Record<string, unknown>): void {
    void this.emit("error", message, details);
  }

  debug(message: string, details?: Record<string, unknown>): void {
    void this.emit("debug", message, details);
  }

  action(message: string, details?: Record<string, unknown>): void {
    void this.emit("action", message, details);
  }

  private normalizeType(level: string): LogEntryType {
    const s = String(level || "").trim().toLowerCase();
    if (s === "warn" || s === "warning") return "warn";
    if (s === "error" || s === "err") return "error";
    if (s === "debug" || s === "trace") return "debug";
    if (s === "action") return "action";
    return "info";
  }

  private async emit(
    type: LogEntryType,
    message: string,
    details?: Record<string, unknown>,
  ): Promise<void> {
    const entry: LogEntry = {
      id: generateId(),
      timestamp: getTimestamp(),
      type,
      message,
      ...(details ? { details } : {}),
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxInMemoryEntries) {
      this.logs.splice(0, this.logs.length - this.maxInMemoryEntries);
    }

    if (ENTRY_RANK[type] >= LEVEL_RANK[this.logLevel]) this.printLog(entry);

    // debug entries only reach disk when debug logging is on
    if (!this.logsDir || (type === "debug" && this.logLevel !== "debug")) return;

    const logsDir = this.logsDir;
    this.writeChain = this.writeChain
      .then(() => this.saveToFile(logsDir, entry))
      .catch((error: unknown) => this.reportWriteFailure(error));
    await this.writeChain;
  }

  private printLog(entry: LogEntry): void {
    const timestamp = entry.timestamp.slice(11, 19);
    const level = entry.type.toUpperCase().padEnd(7);
    const message = `[${timestamp}] [${level}] ${entry.message}`;

    switch (entry.type) {
      case "error":
        process.stderr.write(`\x1b[31m${message}\x1b[0m\n`);
        break;
      case "warn":
        process.stderr.write(`\x1b[33m${message}\x1b[0m\n`);
        break;
      case "debug":
        process.stderr.write(`\x1b[90m${message}\x1b[0m\n`);
        break;
      case "action":
        process.stderr.write(`\x1b[36m${message}\x1b[0m\n`);
        break;
      default:
        process.stderr.write(`${message}\n`);
    }
  }

  private async saveToFile(logsDir: string, entry: LogEntry): Promise<void> {
    const date = entry.timestamp.split("T")[0];
    const logFile = path.join(logsDir, `${date}.jsonl`);
    await fs.ensureDir(logsDir);
    await fs.appendFile(logFile, JSON.stringify(entry) + "\n");
  }

  private reportWriteFailure(error: unknown): void {
    if (this.writeFailureReported) return;
    this.writeFailureReported = true;
    process.stderr.write(
      `Failed to persist logs to ${this.logsDir}: ${error instanceof Error ? error.message : String(error)}\n`,
    );
  }

  /**
   * Resolves once every queued log line has been written.
   */
  async flush(): Promise<void> {
    await this.writeChain;
  }

  getLogs(): LogEntry[] {
    return this.logs;
  }

  getLogsByType(type: LogEntryType): LogEntry[] {
    return this.logs.filter((log) => log.type === type);
  }

  getRecentLogs(count: number = 10): LogEntry[] {
    return this.logs.slice(-count);
  }

  clearLogs(): void {
    this.logs = [];
  }
}

export function createLogger(options: LoggerOptions): Logger {
  return new Logger(options);
}

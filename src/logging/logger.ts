import fs from "node:fs";
import path from "node:path";

export type LogLevel = "info" | "success" | "warn" | "error";

export type OutputFormat = "human" | "jsonl";

export interface Logger {
  info(message: string, details?: Record<string, unknown>): void;
  success(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
  /** Raw multi-line output from a subprocess (log tails, `ps` tables). */
  block(title: string, text: string): void;
}

const LABELS: Record<LogLevel, string> = {
  info: "INFO",
  success: "SUCCESS",
  warn: "WARNING",
  error: "ERROR",
};

export type RunLoggerOptions = {
  /** Per-invocation log file. Omit to log to the terminal only. */
  filePath?: string;
  format?: OutputFormat;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
};

/**
 * Terminal + file logger for one CLI invocation.
 *
 * Warnings and errors go to stderr, everything else to stdout. Every line is
 * also appended, timestamped, to the log file.
 */
export class RunLogger implements Logger {
  private readonly filePath: string | undefined;
  private readonly format: OutputFormat;
  private readonly stdout: NodeJS.WritableStream;
  private readonly stderr: NodeJS.WritableStream;

  constructor(opts: RunLoggerOptions = {}) {
    this.filePath = opts.filePath;
    this.format = opts.format ?? "human";
    this.stdout = opts.stdout ?? process.stdout;
    this.stderr = opts.stderr ?? process.stderr;
    if (this.filePath) fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  info(message: string, details?: Record<string, unknown>): void {
    this.write("info", message, details);
  }

  success(message: string, details?: Record<string, unknown>): void {
    this.write("success", message, details);
  }

  warn(message: string, details?: Record<string, unknown>): void {
    this.write("warn", message, details);
  }

  error(message: string, details?: Record<string, unknown>): void {
    this.write("error", message, details);
  }

  block(title: string, text: string): void {
    const body = text.endsWith("\n") || text.length === 0 ? text : text + "\n";
    if (this.format === "jsonl") {
      this.stdout.write(JSON.stringify({ level: "info", message: title, output: text }) + "\n");
    } else {
      this.stdout.write(`${title}\n${body}`);
    }
    this.append(`[${new Date().toISOString()}] [OUTPUT] ${title}\n${body}`);
  }

  private write(level: LogLevel, message: string, details?: Record<string, unknown>): void {
    const stream = level === "warn" || level === "error" ? this.stderr : this.stdout;
    const ts = new Date().toISOString();

    if (this.format === "jsonl") {
      stream.write(JSON.stringify({ level, message, ...details, ts }) + "\n");
    } else {
      stream.write(`[${LABELS[level]}] ${message}\n`);
    }

    const suffix = details ? ` ${JSON.stringify(details)}` : "";
    this.append(`[${ts}] [${LABELS[level]}] ${message}${suffix}\n`);
  }

  private append(line: string): void {
    if (!this.filePath) return;
    fs.appendFileSync(this.filePath, line, "utf8");
  }
}

import { createWriteStream } from "fs";
import { format } from "util";

import chalk from "chalk";

import type { WriteStream } from "fs";

/**
 * Log levels from most to least verbose
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Logger configuration
 */
interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

interface FileSink {
  stream: WriteStream;
  now: () => Date;
}

/**
 * Simple logger with colored output and an optional log file.
 *
 * The file records info and above whatever the console level, and debug
 * lines too when the console level is debug.
 */
export class Logger {
  private ownLevel: LogLevel = "info";
  private prefix: string = "";
  private ownSink: FileSink | undefined;

  constructor(private readonly parent?: Logger) {}

  private get level(): LogLevel {
    return this.parent ? this.parent.level : this.ownLevel;
  }

  private get sink(): FileSink | undefined {
    return this.parent ? this.parent.sink : this.ownSink;
  }

  /**
   * Append every log line to a file. Children write through their root.
   */
  attachFile(filePath: string, now: () => Date = () => new Date()): void {
    if (this.parent) {
      this.parent.attachFile(filePath, now);
      return;
    }
    this.ownSink?.stream.end();
    const stream = createWriteStream(filePath, { flags: "a" });
    stream.on("error", (error) => {
      console.error(chalk.red(`Log file ${filePath} disabled: ${error.message}`));
      if (this.ownSink?.stream === stream) {
        this.ownSink = undefined;
      }
    });
    this.ownSink = { stream, now };
  }

  /**
   * Stop writing to the log file; resolves once it is closed
   */
  async detachFile(): Promise<void> {
    if (this.parent) {
      return this.parent.detachFile();
    }
    const sink = this.ownSink;
    if (!sink) return;
    this.ownSink = undefined;
    await new Promise<void>((resolve) => {
      sink.stream.once("close", () => resolve());
      sink.stream.end();
    });
  }

  private toFile(level: Exclude<LogLevel, "silent">, message: string, args: unknown[]): void {
    const sink = this.sink;
    if (!sink) return;
    if (level === "debug" && this.level !== "debug") return;
    const line = format(this.format(message), ...args);
    sink.stream.write(`${sink.now().toISOString()} - ${level.toUpperCase()} - ${line}\n`);
  }

  /**
   * Configure the logger
   */
  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) {
      this.ownLevel = config.level;
    }
    if (config.prefix !== undefined) {
      this.prefix = config.prefix;
    }
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Format a message with optional prefix
   */
  private format(message: string): string {
    return this.prefix ? `${this.prefix} ${message}` : message;
  }

  /**
   * Debug level logging (gray)
   */
  debug(message: string, ...args: unknown[]): void {
    this.toFile("debug", message, args);
    if (this.shouldLog("debug")) {
      console.debug(chalk.gray(this.format(message)), ...args);
    }
  }

  /**
   * Info level logging (default color)
   */
  info(message: string, ...args: unknown[]): void {
    this.toFile("info", message, args);
    if (this.shouldLog("info")) {
      console.info(this.format(message), ...args);
    }
  }

  /**
   * Warning level logging (yellow)
   */
  warn(message: string, ...args: unknown[]): void {
    this.toFile("warn", message, args);
    if (this.shouldLog("warn")) {
      console.warn(chalk.yellow(this.format(message)), ...args);
    }
  }

  /**
   * Error level logging (red)
   */
  error(message: string, ...args: unknown[]): void {
    this.toFile("error", message, args);
    if (this.shouldLog("error")) {
      console.error(chalk.red(this.format(message)), ...args);
    }
  }

  /**
   * Success message (green)
   */
  success(message: string, ...args: unknown[]): void {
    this.toFile("info", message, args);
    if (this.shouldLog("info")) {
      console.info(chalk.green(this.format(message)), ...args);
    }
  }

  /**
   * Whether debug output is enabled
   */
  isVerbose(): boolean {
    return this.shouldLog("debug");
  }

  /**
   * Create a child logger with a prefix. Children follow the parent's level.
   */
  child(prefix: string): Logger {
    const child = new Logger(this);
    child.prefix = this.prefix ? `${this.prefix} ${prefix}` : prefix;
    return child;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();

/**
 * Structured logging utility
 *
 * Every level writes to stderr: stdout carries the rendered type document.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

export class Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(config: LoggerConfig = { level: levelFromEnv() }) {
    this.level = config.level;
    this.prefix = config.prefix || "shapecast";
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.level);
  }

  private write(label: string, message: string, meta?: unknown): void {
    process.stderr.write(
      `[${this.prefix}] ${label}: ${message}${meta === undefined ? "" : ` ${JSON.stringify(meta)}`}\n`,
    );
  }

  error(message: string, meta?: unknown): void {
    if (this.shouldLog("error")) {
      this.write("ERROR", message, meta);
    }
  }

  warn(message: string, meta?: unknown): void {
    if (this.shouldLog("warn")) {
      this.write("WARN", message, meta);
    }
  }

  info(message: string, meta?: unknown): void {
    if (this.shouldLog("info")) {
      this.write("INFO", message, meta);
    }
  }

  debug(message: string, meta?: unknown): void {
    if (this.shouldLog("debug")) {
      this.write("DEBUG", message, meta);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

// Default logger instance
export const logger = new Logger();

// Factory function for custom loggers
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

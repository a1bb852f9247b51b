// src/core/logger.ts
// Leveled console logger shared by the pipeline and the CLI.

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

export type LogLevelName = "debug" | "info" | "warn" | "error" | "none";

const BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

export function isLogLevelName(s: string): s is LogLevelName {
  return Object.prototype.hasOwnProperty.call(BY_NAME, s);
}

export function parseLogLevel(name: LogLevelName): LogLevel {
  return BY_NAME[name];
}

/** Where formatted lines go. Defaults to the console. */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

const consoleSink: LogSink = {
  log: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export class Logger {
  constructor(
    private level: LogLevel = LogLevel.WARN,
    private readonly sink: LogSink = consoleSink,
    private readonly prefix = "lispen"
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string): void {
    if (this.level <= LogLevel.DEBUG) this.sink.log(`[${this.prefix}:DEBUG] ${message}`);
  }

  info(message: string): void {
    if (this.level <= LogLevel.INFO) this.sink.log(`[${this.prefix}:INFO] ${message}`);
  }

  warn(message: string): void {
    if (this.level <= LogLevel.WARN) this.sink.warn(`[${this.prefix}:WARN] ${message}`);
  }

  error(message: string): void {
    if (this.level <= LogLevel.ERROR) this.sink.error(`[${this.prefix}:ERROR] ${message}`);
  }
}

/** Process-wide logger; the CLI raises or lowers its level from config. */
export const logger = new Logger();

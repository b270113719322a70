// src/utils/logger.ts
// Level-filtered console logger with [Context] prefixes

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class Logger {
  constructor(private level: LogLevel = "info") {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private log(level: LogLevel, context: string, ...args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const prefix = `[${context}]`;

    switch (level) {
      case "debug":
        console.debug(prefix, ...args);
        break;
      case "info":
        console.info(prefix, ...args);
        break;
      case "warn":
        console.warn(prefix, ...args);
        break;
      case "error":
        console.error(prefix, ...args);
        break;
    }
  }

  debug(context: string, ...args: unknown[]): void {
    this.log("debug", context, ...args);
  }

  info(context: string, ...args: unknown[]): void {
    this.log("info", context, ...args);
  }

  warn(context: string, ...args: unknown[]): void {
    this.log("warn", context, ...args);
  }

  error(context: string, ...args: unknown[]): void {
    this.log("error", context, ...args);
  }
}

const envLevel = (process.env.LOG_LEVEL ?? "info").toLowerCase();

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "info");

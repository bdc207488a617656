export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(prefix: string = "", level: LogLevel = "info") {
    this.prefix = prefix;
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(this.level);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(`${this.prefix}${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Resolves the effective level: explicit argument, then TASKSYNC_LOG_LEVEL,
 * then "silent" under NODE_ENV=test, then "warn".
 */
export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }

  const fromEnv = process.env['TASKSYNC_LOG_LEVEL'];
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }

  return process.env['NODE_ENV'] === "test" ? "silent" : "warn";
}

const loggers = new Set<ConsoleLogger>();

export function createLogger(prefix: string = "", level?: LogLevel): Logger {
  const created = new ConsoleLogger(prefix, resolveLogLevel(level));
  loggers.add(created);
  return created;
}

/** Applies a level to every logger created so far (CLI --verbose / --quiet) */
export function setLogLevel(level: LogLevel): void {
  for (const existing of loggers) {
    existing.setLevel(level);
  }
}

export const logger = createLogger("[TaskSync] ");

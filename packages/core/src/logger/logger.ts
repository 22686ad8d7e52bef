export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/**
 * Where debug and info messages go. Programs that print their result on
 * stdout log everything to stderr.
 */
export type LogDestination = "stdout" | "stderr";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  setLevel(level: LogLevel): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;
  private destination: LogDestination;

  constructor(prefix: string = "", level: LogLevel = "info", destination: LogDestination = "stdout") {
    this.prefix = prefix;
    this.level = level;
    this.destination = destination;
  }

  private shouldLog(level: LogLevel): boolean {
    const currentLevelIndex = LOG_LEVELS.indexOf(this.level);
    const messageLevelIndex = LOG_LEVELS.indexOf(level);

    return currentLevelIndex <= messageLevelIndex && this.level !== "silent";
  }

  private write(message: string, args: unknown[]): void {
    if (this.destination === "stderr") {
      console.error(`${this.prefix}${message}`, ...args);
    } else {
      console.log(`${this.prefix}${message}`, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      this.write(message, args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      this.write(message, args);
    }
  }

  // warn and error stay on stderr so they never interleave with a listing on stdout
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

/**
 * Resolves the level from, in order: the explicit argument, LOG_LEVEL,
 * "silent" under NODE_ENV=test, and "info".
 */
export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }
  const fromEnv = process.env['LOG_LEVEL'];
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env['NODE_ENV'] === "test" ? "silent" : "info";
}

export function createLogger(
  prefix: string = "",
  level?: LogLevel,
  destination: LogDestination = "stdout"
): Logger {
  return new ConsoleLogger(prefix, resolveLogLevel(level), destination);
}

export const logger = createLogger("[newestfiles] ");

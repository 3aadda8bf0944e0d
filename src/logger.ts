export type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(levelOrder, value);
}

/**
 * Read the threshold from PAIR_LOG_LEVEL, falling back to DEFAULT_LOG_LEVEL
 */
export function resolveLogLevel(value: string | undefined = process.env.PAIR_LOG_LEVEL): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized !== undefined && isLogLevel(normalized) ? normalized : DEFAULT_LOG_LEVEL;
}

export class Logger {
  readonly context: string;
  readonly level: LogLevel;

  constructor(context: string = "Pair", level: LogLevel = resolveLogLevel()) {
    this.context = context;
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return levelOrder[level] >= levelOrder[this.level];
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.isEnabled(level)) return;

    const line = `${new Date().toISOString()} [${level.toUpperCase()}] [${this.context}] ${message}`;
    if (level === "error") {
      console.error(line, ...args);
    } else if (level === "warn") {
      console.warn(line, ...args);
    } else {
      console.log(line, ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.log("debug", message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log("info", message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log("warn", message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log("error", message, ...args);
  }

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, this.level);
  }
}

export const logger = new Logger("Pair");

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * JSON replacer for values JSON.stringify rejects or flattens (bigint, Error)
 */
function replaceUnserializable(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

class Logger {
  private readonly level: LogLevel;
  private readonly scope?: string;

  constructor(level: LogLevel = "info", scope?: string) {
    this.level = level;
    this.scope = scope;
  }

  /**
   * Create a logger that prefixes every line with a component name
   */
  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const scopeStr = this.scope ? ` [${this.scope}]` : "";
    const argsStr = args.length > 0 ? ` ${JSON.stringify(args, replaceUnserializable)}` : "";
    return `[${timestamp}] [${levelStr}]${scopeStr} ${message}${argsStr}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.debug(this.formatMessage("debug", message, ...args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(this.formatMessage("info", message, ...args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", message, ...args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("error", message, ...args));
    }
  }
}

// Level is fixed at startup; components take scoped children of this instance
const envLevel = process.env.LOG_LEVEL;
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "info");

export { Logger };

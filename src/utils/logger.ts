/**
 * IDO Venue Logger
 *
 * Structured logging with levels and component context.
 * Colored lines on a terminal, JSON lines everywhere else.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

interface LogEntry {
  level: LogLevel;
  timestamp: string;
  component: string;
  message: string;
  data?: LogData;
}

const LOG_COLORS = {
  debug: "\x1b[90m",  // Gray
  info: "\x1b[36m",   // Cyan
  warn: "\x1b[33m",   // Yellow
  error: "\x1b[31m",  // Red
  reset: "\x1b[0m",
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * JSON replacer for ledger values: bigints become decimal strings,
 * anything exposing toBase58 (public keys) becomes its base58 form.
 */
export function logReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (
    typeof value === "object" &&
    value !== null &&
    "toBase58" in value &&
    typeof value.toBase58 === "function"
  ) {
    return String(value.toBase58());
  }
  return value;
}

class Logger {
  private component: string;
  private minLevel: LogLevel;
  private useColors: boolean;

  constructor(component: string, options?: { minLevel?: LogLevel; useColors?: boolean }) {
    this.component = component;
    this.minLevel = options?.minLevel ?? "info";
    this.useColors = options?.useColors ?? process.stdout.isTTY ?? false;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[resolveLevel(this.minLevel)];
  }

  private formatTimestamp(): string {
    return new Date().toISOString().replace("T", " ").replace("Z", "");
  }

  private formatMessage(entry: LogEntry): string {
    const { level, timestamp, component, message, data } = entry;

    if (this.useColors) {
      const color = LOG_COLORS[level];
      const reset = LOG_COLORS.reset;
      const levelPad = level.toUpperCase().padEnd(5);
      let line = `${color}[${timestamp}] ${levelPad}${reset} [${component}] ${message}`;
      if (data && Object.keys(data).length > 0) {
        line += ` ${JSON.stringify(data, logReplacer)}`;
      }
      return line;
    }
    return JSON.stringify(entry, logReplacer);
  }

  private log(level: LogLevel, message: string, data?: LogData): void {
    if (!this.shouldLog(level)) return;

    const formatted = this.formatMessage({
      level,
      timestamp: this.formatTimestamp(),
      component: this.component,
      message,
      data,
    });

    if (level === "error") {
      console.error(formatted);
    } else if (level === "warn") {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  debug(message: string, data?: LogData): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: LogData): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: LogData): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: LogData): void {
    this.log("error", message, data);
  }

}

// Global logger factory
let globalMinLevel: LogLevel | null = null;

function resolveLevel(own: LogLevel): LogLevel {
  return globalMinLevel ?? own;
}

/**
 * Override the level of every logger, including ones created at import time
 */
export function setGlobalLogLevel(level: LogLevel): void {
  globalMinLevel = level;
}

export function createLogger(component: string): Logger {
  const envLevel = process.env.LOG_LEVEL ?? "";
  return new Logger(component, {
    minLevel: isLogLevel(envLevel) ? envLevel : "info",
    useColors: process.stdout.isTTY ?? false,
  });
}

export { Logger };

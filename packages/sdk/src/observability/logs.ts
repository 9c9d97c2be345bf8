/**
 * Structured logging for index build and cache operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class Logger {
  #enabled = true;
  #minLevel: LogLevel = "info";

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.LEXICON_DEBUG && this.#minLevel !== "debug") return;
    if (level !== "debug" && LEVEL_ORDER[level] < LEVEL_ORDER[this.#minLevel]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Format for console output
    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.path) {
      parts.push(entry.path);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    // stdout is reserved for command output, so every level goes to stderr
    // (console.debug and console.info would write to stdout)
    if (level === "warn") {
      console.warn(parts.join(" "));
    } else {
      console.error(parts.join(" "));
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  /**
   * Drop events below `level`. Debug events also pass when LEXICON_DEBUG is set.
   */
  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();

/**
 * Structured logging for workspace operations
 *
 * Everything goes to stderr: stdout belongs to the CLI's JSON output and to
 * the MCP protocol channel.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  dataset?: string;
  field?: string;
  message?: string;
  details?: Record<string, unknown>;
}

function levelFromEnv(): LogLevel {
  if (process.env.LEADLINK_DEBUG) return "debug";
  const configured = process.env.LEADLINK_LOG_LEVEL;
  return LEVELS.find((level) => level === configured) ?? "info";
}

class Logger {
  #minLevel: LogLevel = levelFromEnv();

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.#minLevel)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.dataset || entry.field) {
      parts.push(`${entry.dataset ?? ""}/${entry.field ?? ""}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    console.error(parts.join(" "));
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
   * Drop entries below the given level
   */
  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();

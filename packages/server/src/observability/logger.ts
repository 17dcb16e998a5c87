/**
 * Structured logging to stderr for MCP server observability
 * All logs go to stderr since stdout is reserved for MCP protocol
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  tool?: string;
  duration_ms?: number;
  err_code?: string;
  err_message?: string;
  [key: string]: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = "info") {
    this.#minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Always use stderr to avoid polluting stdout (MCP protocol channel)
    console.error(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  // Helper for tool execution logging
  toolCall(tool: string, duration_ms: number, success: boolean, errCode?: string, errMessage?: string): void {
    if (success) {
      this.info("tool.success", { tool, duration_ms });
    } else {
      this.error("tool.error", {
        tool,
        duration_ms,
        err_code: errCode ?? "UNKNOWN",
        err_message: errMessage,
      });
    }
  }
}

/**
 * Level from LEADLINK_LOG_LEVEL, forced to debug by LEADLINK_DEBUG
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.LEADLINK_DEBUG) return "debug";
  const configured = env.LEADLINK_LOG_LEVEL;
  return isLogLevel(configured) ? configured : "info";
}

// Singleton logger instance
export const logger = new Logger(levelFromEnv());

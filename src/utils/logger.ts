import { toAppError } from "../domain/errors.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  minimumLevel = level;
}

export interface Logger {
  debug(message: string, detail?: Record<string, unknown>): void;
  info(message: string, detail?: Record<string, unknown>): void;
  warn(message: string, detail?: Record<string, unknown>): void;
  error(message: string, error?: unknown, detail?: Record<string, unknown>): void;
}

// Everything goes to stderr: stdout belongs to the MCP stdio transport and CLI output.
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, detail?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
      return;
    }
    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}`;
    if (detail && Object.keys(detail).length > 0) {
      console.error(line, sanitizeForLog(detail));
    } else {
      console.error(line);
    }
  };

  return {
    debug: (message, detail) => write("debug", message, detail),
    info: (message, detail) => write("info", message, detail),
    warn: (message, detail) => write("warn", message, detail),
    error: (message, error, detail) => {
      if (error === undefined) {
        write("error", message, detail);
        return;
      }
      const appError = toAppError(error);
      write("error", message, {
        ...detail,
        code: appError.code,
        reason: appError.message,
        retryable: appError.retryable,
      });
    },
  };
}

function sanitizeForLog(value: unknown, depth = 3): unknown {
  if (depth <= 0) {
    return "[Truncated]";
  }
  if (value == null || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    return value.length <= 300 ? value : `${value.slice(0, 300)}…`;
  }
  if (Array.isArray(value)) {
    return value.slice(0, 20).map((item) => sanitizeForLog(item, depth - 1));
  }
  if (typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value).slice(0, 30)) {
      out[key] = /key|token|secret|password/i.test(key) ? "[redacted]" : sanitizeForLog(item, depth - 1);
    }
    return out;
  }
  return String(value);
}

import type { JsonObject } from "./json.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface LogEntry {
  ts: string;
  level: LogLevel;
  kind: string;
  message: string;
  data: JsonObject | null;
}

export interface Logger {
  debug(kind: string, message: string, data?: JsonObject | null): void;
  info(kind: string, message: string, data?: JsonObject | null): void;
  warn(kind: string, message: string, data?: JsonObject | null): void;
  error(kind: string, message: string, data?: JsonObject | null): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

// stdout carries the MCP stream, so the default sink is stderr.
function stderrSink(entry: LogEntry): void {
  console.error(JSON.stringify(entry));
}

export function createLogger(opts: { level?: LogLevel; sink?: (entry: LogEntry) => void } = {}): Logger {
  const min = LEVEL_ORDER[opts.level ?? "info"];
  const sink = opts.sink ?? stderrSink;

  const write = (level: LogLevel, kind: string, message: string, data: JsonObject | null | undefined): void => {
    if (LEVEL_ORDER[level] < min) return;
    sink({ ts: new Date().toISOString(), level, kind, message, data: data ?? null });
  };

  return {
    debug: (kind, message, data) => write("debug", kind, message, data),
    info: (kind, message, data) => write("info", kind, message, data),
    warn: (kind, message, data) => write("warn", kind, message, data),
    error: (kind, message, data) => write("error", kind, message, data)
  };
}

export const silentLogger: Logger = createLogger({ sink: () => undefined });

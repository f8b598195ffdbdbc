import type { LogLevel, LogMeta, Logger } from "../../core/ports/logger.js";
import { formatLogEntry } from "../../shared/log-format.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export type LogFormat = "pretty" | "json";

/** Errors don't survive JSON.stringify, so flatten them to message + stack */
const serializeMeta = (meta: LogMeta): LogMeta => {
  const out: LogMeta = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value === undefined) continue;
    out[key] =
      value instanceof Error ? { name: value.name, message: value.message, stack: value.stack } : value;
  }
  return out;
};

/**
 * Format a log entry as structured JSON (for Log Analytics, ELK, CloudWatch, etc.).
 */
const formatJsonEntry = (level: LogLevel, msg: string, meta: LogMeta): string => {
  const entry: LogMeta = {
    level,
    msg,
    time: new Date().toISOString(),
    ...meta,
  };
  return `${JSON.stringify(entry)}\n`;
};

/**
 * Logger: zero dependencies.
 * Supports two modes:
 * - "pretty": ANSI-colored human-readable output (default, for development)
 * - "json": structured JSON lines (for production log aggregators)
 */
export const createLogger = (
  minLevel: LogLevel = "info",
  bindings: LogMeta = {},
  format: LogFormat = "pretty",
): Logger => {
  const minPriority = LEVEL_PRIORITY[minLevel];

  const formatter = format === "json" ? formatJsonEntry : formatLogEntry;

  const write = (level: LogLevel, msg: string, meta?: LogMeta): void => {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const allMeta = serializeMeta({ ...bindings, ...meta });
    const line = formatter(level, msg, allMeta);

    if (LEVEL_PRIORITY[level] >= LEVEL_PRIORITY.warn) {
      process.stderr.write(line);
    } else {
      process.stdout.write(line);
    }
  };

  return {
    debug: (msg, meta) => write("debug", msg, meta),
    info: (msg, meta) => write("info", msg, meta),
    warn: (msg, meta) => write("warn", msg, meta),
    error: (msg, meta) => write("error", msg, meta),
    fatal: (msg, meta) => write("fatal", msg, meta),
    child: (extra) => createLogger(minLevel, { ...bindings, ...extra }, format),
  };
};

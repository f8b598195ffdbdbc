import type { LogLevel, LogMeta } from "../core/ports/logger.js";
import { bgCyan, bgGreen, bgRed, bold, cyan, dim, gray, green, red, white, yellow } from "./ansi.js";

const LEVEL_BADGES: Record<LogLevel, string> = {
  debug: gray("DBG"),
  info: green("INF"),
  warn: yellow("WRN"),
  error: red("ERR"),
  fatal: bgRed("FTL"),
};

/** The API only serves GET and POST; anything else is shown plain */
const METHOD_BADGES: ReadonlyMap<string, string> = new Map([
  ["GET", bgGreen("GET")],
  ["POST", bgCyan("POST")],
]);

/** Local wall-clock time, HH:MM:SS.mmm */
const clock = (): string => {
  const d = new Date();
  return `${d.toTimeString().slice(0, 8)}.${String(d.getMilliseconds()).padStart(3, "0")}`;
};

const statusText = (status: number): string => {
  const paint = status >= 500 ? red : status >= 400 ? yellow : status >= 300 ? cyan : green;
  return bold(paint(String(status)));
};

/** An insert is one round trip to SQL Server; past 100 ms something is slow */
const durationText = (ms: number): string => (ms < 100 ? green : ms < 500 ? yellow : red)(`${ms}ms`);

const metaText = (meta: LogMeta): string =>
  Object.entries(meta)
    .map(([key, value]) => {
      const shown = typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
      return ` ${dim(`${key}=`)}${white(shown)}`;
    })
    .join("");

/**
 * Pretty log line for the Logger port.
 *
 *   INF 12:34:56.789 Reading recorded service=ingest id=42 fridgeNo=2
 */
export const formatLogEntry = (level: LogLevel, msg: string, meta: LogMeta): string =>
  `  ${LEVEL_BADGES[level]} ${dim(gray(clock()))} ${white(msg)}${metaText(meta)}\n`;

/**
 * Access log line written by the server.
 *
 *   ← 12:34:56.789 POST 201 /api/fridge-reading 1.84ms  ip=127.0.0.1 rid=abc123
 */
export const formatAccessLog = (
  method: string,
  path: string,
  status: number,
  durationMs: number,
  ip: string,
  requestId: string,
): string => {
  const badge = METHOD_BADGES.get(method) ?? white(method);
  const tail = dim(gray(`ip=${ip} rid=${requestId.slice(0, 8)}`));
  return `  ${dim("←")} ${dim(gray(clock()))} ${badge} ${statusText(status)} ${white(path)} ${durationText(durationMs)}  ${tail}\n`;
};

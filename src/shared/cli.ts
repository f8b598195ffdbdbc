import { networkInterfaces } from "node:os";
import type { AppConfig } from "../infrastructure/config/config.js";
import {
  bgCyan,
  bgGreen,
  bgMagenta,
  bgYellow,
  bold,
  box,
  cyan,
  dim,
  gray,
  green,
  magenta,
  red,
  white,
  yellow,
} from "./ansi.js";

// ── Helpers ─────────────────────────────────────────────────────────────

const pad = (s: string, len: number): string => s.padEnd(len);

const formatUptime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
};

const envBadge = (env: string): string => {
  switch (env) {
    case "production":
      return bgGreen("PRODUCTION");
    case "development":
      return bgCyan("DEVELOPMENT");
    case "test":
      return bgYellow("TEST");
    default:
      return bgMagenta(env.toUpperCase());
  }
};

const methodColor = (method: string): string =>
  method === "GET" ? green(bold(pad(method, 7))) : cyan(bold(pad(method, 7)));

// ── Route table ─────────────────────────────────────────────────────────

interface RouteInfo {
  readonly method: string;
  readonly path: string;
  readonly description: string;
}

const routes: readonly RouteInfo[] = [
  { method: "GET", path: "/health", description: "Shallow health check" },
  { method: "GET", path: "/readiness", description: "Deep readiness check (database)" },
  { method: "POST", path: "/api/fridge-reading", description: "Record a reading" },
  { method: "GET", path: "/api/fridge-reading/recent", description: "Readings in the window" },
  { method: "GET", path: "/api/fridge-reading/:id", description: "Fetch one reading" },
];

const logo = (): string =>
  box([bold(white("❄ fridge-telemetry")), dim(gray("Sensor ingestion + threshold alerts"))]);

// ── Public API ──────────────────────────────────────────────────────────

interface StartupInfo {
  readonly config: AppConfig;
  readonly bootTimeMs: number;
  /** Port actually bound (differs from config when config.port is 0) */
  readonly port: number;
  readonly storage: "mssql" | "memory";
}

/**
 * Prints the startup banner to stdout.
 * Called once after the server is fully initialized.
 */
export const printStartupBanner = (info: StartupInfo): void => {
  const { config, bootTimeMs, port } = info;

  const localUrl = `http://localhost:${port}`;
  const networkUrl = `http://${config.host === "0.0.0.0" ? getLocalIp() : config.host}:${port}`;
  const { thresholds, monitor } = config;

  const lines: string[] = [];

  lines.push("");
  lines.push(logo());
  lines.push("");
  lines.push(`  ${envBadge(config.env)}  ${dim("booted in")} ${bold(green(formatUptime(bootTimeMs)))}`);
  lines.push("");

  lines.push(`  ${bold(white("→"))} ${dim("Local:")}    ${bold(cyan(localUrl))}`);
  if (config.host === "0.0.0.0") {
    lines.push(`  ${bold(white("→"))} ${dim("Network:")}  ${bold(cyan(networkUrl))}`);
  }
  lines.push("");

  lines.push(`  ${gray("├─")} ${dim("PID")}           ${white(String(process.pid))}`);
  lines.push(`  ${gray("├─")} ${dim("Runtime")}       ${magenta(`Node.js ${process.versions.node}`)}`);
  lines.push(
    `  ${gray("├─")} ${dim("Storage")}       ${info.storage === "mssql" ? green("SQL Server") : yellow("in-memory")}`,
  );
  lines.push(
    `  ${gray("├─")} ${dim("Slack")}         ${config.slack.webhookUrl ? green("webhook configured") : yellow("log only")}`,
  );
  lines.push(
    `  ${gray("├─")} ${dim("Monitor")}       ${
      monitor.enabled
        ? white(`every ${monitor.intervalMs / 1000}s, window ${monitor.windowMs / 1000}s`)
        : yellow("disabled")
    }`,
  );
  lines.push(
    `  ${gray("├─")} ${dim("Thresholds")}    ${white(
      `temp ≤ ${thresholds.maxTemperature}, humidity ≤ ${thresholds.maxHumidity}`,
    )}`,
  );
  lines.push(`  ${gray("└─")} ${dim("Log level")}     ${white(config.log.level)}`);
  lines.push("");

  lines.push(`  ${bold(white("Routes"))} ${dim(`(${routes.length})`)}`);
  lines.push(`  ${gray("─".repeat(60))}`);
  for (const route of routes) {
    lines.push(`  ${methodColor(route.method)} ${pad(route.path, 30)} ${dim(gray(route.description))}`);
  }
  lines.push(`  ${gray("─".repeat(60))}`);
  lines.push("");

  lines.push(`  ${dim("press")} ${bold(white("Ctrl+C"))} ${dim("to stop")}`);
  lines.push("");

  process.stdout.write(`${lines.join("\n")}\n`);
};

/**
 * Prints a clean shutdown message.
 */
export const printShutdown = (signal: string): void => {
  process.stdout.write(
    `\n  ${yellow("⏻")} ${dim("Received")} ${bold(white(signal))}${dim(", shutting down gracefully…")}\n\n`,
  );
};

/**
 * Prints a config validation error with hints.
 */
export const printConfigError = (errors: Record<string, string[]>): void => {
  const lines: string[] = [];

  lines.push("");
  lines.push(`  ${bgMagenta("CONFIG ERROR")}  ${dim("Invalid configuration detected")}`);
  lines.push("");

  for (const [field, messages] of Object.entries(errors)) {
    for (const msg of messages) {
      lines.push(`  ${red("✗")} ${bold(white(field))} ${dim("→")} ${red(msg)}`);
    }
  }

  lines.push("");
  lines.push(`  ${dim("Hint: Copy .env.example to .env and set the required values:")}`);
  lines.push(`  ${cyan("$ cp .env.example .env")}`);
  lines.push("");

  process.stderr.write(`${lines.join("\n")}\n`);
};

// ── Utilities ───────────────────────────────────────────────────────────

const getLocalIp = (): string => {
  const nets = networkInterfaces();
  for (const entries of Object.values(nets)) {
    for (const net of entries ?? []) {
      if (net.family === "IPv4" && !net.internal) {
        return net.address;
      }
    }
  }
  return "0.0.0.0";
};

/**
 * CLI output helpers, styled like the server startup banner.
 */

import { bold, box, cyan, dim, gray, green, red, white, yellow } from "../shared/ansi.js";

export { bold, cyan, dim, gray, green, white, yellow };

// ── Icons ───────────────────────────────────────────────────────────────

const icons = {
  success: green("✔"),
  error: red("✗"),
  warning: yellow("⚠"),
  info: cyan("ℹ"),
} as const;

// ── Logo ────────────────────────────────────────────────────────────────

export const logo = (version: string): string =>
  box([`${bold(white("❄ fridge CLI"))}  ${dim(gray(`v${version}`))}`, dim(gray("Simulator and database tooling"))]);

// ── Output helpers ──────────────────────────────────────────────────────

export const log = (msg: string) => process.stdout.write(`${msg}\n`);
export const blank = () => process.stdout.write("\n");
export const error = (msg: string) => process.stderr.write(`  ${icons.error} ${red(msg)}\n`);
export const warn = (msg: string) => process.stdout.write(`  ${icons.warning} ${yellow(msg)}\n`);
export const info = (msg: string) => process.stdout.write(`  ${icons.info} ${msg}\n`);
export const success = (msg: string) => process.stdout.write(`  ${icons.success} ${green(msg)}\n`);

// ── Table helper ────────────────────────────────────────────────────────

export const printKeyValue = (pairs: readonly [string, string][]): void => {
  const maxKey = Math.max(...pairs.map(([k]) => k.length));
  for (const [key, value] of pairs) {
    log(`  ${gray("│")} ${dim(key.padEnd(maxKey))}  ${white(value)}`);
  }
};

// ── Section header ──────────────────────────────────────────────────────

export const section = (title: string): void => {
  blank();
  log(`  ${bold(white(title))}`);
  log(`  ${gray("─".repeat(50))}`);
};

// ── Duration formatter ─────────────────────────────────────────────────

export const formatDuration = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60_000)}m ${Math.round((ms % 60_000) / 1000)}s`;
};

#!/usr/bin/env node

/**
 * fridge CLI: sensor simulator and database tooling.
 *
 * Usage:
 *   fridge simulate [options]   Send synthetic readings
 *   fridge migrate [up|down]    Apply or roll back the schema
 *   fridge version              Show version
 *   fridge help                 Show help
 */

import { helpCommand } from "./commands/help.js";
import { migrateCommand } from "./commands/migrate.js";
import { simulateCommand } from "./commands/simulate.js";
import { blank, bold, cyan, dim, error, log, white } from "./ui.js";

const VERSION = "1.0.0";

// ── Arg parsing ─────────────────────────────────────────────────────────

const args = process.argv.slice(2);
const command = args[0]?.toLowerCase() ?? "";
const commandArgs = args.slice(1);

// ── Route command ───────────────────────────────────────────────────────

const run = async (): Promise<void> => {
  try {
    switch (command) {
      case "simulate":
      case "sim":
        await simulateCommand(commandArgs);
        break;

      case "migrate":
        await migrateCommand(commandArgs);
        break;

      case "version":
      case "-v":
      case "--version":
        log(`fridge v${VERSION}`);
        break;

      case "help":
      case "-h":
      case "--help":
      case "":
        helpCommand(VERSION);
        break;

      default:
        blank();
        error(`Unknown command: ${bold(white(command))}`);
        blank();
        log(`  ${dim("Run")} ${cyan("fridge help")} ${dim("to see available commands.")}`);
        blank();
        process.exit(1);
    }
  } catch (e) {
    blank();
    error(e instanceof Error ? e.message : String(e));
    blank();
    process.exit(1);
  }
};

void run();

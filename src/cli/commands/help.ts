/**
 * `fridge help`: display help information.
 */

import { blank, bold, cyan, dim, gray, green, log, logo, white, yellow } from "../ui.js";

const printTable = (title: string, rows: ReadonlyArray<readonly [string, string]>, color: (s: string) => string): void => {
  log(`  ${bold(white(title))}`);
  log(`  ${gray("─".repeat(50))}`);
  const width = Math.max(...rows.map(([c]) => c.length));
  for (const [cmd, desc] of rows) {
    log(`  ${color(cmd.padEnd(width + 2))} ${dim(desc)}`);
  }
  blank();
};

export const helpCommand = (version: string): void => {
  blank();
  log(logo(version));
  blank();

  log(`  ${bold(white("USAGE"))}`);
  log(`  ${gray("─".repeat(50))}`);
  log(`  ${dim("$")} ${cyan("fridge")} ${green("<command>")} ${dim("[options]")}`);
  blank();

  printTable(
    "COMMANDS",
    [
      ["simulate", "Send synthetic sensor readings to the endpoint"],
      ["migrate [up|down]", "Apply or roll back the SQL Server schema"],
      ["version", "Show CLI version"],
      ["help", "Show this help message"],
    ],
    green,
  );

  printTable(
    "SIMULATE OPTIONS",
    [
      ["--url URL", "Ingestion endpoint (default: $AZURE_FUNCTION_URL)"],
      ["--fridges N", "Number of healthy fridges, numbered from 0 (default: 1)"],
      ["--interval S", "Seconds between readings per fridge (default: 10)"],
      ["--runtime S", "Total run time in seconds (default: 60)"],
      ["--faulty-fridge N", "Fridge number that runs warm (default: 4)"],
      ["--no-faulty", "Only send in-range readings"],
    ],
    yellow,
  );

  log(`  ${bold(white("EXAMPLES"))}`);
  log(`  ${gray("─".repeat(50))}`);
  const examples = [
    ["fridge simulate --fridges 3 --runtime 120", "Three fridges for two minutes"],
    ["fridge simulate --url http://localhost:7071/api/fridge-reading", "Target a local server"],
    ["fridge migrate", "Create dbo.FridgeReadings"],
  ] as const;
  for (const [cmd, desc] of examples) {
    log(`  ${dim("$")} ${cyan(cmd)}`);
    log(`    ${dim(desc)}`);
  }
  blank();
};

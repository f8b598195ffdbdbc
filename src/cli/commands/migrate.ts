/**
 * `fridge migrate [up|down]`: apply or roll back the SQL Server schema.
 */

import { mssqlMigrateDown, mssqlMigrateUp, openMssqlPool } from "../../infrastructure/database/mssql/index.js";
import { createLogger } from "../../infrastructure/logging/logger.js";
import { blank, bold, info, success, white } from "../ui.js";

export const migrateCommand = async (args: readonly string[]): Promise<void> => {
  const direction = args[0]?.toLowerCase() ?? "up";
  if (direction !== "up" && direction !== "down") {
    throw new Error(`Unknown migrate direction: ${direction} (expected "up" or "down")`);
  }

  const connectionString = process.env["SQL_CONNECTION_STRING"];
  if (!connectionString) {
    throw new Error("SQL_CONNECTION_STRING is not set");
  }

  const logger = createLogger("info", { service: "migrate" });
  const pool = await openMssqlPool(connectionString, logger);

  try {
    blank();
    if (direction === "up") {
      const applied = await mssqlMigrateUp(pool, logger);
      if (applied > 0) success(`Applied ${bold(white(String(applied)))} migration(s)`);
      else info("Schema already up to date");
    } else {
      const version = await mssqlMigrateDown(pool, logger);
      if (version !== null) success(`Rolled back migration ${bold(white(version))}`);
      else info("Nothing to roll back");
    }
    blank();
  } finally {
    await pool.close();
  }
};

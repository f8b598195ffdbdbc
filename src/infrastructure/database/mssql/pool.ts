import sql from "mssql";
import type { Logger } from "../../../core/ports/logger.js";

/**
 * Open a connection pool from a SQL Server connection string
 * (`Server=…;Database=…;User Id=…;Password=…;Encrypt=true`).
 * Rejects when the first connection cannot be established.
 */
export const openMssqlPool = async (
  connectionString: string,
  logger: Logger,
): Promise<sql.ConnectionPool> => {
  const pool = new sql.ConnectionPool(connectionString);
  pool.on("error", (e: unknown) => {
    logger.error("SQL Server pool error", { error: e instanceof Error ? e.message : String(e) });
  });
  await pool.connect();
  logger.info("SQL Server pool connected");
  return pool;
};

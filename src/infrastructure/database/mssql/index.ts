/**
 * SQL Server (mssql) adapters: barrel export.
 */

export { createMssqlReadingRepository } from "./mssql-reading.repository.js";
export { mssqlMigrateUp, mssqlMigrateDown } from "./migrations.js";
export { openMssqlPool } from "./pool.js";

/**
 * SQL Server migration runner: uses the `mssql` npm package.
 *
 * Each migration is guarded DDL, so re-running one is harmless. Applied
 * versions are tracked in `_migrations`.
 */

import sql from "mssql";
import type { Logger } from "../../../core/ports/logger.js";

export interface MssqlMigration {
  readonly version: string;
  readonly name: string;
  /** T-SQL statements separated by `;` */
  readonly up: string;
  readonly down: string;
}

export const migrations: readonly MssqlMigration[] = [
  {
    version: "001",
    name: "create_fridge_readings",
    up: `
      IF OBJECT_ID('dbo.FridgeReadings', 'U') IS NULL
      CREATE TABLE dbo.FridgeReadings (
          Id INT PRIMARY KEY NOT NULL,
          Temperature FLOAT NOT NULL,
          Humidity FLOAT NOT NULL,
          Timestamp DATETIME DEFAULT CURRENT_TIMESTAMP,
          FridgeNo INT NOT NULL
      );

      IF NOT EXISTS (SELECT * FROM sys.indexes WHERE name = 'idx_fridge_readings_timestamp')
      CREATE INDEX idx_fridge_readings_timestamp ON dbo.FridgeReadings(Timestamp);
    `,
    down: `
      DROP INDEX IF EXISTS idx_fridge_readings_timestamp ON dbo.FridgeReadings;
      IF OBJECT_ID('dbo.FridgeReadings', 'U') IS NOT NULL
      DROP TABLE dbo.FridgeReadings;
    `,
  },
];

/** Split a migration body into individual statements, dropping blanks */
export const splitStatements = (body: string): string[] =>
  body
    .split(";")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

const ensureMigrationsTable = async (pool: sql.ConnectionPool): Promise<void> => {
  await pool.request().query(`
    IF NOT EXISTS (SELECT * FROM sys.tables WHERE name = '_migrations')
    CREATE TABLE _migrations (
      version     NVARCHAR(10) NOT NULL PRIMARY KEY,
      name        NVARCHAR(100) NOT NULL,
      applied_at  BIGINT NOT NULL
    )
  `);
};

const getAppliedVersions = async (pool: sql.ConnectionPool): Promise<Set<string>> => {
  const result = await pool
    .request()
    .query<{ version: string }>("SELECT version FROM _migrations ORDER BY version");
  return new Set(result.recordset.map((r) => r.version));
};

type Direction = "up" | "down";

/** Run one migration's statements and its bookkeeping row in a single transaction */
const apply = async (pool: sql.ConnectionPool, migration: MssqlMigration, direction: Direction): Promise<void> => {
  const tx = pool.transaction();
  await tx.begin();
  try {
    for (const stmt of splitStatements(migration[direction])) {
      await tx.request().query(stmt);
    }
    const record = tx.request().input("version", migration.version);
    if (direction === "up") {
      await record
        .input("name", migration.name)
        .input("appliedAt", sql.BigInt, Date.now())
        .query("INSERT INTO _migrations (version, name, applied_at) VALUES (@version, @name, @appliedAt)");
    } else {
      await record.query("DELETE FROM _migrations WHERE version = @version");
    }
    await tx.commit();
  } catch (e: unknown) {
    await tx.rollback();
    throw e;
  }
};

/** Apply every pending migration in version order; returns how many ran */
export const mssqlMigrateUp = async (pool: sql.ConnectionPool, logger: Logger): Promise<number> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);
  const pending = migrations.filter((m) => !applied.has(m.version));

  for (const migration of pending) {
    await apply(pool, migration, "up");
    logger.info("Migration applied", { version: migration.version, name: migration.name });
  }

  if (pending.length > 0) {
    logger.info("SQL Server migrations complete", { applied: pending.length });
  } else {
    logger.debug("SQL Server schema up to date");
  }
  return pending.length;
};

/** Roll back the newest applied migration; null when none is applied */
export const mssqlMigrateDown = async (
  pool: sql.ConnectionPool,
  logger: Logger,
): Promise<string | null> => {
  await ensureMigrationsTable(pool);
  const applied = await getAppliedVersions(pool);
  const latest = [...migrations].reverse().find((m) => applied.has(m.version));
  if (latest === undefined) return null;

  await apply(pool, latest, "down");
  logger.info("Migration rolled back", { version: latest.version, name: latest.name });
  return latest.version;
};

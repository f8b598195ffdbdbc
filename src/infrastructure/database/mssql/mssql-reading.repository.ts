/**
 * SQL Server reading repository: uses the `mssql` npm package.
 *
 * Implements the ReadingRepository port against dbo.FridgeReadings.
 * All values travel as typed parameters; rows coming back are checked
 * with zod before they become readings.
 */

import sql from "mssql";
import { z } from "zod";
import type { FridgeReading } from "../../../core/entities/reading.entity.js";
import { type AppError, conflict, internal, notFound } from "../../../core/errors/app-error.js";
import type { NewReadingData, ReadingRepository } from "../../../core/ports/reading.repository.js";
import { type ReadingId, brand } from "../../../core/types/brand.js";
import { type Result, err, map, ok, tryCatchAsync } from "../../../core/types/result.js";

/** The slice of `sql.Request` the repository uses */
export interface SqlRequest {
  input(name: string, type: sql.ISqlType | (() => sql.ISqlType), value: unknown): SqlRequest;
  query(command: string): Promise<{ readonly recordset: readonly unknown[] }>;
}

/** The slice of `sql.ConnectionPool` the repository uses */
export interface SqlPool {
  request(): SqlRequest;
}

const readingRow = z.object({
  Id: z.number().int(),
  Temperature: z.number(),
  Humidity: z.number(),
  Timestamp: z.date(),
  FridgeNo: z.number().int(),
});

const readingRows = z.array(readingRow);
const countRow = z.object({ total: z.number().int() });

type ReadingRow = z.output<typeof readingRow>;

const COLUMNS = "Id, Temperature, Humidity, Timestamp, FridgeNo";

const rowToReading = (row: ReadingRow): FridgeReading => ({
  id: brand<number, "ReadingId">(row.Id),
  temperature: row.Temperature,
  humidity: row.Humidity,
  timestamp: row.Timestamp,
  fridgeNo: brand<number, "FridgeNo">(row.FridgeNo),
});

/** SQL Server error 2627 / 2601: primary key or unique index violation */
const isUniqueViolation = (e: unknown): boolean =>
  (e instanceof sql.RequestError && (e.number === 2627 || e.number === 2601)) ||
  (e instanceof Error &&
    (e.message.includes("Violation of PRIMARY KEY") ||
      e.message.includes("duplicate key") ||
      e.message.includes("Violation of UNIQUE KEY")));

/*
 * A missing id is allocated inside the same statement; UPDLOCK + HOLDLOCK
 * keeps two concurrent inserts from reading the same MAX(Id). The driver
 * writes and reads DATETIME values as UTC, so a missing timestamp falls
 * back to GETUTCDATE() rather than the server-local column default.
 */
const INSERT_SQL = `
  INSERT INTO dbo.FridgeReadings (${COLUMNS})
  OUTPUT INSERTED.Id, INSERTED.Temperature, INSERTED.Humidity, INSERTED.Timestamp, INSERTED.FridgeNo
  SELECT
    COALESCE(@id, (SELECT COALESCE(MAX(Id), 0) + 1 FROM dbo.FridgeReadings WITH (UPDLOCK, HOLDLOCK))),
    @temperature,
    @humidity,
    COALESCE(@timestamp, GETUTCDATE()),
    @fridgeNo
`;

/** Window bounds come from the database's UTC clock and end at "now" */
const RECENT_SQL = `
  SELECT ${COLUMNS} FROM dbo.FridgeReadings
  WHERE Timestamp BETWEEN DATEADD(millisecond, -@windowMs, GETUTCDATE()) AND GETUTCDATE()
  ORDER BY Timestamp, Id
`;

/** Run a query, reporting any driver failure as an internal error */
const attempt = async <T>(fn: () => Promise<T>, message = "Database error"): Promise<Result<T, AppError>> => {
  const result = await tryCatchAsync(fn);
  return result.ok ? result : err(internal(message, result.error));
};

export const createMssqlReadingRepository = (pool: SqlPool): ReadingRepository => {
  return {
    async insert(data: NewReadingData): Promise<Result<FridgeReading, AppError>> {
      const result = await tryCatchAsync(async () => {
        const { recordset } = await pool
          .request()
          .input("id", sql.Int, data.id ?? null)
          .input("temperature", sql.Float, data.temperature)
          .input("humidity", sql.Float, data.humidity)
          .input("timestamp", sql.DateTime, data.timestamp ?? null)
          .input("fridgeNo", sql.Int, data.fridgeNo)
          .query(INSERT_SQL);
        return readingRows.parse(recordset);
      });

      if (!result.ok) {
        if (isUniqueViolation(result.error)) {
          return err(conflict(`Reading with id ${data.id ?? "(allocated)"} already exists`));
        }
        return err(internal("Database error", result.error));
      }

      const row = result.value[0];
      if (row === undefined) return err(internal("Database error"));
      return ok(rowToReading(row));
    },

    async findById(id: ReadingId): Promise<Result<FridgeReading, AppError>> {
      const result = await attempt(async () => {
        const { recordset } = await pool
          .request()
          .input("id", sql.Int, id)
          .query(`SELECT ${COLUMNS} FROM dbo.FridgeReadings WHERE Id = @id`);
        return readingRows.parse(recordset);
      });
      if (!result.ok) return result;
      const row = result.value[0];
      return row ? ok(rowToReading(row)) : err(notFound("Reading"));
    },

    async findRecent(windowMs: number): Promise<Result<FridgeReading[], AppError>> {
      const result = await attempt(async () => {
        const { recordset } = await pool.request().input("windowMs", sql.Int, windowMs).query(RECENT_SQL);
        return readingRows.parse(recordset);
      });
      return map(result, (rows) => rows.map(rowToReading));
    },

    async count(): Promise<Result<number, AppError>> {
      return attempt(async () => {
        const { recordset } = await pool.request().query("SELECT COUNT(*) AS total FROM dbo.FridgeReadings");
        return countRow.parse(recordset[0]).total;
      });
    },

    async ping(): Promise<Result<void, AppError>> {
      const result = await attempt(() => pool.request().query("SELECT 1 AS ok"), "Database unreachable");
      return map(result, () => undefined);
    },
  };
};

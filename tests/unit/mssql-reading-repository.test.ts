import sql from "mssql";
import { describe, expect, it } from "vitest";
import { ErrorCode } from "../../src/core/errors/app-error.js";
import { brand } from "../../src/core/types/brand.js";
import {
  type SqlPool,
  type SqlRequest,
  createMssqlReadingRepository,
} from "../../src/infrastructure/database/mssql/mssql-reading.repository.js";

interface QueryCall {
  command: string;
  inputs: Record<string, unknown>;
}

type Respond = (command: string) => Promise<{ readonly recordset: readonly unknown[] }>;

/** Connection pool double: records each statement and its parameters */
const stubPool = (respond: Respond): { pool: SqlPool; calls: QueryCall[] } => {
  const calls: QueryCall[] = [];
  const pool: SqlPool = {
    request() {
      const call: QueryCall = { command: "", inputs: {} };
      const request: SqlRequest = {
        input(name, _type, value) {
          call.inputs[name] = value;
          return request;
        },
        async query(command) {
          call.command = command;
          calls.push(call);
          return respond(command);
        },
      };
      return request;
    },
  };
  return { pool, calls };
};

const rows = (...recordset: unknown[]): Respond => async () => ({ recordset });
const failing = (error: Error): Respond => () => Promise.reject(error);

const duplicateKey = (): sql.RequestError => {
  const error = new sql.RequestError(
    "Violation of PRIMARY KEY constraint 'PK_FridgeReadings'. Cannot insert duplicate key in object 'dbo.FridgeReadings'.",
  );
  error.number = 2627;
  return error;
};

const ROW = {
  Id: 5,
  Temperature: 4.5,
  Humidity: 50,
  Timestamp: new Date("2024-05-01T10:00:00.000Z"),
  FridgeNo: 2,
};

describe("MssqlReadingRepository", () => {
  describe("insert", () => {
    it("maps the inserted row to a reading", async () => {
      const { pool, calls } = stubPool(rows(ROW));
      const repo = createMssqlReadingRepository(pool);

      const result = await repo.insert({ temperature: 4.5, humidity: 50, fridgeNo: 2 });

      expect(result).toEqual({
        ok: true,
        value: { id: 5, temperature: 4.5, humidity: 50, timestamp: ROW.Timestamp, fridgeNo: 2 },
      });
      expect(calls).toHaveLength(1);
      expect(calls[0]?.inputs).toEqual({ id: null, temperature: 4.5, humidity: 50, timestamp: null, fridgeNo: 2 });
      expect(calls[0]?.command).toContain("COALESCE(@timestamp, GETUTCDATE())");
    });

    it("passes a supplied id and timestamp through", async () => {
      const { pool, calls } = stubPool(rows(ROW));
      const repo = createMssqlReadingRepository(pool);
      const timestamp = new Date("2024-05-01T09:00:00.000Z");

      await repo.insert({ id: 5, temperature: 4.5, humidity: 50, fridgeNo: 2, timestamp });

      expect(calls[0]?.inputs["id"]).toBe(5);
      expect(calls[0]?.inputs["timestamp"]).toBe(timestamp);
    });

    it("reports a duplicate primary key as a conflict", async () => {
      const repo = createMssqlReadingRepository(stubPool(failing(duplicateKey())).pool);

      const result = await repo.insert({ id: 1, temperature: 4, humidity: 40, fridgeNo: 0 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.CONFLICT);
        expect(result.error.message).toBe("Reading with id 1 already exists");
      }
    });

    it("reports any other driver error as an internal error", async () => {
      const cause = new Error("Login failed for user 'sensor'.");
      const repo = createMssqlReadingRepository(stubPool(failing(cause)).pool);

      const result = await repo.insert({ temperature: 4, humidity: 40, fridgeNo: 0 });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(ErrorCode.INTERNAL);
        expect(result.error.message).toBe("Database error");
        expect(result.error.cause).toBe(cause);
      }
    });

    it("treats an empty OUTPUT as an internal error", async () => {
      const repo = createMssqlReadingRepository(stubPool(rows()).pool);

      const result = await repo.insert({ temperature: 4, humidity: 40, fridgeNo: 0 });

      expect(result).toEqual({ ok: false, error: { code: ErrorCode.INTERNAL, message: "Database error" } });
    });

    it("rejects rows of the wrong shape", async () => {
      const repo = createMssqlReadingRepository(stubPool(rows({ ...ROW, Temperature: "4.5" })).pool);

      const result = await repo.insert({ temperature: 4.5, humidity: 50, fridgeNo: 2 });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe("Database error");
    });
  });

  describe("findById", () => {
    it("returns the matching reading", async () => {
      const { pool, calls } = stubPool(rows(ROW));
      const result = await createMssqlReadingRepository(pool).findById(brand<number, "ReadingId">(5));

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.id).toBe(5);
      expect(calls[0]?.inputs).toEqual({ id: 5 });
    });

    it("reports a missing id as not found", async () => {
      const result = await createMssqlReadingRepository(stubPool(rows()).pool).findById(
        brand<number, "ReadingId">(999),
      );

      expect(result).toEqual({ ok: false, error: { code: ErrorCode.NOT_FOUND, message: "Reading not found" } });
    });
  });

  describe("findRecent", () => {
    it("bounds the window on the database's UTC clock", async () => {
      const later = { ...ROW, Id: 6, Timestamp: new Date("2024-05-01T10:00:30.000Z") };
      const { pool, calls } = stubPool(rows(ROW, later));

      const result = await createMssqlReadingRepository(pool).findRecent(60_000);

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.map((r) => r.id)).toEqual([5, 6]);
      expect(calls[0]?.inputs).toEqual({ windowMs: 60_000 });
      expect(calls[0]?.command).toContain(
        "WHERE Timestamp BETWEEN DATEADD(millisecond, -@windowMs, GETUTCDATE()) AND GETUTCDATE()",
      );
    });
  });

  describe("count and ping", () => {
    it("reads the row count", async () => {
      const result = await createMssqlReadingRepository(stubPool(rows({ total: 3 })).pool).count();
      expect(result).toEqual({ ok: true, value: 3 });
    });

    it("reports an unreachable server", async () => {
      const cause = new Error("Failed to connect to db:1433");
      const result = await createMssqlReadingRepository(stubPool(failing(cause)).pool).ping();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("Database unreachable");
        expect(result.error.cause).toBe(cause);
      }
    });
  });
});

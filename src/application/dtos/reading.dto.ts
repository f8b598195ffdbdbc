import { z } from "zod";
import { MAX_SQL_INT } from "../../core/entities/reading.entity.js";

/** DTOs validated at the edge via Zod */

/** Column-style keys sent by some clients, mapped to the canonical camelCase ones */
const PASCAL_KEYS: ReadonlyMap<string, string> = new Map([
  ["Id", "id"],
  ["Temperature", "temperature"],
  ["Humidity", "humidity"],
  ["Timestamp", "timestamp"],
  ["FridgeNo", "fridgeNo"],
]);

const normalizeKeys = (body: unknown): unknown => {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return body;
  return Object.fromEntries(Object.entries(body).map(([key, value]) => [PASCAL_KEYS.get(key) ?? key, value]));
};

/** A JSON number, or a numeric string such as "4.2" */
const numberLike = z.union([z.number(), z.string().trim().min(1).transform(Number)]);

/** Range of the SQL Server DATETIME column */
const SQL_DATETIME_MIN = Date.UTC(1753, 0, 1);
const SQL_DATETIME_MAX = Date.UTC(9999, 11, 31, 23, 59, 59, 997);

const measurement = numberLike.pipe(z.number().finite());
const sqlInt = numberLike.pipe(z.number().int().min(0).max(MAX_SQL_INT));

export const recordReadingDto = z.preprocess(
  normalizeKeys,
  z.object({
    id: numberLike.pipe(z.number().int().positive().max(MAX_SQL_INT)).optional(),
    temperature: measurement,
    humidity: measurement,
    fridgeNo: sqlInt,
    timestamp: z
      .string()
      .datetime({ offset: true })
      .transform((s) => new Date(s))
      .refine((d) => d.getTime() >= SQL_DATETIME_MIN && d.getTime() <= SQL_DATETIME_MAX, {
        message: "Timestamp must be between 1753-01-01 and 9999-12-31",
      })
      .optional(),
  }),
);

export const recentReadingsQuery = z.object({
  windowMs: z.coerce.number().int().positive().max(MAX_SQL_INT).optional(),
});

export const readingIdParam = z.coerce.number().int().positive().max(MAX_SQL_INT);

export type RecordReadingDto = z.output<typeof recordReadingDto>;
export type RecentReadingsQuery = z.output<typeof recentReadingsQuery>;

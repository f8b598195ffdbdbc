import type { FridgeNo, ReadingId } from "../types/brand.js";

/**
 * One temperature/humidity sample from a fridge sensor.
 * Created once on ingestion, never updated.
 */
export interface FridgeReading {
  readonly id: ReadingId;
  readonly temperature: number;
  readonly humidity: number;
  /** Insertion time unless the sensor supplied its own */
  readonly timestamp: Date;
  readonly fridgeNo: FridgeNo;
}

/** Largest value a SQL Server INT column accepts */
export const MAX_SQL_INT = 2_147_483_647;

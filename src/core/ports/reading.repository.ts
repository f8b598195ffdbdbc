import type { FridgeReading } from "../entities/reading.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { ReadingId } from "../types/brand.js";
import type { Result } from "../types/result.js";

/**
 * Port: Reading Repository
 * Defines the contract the domain expects; infrastructure implements it.
 */
export interface ReadingRepository {
  /**
   * Insert one reading. A reused id fails with CONFLICT and leaves the
   * existing row untouched; an absent id is allocated as MAX(id) + 1.
   */
  insert(data: NewReadingData): Promise<Result<FridgeReading, AppError>>;
  findById(id: ReadingId): Promise<Result<FridgeReading, AppError>>;
  /** Readings whose timestamp lies within the last `windowMs`, oldest first */
  findRecent(windowMs: number): Promise<Result<FridgeReading[], AppError>>;
  count(): Promise<Result<number, AppError>>;
  /** Round-trip to the backing store, for readiness probes */
  ping(): Promise<Result<void, AppError>>;
}

export interface NewReadingData {
  readonly id?: number | undefined;
  readonly temperature: number;
  readonly humidity: number;
  readonly fridgeNo: number;
  readonly timestamp?: Date | undefined;
}

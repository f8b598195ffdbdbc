import type { FridgeReading } from "../../core/entities/reading.entity.js";
import { type AppError, causeMessage, isClientError } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { ReadingRepository } from "../../core/ports/reading.repository.js";
import { brand } from "../../core/types/brand.js";
import { type Result, map } from "../../core/types/result.js";
import type { RecordReadingDto } from "../dtos/reading.dto.js";

/** Wire projection: timestamps as ISO strings */
export interface ReadingView {
  readonly id: number;
  readonly temperature: number;
  readonly humidity: number;
  readonly timestamp: string;
  readonly fridgeNo: number;
}

export const toReadingView = (r: FridgeReading): ReadingView => ({
  id: r.id,
  temperature: r.temperature,
  humidity: r.humidity,
  timestamp: r.timestamp.toISOString(),
  fridgeNo: r.fridgeNo,
});

export interface ReadingService {
  /** Persist exactly one reading */
  record(dto: RecordReadingDto): Promise<Result<ReadingView, AppError>>;
  getById(id: number): Promise<Result<ReadingView, AppError>>;
  recent(windowMs: number): Promise<Result<ReadingView[], AppError>>;
}

interface Deps {
  readonly readingRepo: ReadingRepository;
  readonly logger: Logger;
}

export const createReadingService = (deps: Deps): ReadingService => {
  const { readingRepo, logger } = deps;

  const logFailure = (op: string, error: AppError, meta: Record<string, unknown> = {}): void => {
    if (isClientError(error)) {
      logger.warn(`${op} rejected`, { ...meta, code: error.code, reason: error.message });
      return;
    }
    logger.error(`${op} failed`, {
      ...meta,
      code: error.code,
      error: error.cause !== undefined ? causeMessage(error.cause) : error.message,
      stack: error.cause instanceof Error ? error.cause.stack : undefined,
    });
  };

  return {
    async record(dto: RecordReadingDto): Promise<Result<ReadingView, AppError>> {
      logger.debug("Recording reading", { id: dto.id, fridgeNo: dto.fridgeNo });

      const result = await readingRepo.insert(dto);
      if (!result.ok) {
        logFailure("Insert", result.error, { id: dto.id, fridgeNo: dto.fridgeNo });
        return result;
      }

      logger.info("Reading recorded", {
        id: result.value.id,
        fridgeNo: result.value.fridgeNo,
        temperature: result.value.temperature,
        humidity: result.value.humidity,
      });
      return map(result, toReadingView);
    },

    async getById(id: number): Promise<Result<ReadingView, AppError>> {
      const result = await readingRepo.findById(brand<number, "ReadingId">(id));
      if (!result.ok) logFailure("Lookup", result.error, { id });
      return map(result, toReadingView);
    },

    async recent(windowMs: number): Promise<Result<ReadingView[], AppError>> {
      const result = await readingRepo.findRecent(windowMs);
      if (!result.ok) logFailure("Recent query", result.error, { windowMs });
      return map(result, (readings) => readings.map(toReadingView));
    },
  };
};

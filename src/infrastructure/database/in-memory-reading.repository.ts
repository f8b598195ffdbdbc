import type { FridgeReading } from "../../core/entities/reading.entity.js";
import { type AppError, conflict, notFound } from "../../core/errors/app-error.js";
import type { NewReadingData, ReadingRepository } from "../../core/ports/reading.repository.js";
import { type ReadingId, brand } from "../../core/types/brand.js";
import { type Result, ok, err } from "../../core/types/result.js";

interface InMemoryReadingRepositoryOptions {
  /** Clock used for default timestamps and the recent window (default: wall clock) */
  readonly now?: (() => Date) | undefined;
}

const byTimestampThenId = (a: FridgeReading, b: FridgeReading): number =>
  a.timestamp.getTime() - b.timestamp.getTime() || a.id - b.id;

/**
 * In-memory reading repository: used when no SQL connection string is
 * configured, and as the store behind the HTTP and journey tests.
 * Mirrors the SQL adapter's primary-key and id-allocation behaviour.
 */
export const createInMemoryReadingRepository = (
  options: InMemoryReadingRepositoryOptions = {},
): ReadingRepository => {
  const now = options.now ?? (() => new Date());
  const store = new Map<number, FridgeReading>();

  const nextId = (): number => {
    let max = 0;
    for (const id of store.keys()) {
      if (id > max) max = id;
    }
    return max + 1;
  };

  return {
    async insert(data: NewReadingData): Promise<Result<FridgeReading, AppError>> {
      const id = data.id ?? nextId();
      if (store.has(id)) {
        return err(conflict(`Reading with id ${id} already exists`));
      }

      const reading: FridgeReading = {
        id: brand<number, "ReadingId">(id),
        temperature: data.temperature,
        humidity: data.humidity,
        timestamp: data.timestamp ?? now(),
        fridgeNo: brand<number, "FridgeNo">(data.fridgeNo),
      };

      store.set(id, reading);
      return ok(reading);
    },

    async findById(id: ReadingId): Promise<Result<FridgeReading, AppError>> {
      const reading = store.get(id);
      return reading ? ok(reading) : err(notFound("Reading"));
    },

    async findRecent(windowMs: number): Promise<Result<FridgeReading[], AppError>> {
      const end = now().getTime();
      const cutoff = end - windowMs;
      const recent = [...store.values()].filter((r) => {
        const t = r.timestamp.getTime();
        return t >= cutoff && t <= end;
      });
      return ok(recent.sort(byTimestampThenId));
    },

    async count(): Promise<Result<number, AppError>> {
      return ok(store.size);
    },

    async ping(): Promise<Result<void, AppError>> {
      return ok(undefined);
    },
  };
};

import type { Logger } from "../core/ports/logger.js";
import {
  type RandomSource,
  type ReadingPayload,
  generateFaultyReading,
  generateReading,
} from "./generator.js";
import { type SendReading, createHttpSender } from "./sender.js";

export interface FaultyFridgeOptions {
  readonly fridgeNo: number;
  /** Wait before the first faulty reading */
  readonly delayMs: number;
  readonly intervalMs: number;
}

export interface SimulationOptions {
  /** Ingestion endpoint, e.g. https://<app>.azurewebsites.net/api/fridge-reading */
  readonly url: string;
  /** Fridges numbered from 0 */
  readonly fridgeCount: number;
  readonly intervalMs: number;
  /** Wall-clock budget for the whole run */
  readonly runtimeMs: number;
  readonly faulty: FaultyFridgeOptions | null;
  readonly signal?: AbortSignal | undefined;
}

export const DEFAULT_SIMULATION: Omit<SimulationOptions, "url"> = {
  fridgeCount: 1,
  intervalMs: 10_000,
  runtimeMs: 60_000,
  faulty: { fridgeNo: 4, delayMs: 30_000, intervalMs: 30_000 },
};

export interface SimulationSummary {
  readonly sent: number;
  readonly failed: number;
}

interface SimulationDeps {
  readonly logger: Logger;
  readonly send?: SendReading | undefined;
  readonly random?: RandomSource | undefined;
  readonly now?: (() => number) | undefined;
}

/** setTimeout that resolves early, without rejecting, once `signal` aborts */
const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/**
 * One sender loop per fridge, plus an optional faulty fridge that starts
 * late and reports out-of-range temperatures. Resolves when every loop has
 * reached the runtime budget or the signal aborted.
 */
export const runSimulation = async (
  options: SimulationOptions,
  deps: SimulationDeps,
): Promise<SimulationSummary> => {
  const { url, fridgeCount, intervalMs, runtimeMs, faulty, signal } = options;
  const { logger } = deps;
  const send = deps.send ?? createHttpSender(logger);
  const random = deps.random ?? Math.random;
  const now = deps.now ?? (() => Date.now());

  const deadline = now() + runtimeMs;
  let sent = 0;
  let failed = 0;

  const loop = async (make: () => ReadingPayload, everyMs: number): Promise<void> => {
    while (!signal?.aborted && now() < deadline) {
      if (await send(url, make())) {
        sent++;
      } else {
        failed++;
      }
      await sleep(Math.min(everyMs, deadline - now()), signal);
    }
  };

  logger.info("Simulation started", {
    url,
    fridges: fridgeCount,
    intervalMs,
    runtimeMs,
    faultyFridge: faulty?.fridgeNo,
  });

  const loops: Promise<void>[] = [];
  for (let fridgeNo = 0; fridgeNo < fridgeCount; fridgeNo++) {
    loops.push(loop(() => generateReading(fridgeNo, random), intervalMs));
  }

  if (faulty) {
    loops.push(
      (async () => {
        await sleep(Math.min(faulty.delayMs, runtimeMs), signal);
        await loop(() => generateFaultyReading(faulty.fridgeNo, random), faulty.intervalMs);
      })(),
    );
  }

  await Promise.all(loops);

  logger.info("Simulation finished", { sent, failed });
  return { sent, failed };
};

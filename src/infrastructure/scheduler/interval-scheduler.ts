/**
 * Fixed-interval scheduler backed by setInterval.
 *
 * Stands in for the hosting platform's timer trigger: no jitter, no backoff,
 * one run at a time. Task failures are logged and the schedule keeps going.
 */

import type { Logger } from "../../core/ports/logger.js";
import type { ScheduledTask, Scheduler } from "../../core/ports/scheduler.js";

interface IntervalSchedulerDeps {
  readonly name: string;
  readonly intervalMs: number;
  readonly task: ScheduledTask;
  readonly logger: Logger;
  /** Fire once immediately on start (default: false) */
  readonly runOnStart?: boolean | undefined;
}

export const createIntervalScheduler = (deps: IntervalSchedulerDeps): Scheduler => {
  const { name, intervalMs, task, logger } = deps;
  const runOnStart = deps.runOnStart ?? false;

  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight: Promise<void> | null = null;

  const run = async (): Promise<void> => {
    const start = performance.now();
    try {
      await task();
      logger.debug("Scheduled run finished", {
        scheduler: name,
        durationMs: Math.round((performance.now() - start) * 100) / 100,
      });
    } catch (e: unknown) {
      logger.error("Scheduled run failed", {
        scheduler: name,
        error: e instanceof Error ? e.message : String(e),
        stack: e instanceof Error ? e.stack : undefined,
      });
    }
  };

  const tick = async (): Promise<boolean> => {
    if (inFlight !== null) {
      logger.warn("Previous run still in progress, skipping tick", { scheduler: name });
      return false;
    }
    inFlight = run();
    try {
      await inFlight;
    } finally {
      inFlight = null;
    }
    return true;
  };

  return {
    name,

    get running(): boolean {
      return timer !== null;
    },

    start(): void {
      if (timer !== null) return;
      timer = setInterval(() => {
        void tick();
      }, intervalMs);
      logger.info("Scheduler started", { scheduler: name, intervalMs });
      if (runOnStart) void tick();
    },

    async stop(): Promise<void> {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
        logger.info("Scheduler stopped", { scheduler: name });
      }
      if (inFlight !== null) await inFlight;
    },

    runNow: tick,
  };
};

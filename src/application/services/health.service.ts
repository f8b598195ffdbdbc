import type { Logger } from "../../core/ports/logger.js";
import type { ReadingRepository } from "../../core/ports/reading.repository.js";
import type { Scheduler } from "../../core/ports/scheduler.js";
import { causeMessage } from "../../core/errors/app-error.js";

export type HealthLevel = "ok" | "degraded" | "down";

export interface HealthStatus {
  readonly status: HealthLevel;
  readonly version: string;
  readonly uptime: number;
  readonly timestamp: string;
  readonly checks: Record<string, ComponentHealth>;
}

export interface ComponentHealth {
  readonly status: HealthLevel;
  readonly latencyMs?: number | undefined;
  readonly details?: string | undefined;
}

export interface HealthService {
  check(): Promise<HealthStatus>;
}

interface Deps {
  readonly logger: Logger;
  readonly version: string;
  readonly readingRepo: ReadingRepository;
  /** The monitor timer, when enabled */
  readonly scheduler?: Scheduler | undefined;
  readonly slackConfigured: boolean;
}

const elapsed = (start: number): number => Math.round((performance.now() - start) * 100) / 100;

export const createHealthService = (deps: Deps): HealthService => {
  const { logger, version, readingRepo, scheduler, slackConfigured } = deps;

  return {
    async check(): Promise<HealthStatus> {
      logger.debug("Running deep health check");
      const checks: Record<string, ComponentHealth> = {};

      const dbStart = performance.now();
      const ping = await readingRepo.ping();
      checks["database"] = ping.ok
        ? { status: "ok", latencyMs: elapsed(dbStart) }
        : {
            status: "down",
            latencyMs: elapsed(dbStart),
            details: ping.error.cause !== undefined ? causeMessage(ping.error.cause) : ping.error.message,
          };

      if (scheduler) {
        checks["monitor"] = scheduler.running
          ? { status: "ok" }
          : { status: "degraded", details: "Monitor timer is not running" };
      } else {
        checks["monitor"] = { status: "ok", details: "disabled" };
      }

      checks["slack"] = slackConfigured
        ? { status: "ok" }
        : { status: "degraded", details: "No webhook configured; alerts are only logged" };

      // Only an unreachable database makes the service unready
      const all = Object.entries(checks);
      const down = all.filter(([, c]) => c.status === "down");
      const degraded = all.filter(([, c]) => c.status === "degraded");
      const status: HealthLevel = down.length > 0 ? "down" : degraded.length > 0 ? "degraded" : "ok";

      if (status !== "ok") {
        logger.warn("Health check not ok", {
          status,
          failedComponents: [...down, ...degraded].map(([name]) => name),
        });
      }

      return {
        status,
        version,
        uptime: process.uptime(),
        timestamp: new Date().toISOString(),
        checks,
      };
    },
  };
};

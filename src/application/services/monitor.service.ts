import type { AppError } from "../../core/errors/app-error.js";
import { causeMessage } from "../../core/errors/app-error.js";
import type { Logger } from "../../core/ports/logger.js";
import type { AlertNotifier } from "../../core/ports/notifier.js";
import type { ReadingRepository } from "../../core/ports/reading.repository.js";
import { type Result, ok } from "../../core/types/result.js";
import { type Thresholds, buildAlertMessage, violatesThresholds } from "./threshold-policy.js";

export interface MonitorReport {
  /** Readings inside the evaluation window */
  readonly checked: number;
  readonly violations: number;
  /** Whether the notifier accepted an alert this run */
  readonly notified: boolean;
}

export interface MonitorService {
  check(): Promise<Result<MonitorReport, AppError>>;
}

interface Deps {
  readonly readingRepo: ReadingRepository;
  readonly notifier: AlertNotifier;
  readonly thresholds: Thresholds;
  /** How far back each run looks, in ms */
  readonly windowMs: number;
  readonly logger: Logger;
}

export const createMonitorService = (deps: Deps): MonitorService => {
  const { readingRepo, notifier, thresholds, windowMs, logger } = deps;

  return {
    async check(): Promise<Result<MonitorReport, AppError>> {
      logger.info("Checking recent readings", { windowMs });

      const recent = await readingRepo.findRecent(windowMs);
      if (!recent.ok) {
        logger.error("Failed to load recent readings", {
          code: recent.error.code,
          error: recent.error.cause !== undefined ? causeMessage(recent.error.cause) : recent.error.message,
        });
        return recent;
      }

      const checked = recent.value.length;
      const violating = recent.value.filter((r) => violatesThresholds(r, thresholds));

      if (violating.length === 0) {
        logger.info("No threshold breach detected", { checked });
        return ok({ checked, violations: 0, notified: false });
      }

      const message = buildAlertMessage(violating);

      if (!notifier.enabled) {
        logger.warn("Threshold breach detected, no Slack webhook configured", {
          checked,
          violations: violating.length,
          alert: message,
        });
        return ok({ checked, violations: violating.length, notified: false });
      }

      const notified = await notifier.send(message);
      if (notified) {
        logger.info("Slack notification sent due to threshold breach", {
          violations: violating.length,
        });
      }

      return ok({ checked, violations: violating.length, notified });
    },
  };
};

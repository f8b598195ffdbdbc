/**
 * Slack incoming-webhook notifier.
 *
 *   - HTTP POST of `{"text": "..."}` as JSON
 *   - Per-request timeout via AbortController
 *   - No retries by default; `maxRetries` adds exponential backoff
 *   - Failures are logged and reported as `false`, never thrown
 */

import type { Logger } from "../../core/ports/logger.js";
import type { AlertNotifier } from "../../core/ports/notifier.js";

interface SlackNotifierOptions {
  /** Incoming webhook URL */
  readonly url: string;
  /** Request timeout in ms (default: 5000) */
  readonly timeoutMs?: number | undefined;
  /** Retry attempts after the first failure (default: 0) */
  readonly maxRetries?: number | undefined;
  /** Base backoff delay in ms, doubled per attempt (default: 500) */
  readonly backoffMs?: number | undefined;
  readonly logger: Logger;
}

export interface SlackMessage {
  readonly text: string;
}

export const createSlackNotifier = (options: SlackNotifierOptions): AlertNotifier => {
  const { url, logger } = options;
  const timeoutMs = options.timeoutMs ?? 5_000;
  const maxRetries = options.maxRetries ?? 0;
  const backoffMs = options.backoffMs ?? 500;

  return {
    get enabled(): boolean {
      return url.length > 0;
    },

    async send(text: string): Promise<boolean> {
      const message: SlackMessage = { text };
      const body = JSON.stringify(message);
      let lastError: unknown;

      for (let attempt = 0; attempt <= maxRetries; attempt++) {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), timeoutMs);

        try {
          const response = await fetch(url, {
            method: "POST",
            headers: { "Content-Type": "application/json" },
            body,
            signal: controller.signal,
          });

          if (response.ok) {
            logger.info("Notification sent to Slack successfully", { attempt: attempt + 1 });
            return true;
          }

          const responseText = await response.text().catch(() => "");
          lastError = new Error(`Webhook returned ${response.status}`);
          logger.warn("Slack webhook returned non-OK status", {
            status: response.status,
            body: responseText,
            attempt: attempt + 1,
          });
        } catch (error: unknown) {
          lastError = error;
        } finally {
          clearTimeout(timer);
        }

        if (attempt < maxRetries) {
          const delay = backoffMs * 2 ** attempt;
          await new Promise((r) => setTimeout(r, delay));
        }
      }

      logger.error("Failed to send Slack notification", {
        error: lastError instanceof Error ? lastError.message : String(lastError),
        attempts: maxRetries + 1,
      });
      return false;
    },
  };
};

/**
 * No-op notifier for when no webhook URL is configured.
 */
export const createNoopNotifier = (): AlertNotifier => ({
  get enabled(): boolean {
    return false;
  },
  async send(_text: string): Promise<boolean> {
    return false;
  },
});

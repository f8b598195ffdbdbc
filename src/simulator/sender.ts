import type { Logger } from "../core/ports/logger.js";
import type { ReadingPayload } from "./generator.js";

export type SendReading = (url: string, reading: ReadingPayload) => Promise<boolean>;

/**
 * POST one reading to the ingestion endpoint.
 * Resolves to whether the endpoint accepted it; never throws.
 */
export const createHttpSender =
  (logger: Logger, timeoutMs = 10_000): SendReading =>
  async (url, reading) => {
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(reading),
        signal: AbortSignal.timeout(timeoutMs),
      });
      const body = await response.text().catch(() => "");

      if (response.ok) {
        logger.info("Data sent successfully", { ...reading });
        return true;
      }

      logger.warn("Failed to send data", { status: response.status, body, ...reading });
      return false;
    } catch (e: unknown) {
      logger.error("Error while sending data", {
        error: e instanceof Error ? e.message : String(e),
        fridgeNo: reading.fridgeNo,
      });
      return false;
    }
  };

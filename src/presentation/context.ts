import type { Logger } from "../core/ports/logger.js";
import type { RequestId } from "../core/types/brand.js";

/**
 * Typed request context threaded from the server into every handler.
 */
export interface RequestContext {
  readonly requestId: RequestId;
  readonly startTime: number;
  readonly ip: string;
  readonly method: string;
  readonly path: string;
  /** Request-scoped logger with requestId pre-bound */
  readonly logger: Logger;
}

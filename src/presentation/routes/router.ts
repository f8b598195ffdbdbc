import type { HealthService } from "../../application/services/health.service.js";
import type { ReadingService } from "../../application/services/reading.service.js";
import type { Logger } from "../../core/ports/logger.js";
import { notFound } from "../../core/errors/app-error.js";
import type { RequestContext } from "../context.js";
import { healthHandler } from "../handlers/health.handler.js";
import { readingHandlers } from "../handlers/reading.handler.js";
import { errorResponse } from "../handlers/response.js";

/**
 * Static routes are a map lookup.
 * The one parametric route (reading by id) uses prefix matching.
 */
type RouteHandler = (req: Request, ctx: RequestContext) => Promise<Response>;

interface RouterDeps {
  readonly readingService: ReadingService;
  readonly healthService: HealthService;
  /** Window used by /recent when the caller gives none */
  readonly defaultWindowMs: number;
  readonly logger: Logger;
}

export const READING_PATH = "/api/fridge-reading";
const READING_PREFIX = `${READING_PATH}/`;

export const createRouter = (deps: RouterDeps) => {
  const { logger } = deps;
  const health = healthHandler(deps.healthService);
  const readings = readingHandlers(
    deps.readingService,
    deps.defaultWindowMs,
    logger.child({ layer: "handler", handler: "reading" }),
  );

  const notFound404 = (method: string, path: string, ctx: RequestContext): Response => {
    logger.debug("Route not found", { method, path });
    return errorResponse(notFound(`${method} ${path}`), ctx.requestId);
  };

  /** Static route table */
  const routes = new Map<string, RouteHandler>([
    ["GET /health", async () => health.shallowCheck()],
    ["GET /readiness", async () => health.deepCheck()],

    [`POST ${READING_PATH}`, readings.create],
    [`GET ${READING_PATH}/recent`, readings.recent],
  ]);

  /** GET /api/fridge-reading/:id */
  const matchReading = (method: string, path: string): RouteHandler | null => {
    if (method !== "GET" || !path.startsWith(READING_PREFIX)) return null;
    const rawId = path.substring(READING_PREFIX.length);
    if (rawId.length === 0 || rawId.includes("/")) return null;
    return (req, ctx) => readings.getById(req, ctx, rawId);
  };

  return {
    handle(req: Request, ctx: RequestContext, path: string): Promise<Response> {
      const handler = routes.get(`${req.method} ${path}`);
      if (handler) return handler(req, ctx);

      const readingHandler = matchReading(req.method, path);
      if (readingHandler) return readingHandler(req, ctx);

      return Promise.resolve(notFound404(req.method, path, ctx));
    },
  };
};

export type Router = ReturnType<typeof createRouter>;

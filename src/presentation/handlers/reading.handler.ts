import { readingIdParam, recentReadingsQuery, recordReadingDto } from "../../application/dtos/reading.dto.js";
import type { ReadingService } from "../../application/services/reading.service.js";
import type { Logger } from "../../core/ports/logger.js";
import type { RequestContext } from "../context.js";
import { readJson, validateBody } from "../middleware/validate.js";
import { createdResponse, errorResponse, jsonResponse } from "./response.js";

export const readingHandlers = (
  readingService: ReadingService,
  defaultWindowMs: number,
  logger: Logger,
) => ({
  /** POST /api/fridge-reading */
  create: async (req: Request, ctx: RequestContext): Promise<Response> => {
    logger.info("FridgeReading function triggered", { requestId: ctx.requestId });

    const body = await readJson(req);
    if (!body.ok) {
      logger.warn("Unreadable reading payload", { requestId: ctx.requestId, reason: body.error.message });
      return errorResponse(body.error, ctx.requestId);
    }

    const validated = validateBody(recordReadingDto, body.value, "Invalid temperature or humidity data");
    if (!validated.ok) {
      logger.warn("Reading validation failed", {
        requestId: ctx.requestId,
        code: validated.error.code,
      });
      return errorResponse(validated.error, ctx.requestId);
    }

    const result = await readingService.record(validated.value);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    return createdResponse(result.value);
  },

  /** GET /api/fridge-reading/recent?windowMs= */
  recent: async (req: Request, ctx: RequestContext): Promise<Response> => {
    const params = Object.fromEntries(new URL(req.url).searchParams);
    const query = validateBody(recentReadingsQuery, params, "Invalid query parameters");
    if (!query.ok) return errorResponse(query.error, ctx.requestId);

    const result = await readingService.recent(query.value.windowMs ?? defaultWindowMs);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    return jsonResponse(result.value);
  },

  /** GET /api/fridge-reading/:id */
  getById: async (_req: Request, ctx: RequestContext, rawId: string): Promise<Response> => {
    const id = validateBody(readingIdParam, rawId, "Reading id must be a positive integer");
    if (!id.ok) return errorResponse(id.error, ctx.requestId);

    const result = await readingService.getById(id.value);
    if (!result.ok) return errorResponse(result.error, ctx.requestId);

    return jsonResponse(result.value);
  },
});

export type ReadingHandlers = ReturnType<typeof readingHandlers>;

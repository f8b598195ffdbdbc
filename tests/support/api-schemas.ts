import { z } from "zod";

/** Response shapes, parsed so tests read typed values */

export const readingView = z.object({
  id: z.number(),
  temperature: z.number(),
  humidity: z.number(),
  timestamp: z.string(),
  fridgeNo: z.number(),
});

export const readingBody = z.object({ data: readingView });
export const readingListBody = z.object({ data: z.array(readingView) });

export const errorBody = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z
      .object({
        formErrors: z.array(z.string()),
        fieldErrors: z.record(z.array(z.string()).optional()),
      })
      .optional(),
  }),
  requestId: z.string().optional(),
});

const componentHealth = z.object({
  status: z.enum(["ok", "degraded", "down"]),
  details: z.string().optional(),
});

export const healthBody = z.object({
  data: z.object({
    status: z.enum(["ok", "degraded", "down"]),
    checks: z.record(componentHealth).optional(),
  }),
});

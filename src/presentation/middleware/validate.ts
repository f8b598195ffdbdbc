import type { ZodType, ZodTypeDef } from "zod";
import { type AppError, badRequest } from "../../core/errors/app-error.js";
import { type Result, err, ok, tryCatch } from "../../core/types/result.js";

/**
 * Validate an unknown value against a Zod schema.
 * Returns a typed Result and never throws.
 */
export const validateBody = <T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  body: unknown,
  message = "Invalid request body",
): Result<T, AppError> => {
  const result = schema.safeParse(body);
  if (!result.success) {
    const { formErrors, fieldErrors } = result.error.flatten();
    return err(badRequest(message, { formErrors, fieldErrors }));
  }
  return ok(result.data);
};

/** Parse a JSON request body; malformed JSON is a client error */
export const readJson = async (req: Request): Promise<Result<unknown, AppError>> => {
  const text = await req.text();
  if (text.trim().length === 0) return err(badRequest("Request body is required"));
  const parsed = tryCatch((): unknown => JSON.parse(text));
  return parsed.ok ? parsed : err(badRequest("Request body must be valid JSON"));
};

/**
 * Canonical application error. Every failure in the system is expressed
 * as an AppError so HTTP, logging, and the monitor share a single shape.
 */

export const ErrorCode = {
  // Client errors
  BAD_REQUEST: "BAD_REQUEST",
  NOT_FOUND: "NOT_FOUND",
  CONFLICT: "CONFLICT",
  // Server errors
  INTERNAL: "INTERNAL",
  SERVICE_UNAVAILABLE: "SERVICE_UNAVAILABLE",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

const STATUS_MAP: Record<ErrorCode, number> = {
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL: 500,
  SERVICE_UNAVAILABLE: 503,
};

export const httpStatus = (code: ErrorCode): number => STATUS_MAP[code];

/** Client errors are the caller's fault; everything else is ours */
export const isClientError = (error: AppError): boolean => httpStatus(error.code) < 500;

/** Factory helpers */
export const appError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  cause?: unknown,
): AppError => {
  const error: AppError = { code, message };
  if (details !== undefined) {
    return cause !== undefined ? { ...error, details, cause } : { ...error, details };
  }
  if (cause !== undefined) {
    return { ...error, cause };
  }
  return error;
};

export const badRequest = (msg: string, details?: Record<string, unknown>): AppError =>
  appError(ErrorCode.BAD_REQUEST, msg, details);

export const notFound = (resource: string): AppError =>
  appError(ErrorCode.NOT_FOUND, `${resource} not found`);

export const conflict = (msg: string): AppError => appError(ErrorCode.CONFLICT, msg);

export const internal = (msg = "Internal server error", cause?: unknown): AppError =>
  appError(ErrorCode.INTERNAL, msg, undefined, cause);

export const unavailable = (msg: string, cause?: unknown): AppError =>
  appError(ErrorCode.SERVICE_UNAVAILABLE, msg, undefined, cause);

/** Best-effort message for a caught value, for logs only */
export const causeMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

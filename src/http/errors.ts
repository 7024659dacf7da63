import type { Context, ErrorHandler, NotFoundHandler } from "hono";
import { ApiError, ERROR_MESSAGES, type ErrorStatus } from "../domain/errors.js";
import { logger } from "../logger.js";

export interface ErrorBody {
  success: false;
  error: ErrorStatus;
  message: string;
}

export function errorBody(status: ErrorStatus): ErrorBody {
  return { success: false, error: status, message: ERROR_MESSAGES[status] };
}

export const handleError: ErrorHandler = (err, c) => {
  const where = `${c.req.method} ${c.req.path}`;
  if (err instanceof ApiError) {
    logger.warn(`${where} → ${err.status}${err.detail ? ` (${err.detail})` : ""}`);
    return c.json(errorBody(err.status), err.status);
  }
  logger.error(`Unhandled error on ${where}: ${err.message}`, {
    stack: err.stack,
  });
  return c.json(errorBody(500), 500);
};

export const handleNotFound: NotFoundHandler = (c) =>
  c.json(errorBody(404), 404);

/** Fallback registered after a path's real handlers. */
export function methodNotAllowed(c: Context): never {
  throw ApiError.methodNotAllowed(`${c.req.method} not supported`);
}

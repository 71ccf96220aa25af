/**
 * Error Handling Middleware
 *
 * Hono error handler for errors thrown outside action dispatch (action
 * errors themselves travel inside the reply envelope). Maps action errors
 * to HTTP status codes with `{ error: { code, message } }` JSON bodies.
 */

import type { Context, ErrorHandler } from "hono";
import type { ErrorCode } from "@deckbridge/shared";
import { isActionError } from "../errors";
import { createLogger } from "../logger";

const log = createLogger("ErrorHandler");

/**
 * JSON error body returned by HTTP-level failures.
 */
export interface RestErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
  };
}

type ErrorStatus = 400 | 403 | 404 | 409 | 500 | 503;

/**
 * Maps error codes to HTTP status codes.
 *
 * - UNSUPPORTED_ACTION, VALIDATION_ERROR: 400 Bad Request
 * - FORBIDDEN: 403
 * - NOT_FOUND: 404
 * - CONFLICT: 409
 * - COLLECTION_UNAVAILABLE: 503 (no profile open)
 * - INTERNAL_ERROR and unknown: 500
 */
export function mapErrorCodeToStatus(code: ErrorCode): ErrorStatus {
  switch (code) {
    case "UNSUPPORTED_ACTION":
    case "VALIDATION_ERROR":
      return 400;
    case "FORBIDDEN":
      return 403;
    case "NOT_FOUND":
      return 404;
    case "CONFLICT":
      return 409;
    case "COLLECTION_UNAVAILABLE":
      return 503;
    case "INTERNAL_ERROR":
    default:
      return 500;
  }
}

export function jsonError(c: Context, status: ErrorStatus, code: ErrorCode, message: string) {
  const body: RestErrorResponse = { error: { code, message } };
  return c.json(body, status);
}

/**
 * Hono error handler for the HTTP routes.
 *
 * Usage:
 * ```typescript
 * app.onError(restErrorHandler);
 * ```
 *
 * Stack traces are logged, never returned.
 */
export const restErrorHandler: ErrorHandler = (err, c) => {
  const method = c.req.method;
  const path = c.req.path;

  if (isActionError(err)) {
    log.warn(`${method} ${path} - ${err.code}: ${err.message}`);
    return jsonError(c, mapErrorCodeToStatus(err.code), err.code, err.message);
  }

  log.error(`${method} ${path} - Unexpected error: ${err.message}`, { stack: err.stack });
  return jsonError(c, 500, "INTERNAL_ERROR", "An unexpected error occurred. Please try again later.");
};

/**
 * Action Errors
 *
 * Error classes thrown by action handlers and the host collection. Each
 * carries an ErrorCode; the dispatcher turns any of them into the reply's
 * `error` string.
 */

import type { ZodError } from "zod";
import { ErrorCodeSchema, type ErrorCode } from "@deckbridge/shared";

/**
 * Base class for errors that are part of the action protocol.
 */
export class ActionError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode
  ) {
    super(message);
    this.name = "ActionError";
  }
}

/**
 * Caller input failed validation. Raised before any mutation happens.
 */
export class ValidationError extends ActionError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

/**
 * A deck, model, note, card, config or profile does not exist.
 */
export class NotFoundError extends ActionError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

/**
 * The requested change collides with existing state (duplicate names,
 * objects still in use).
 */
export class ConflictError extends ActionError {
  constructor(message: string) {
    super(message, "CONFLICT");
    this.name = "ConflictError";
  }
}

/**
 * No collection is open (no profile loaded).
 */
export class CollectionUnavailableError extends ActionError {
  constructor(message = "Collection not available") {
    super(message, "COLLECTION_UNAVAILABLE");
    this.name = "CollectionUnavailableError";
  }
}

/**
 * Request lacks the configured API key.
 */
export class ForbiddenError extends ActionError {
  constructor(message: string) {
    super(message, "FORBIDDEN");
    this.name = "ForbiddenError";
  }
}

/**
 * Checks for an ActionError by name and code, since instanceof checks can
 * fail across module boundaries.
 */
export function isActionError(error: unknown): error is ActionError {
  if (error instanceof ActionError) {
    return true;
  }
  // Fallback check for cross-module scenarios
  return (
    error instanceof Error &&
    "code" in error &&
    ErrorCodeSchema.safeParse(error.code).success
  );
}

/**
 * Formats zod issues as "path: message" pairs joined with "; ".
 * Issues at the root are reported without a path.
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/**
 * Converts a zod failure into a ValidationError.
 */
export function validationErrorFromZod(error: ZodError): ValidationError {
  return new ValidationError(formatZodError(error));
}

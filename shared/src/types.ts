/**
 * DeckBridge Shared Types
 *
 * Core type definitions used by the server and by API clients.
 */

/**
 * Error codes for the action protocol.
 *
 * The reply envelope carries only the error message (for wire compatibility
 * with existing clients); codes are used for logging and for HTTP-level
 * error bodies.
 */
export type ErrorCode =
  | "UNSUPPORTED_ACTION"
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "CONFLICT"
  | "COLLECTION_UNAVAILABLE"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

/**
 * Tagged reply returned for every action request with `version > 4`.
 * Exactly one of `result` / `error` is meaningful: `error` is null on success.
 */
export interface ActionReply<T = unknown> {
  result: T | null;
  error: string | null;
}

/**
 * Ease buttons offered when answering a card.
 * 1 = Again, 2 = Hard, 3 = Good, 4 = Easy.
 */
export type Ease = 1 | 2 | 3 | 4;

/**
 * A field value as reported by notesInfo / cardsInfo.
 */
export interface FieldValue {
  value: string;
  order: number;
}

/**
 * Answer button description for a card under review.
 */
export interface AnswerButton {
  ease: Ease;
  label: string;
  /** Human-readable predicted interval, e.g. "1d", "1.3mo" */
  timing: string;
}

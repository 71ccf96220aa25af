/**
 * Host Collection Types
 *
 * Clock and the numeric enums used by card and review log records.
 * Record shapes live in collection-schema.ts.
 */

/**
 * Milliseconds since the epoch. Injected so tests control "now".
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export const DAY_MS = 86_400_000;

/**
 * Card type: what the card is, independent of where it is queued.
 */
export const CardType = {
  New: 0,
  Learning: 1,
  Review: 2,
  Relearning: 3,
} as const;
export type CardType = (typeof CardType)[keyof typeof CardType];

/**
 * Card queue: where the scheduler picks the card from.
 */
export const CardQueue = {
  Suspended: -1,
  New: 0,
  Learning: 1,
  Review: 2,
} as const;
export type CardQueue = (typeof CardQueue)[keyof typeof CardQueue];

/**
 * Review log entry type.
 */
export const ReviewKind = {
  Learn: 0,
  Review: 1,
  Relearn: 2,
  Filtered: 3,
} as const;
export type ReviewKind = (typeof ReviewKind)[keyof typeof ReviewKind];

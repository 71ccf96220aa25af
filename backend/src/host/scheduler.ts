/**
 * SM-2 Scheduler
 *
 * Spaced repetition for the reference host, based on the SuperMemo 2
 * algorithm. Ease factors are held in permille (2500 = 2.5) as the card
 * records store them; intervals are whole days.
 *
 * - "again" (1): interval 1, streak reset, factor -200, card relearns
 * - "hard" (2): small interval increase, factor -150
 * - "good" (3): first 1, second 6, then interval * factor
 * - "easy" (4): first 4, second 10, then interval * factor * 1.3, factor +150
 * - factor clamped to [1300, 3000]
 */

import type { AnswerButton, Ease } from "@deckbridge/shared";
import type { Card } from "./collection-schema";
import { CardQueue, CardType, ReviewKind } from "./types";

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_FACTOR = 2500;
export const MIN_FACTOR = 1300;
export const MAX_FACTOR = 3000;

const AGAIN_PENALTY = 200;
const HARD_PENALTY = 150;
const EASY_BONUS = 150;
const HARD_MULTIPLIER = 1.2;
const EASY_MULTIPLIER = 1.3;

export const BUTTON_LABELS: Record<Ease, string> = {
  1: "Again",
  2: "Hard",
  3: "Good",
  4: "Easy",
};

export const EASES: readonly Ease[] = [1, 2, 3, 4];

// =============================================================================
// Interval Calculation
// =============================================================================

/**
 * Scheduling state the algorithm reads and writes.
 */
export interface SchedulingState {
  ivl: number;
  factor: number;
  streak: number;
}

function clampFactor(factor: number): number {
  return Math.min(MAX_FACTOR, Math.max(MIN_FACTOR, factor));
}

/**
 * Computes the state after answering with `ease`. A factor of 0 (a card
 * never reviewed) counts as DEFAULT_FACTOR.
 */
export function nextState(state: SchedulingState, ease: Ease): SchedulingState {
  const factor = state.factor > 0 ? state.factor : DEFAULT_FACTOR;
  const { ivl, streak } = state;

  switch (ease) {
    case 1:
      return { ivl: 1, factor: clampFactor(factor - AGAIN_PENALTY), streak: 0 };

    case 2: {
      const next = streak === 0 ? 1 : Math.max(ivl + 1, Math.round(ivl * HARD_MULTIPLIER));
      return { ivl: next, factor: clampFactor(factor - HARD_PENALTY), streak: streak + 1 };
    }

    case 3: {
      let next: number;
      if (streak === 0) {
        next = 1;
      } else if (streak === 1) {
        next = 6;
      } else {
        next = Math.round((ivl * factor) / 1000);
      }
      return { ivl: next, factor, streak: streak + 1 };
    }

    case 4: {
      const newFactor = clampFactor(factor + EASY_BONUS);
      let next: number;
      if (streak === 0) {
        next = 4;
      } else if (streak === 1) {
        next = 10;
      } else {
        next = Math.round(((ivl * newFactor) / 1000) * EASY_MULTIPLIER);
      }
      return { ivl: next, factor: newFactor, streak: streak + 1 };
    }
  }
}

// =============================================================================
// Answering
// =============================================================================

/**
 * What an answer changed, for the review log.
 */
export interface AnswerOutcome {
  ivl: number;
  lastIvl: number;
  factor: number;
  kind: ReviewKind;
}

function reviewKindFor(card: Card): ReviewKind {
  if (card.odid !== 0) {
    return ReviewKind.Filtered;
  }
  switch (card.type) {
    case CardType.Review:
      return ReviewKind.Review;
    case CardType.Relearning:
      return ReviewKind.Relearn;
    default:
      return ReviewKind.Learn;
  }
}

/**
 * Answers a card in place. `today` is the current day number.
 *
 * A card answered from a filtered deck goes back to its home deck.
 */
export function answerCard(card: Card, ease: Ease, today: number): AnswerOutcome {
  const kind = reviewKindFor(card);
  const lastIvl = card.ivl;
  const next = nextState(card, ease);

  if (ease === 1) {
    if (card.type === CardType.Review) {
      card.lapses += 1;
    }
    card.type =
      card.type === CardType.Review || card.type === CardType.Relearning
        ? CardType.Relearning
        : CardType.Learning;
    card.queue = CardQueue.Learning;
  } else {
    card.type = CardType.Review;
    card.queue = CardQueue.Review;
  }

  card.ivl = next.ivl;
  card.factor = next.factor;
  card.streak = next.streak;
  card.reps += 1;
  card.due = today + next.ivl;

  if (card.odid !== 0) {
    card.did = card.odid;
    card.odid = 0;
  }

  return { ivl: next.ivl, lastIvl, factor: next.factor, kind };
}

/**
 * Puts a card back at the end of the new queue and clears its history.
 */
export function forgetCard(card: Card, position: number): void {
  card.type = CardType.New;
  card.queue = CardQueue.New;
  card.due = position;
  card.ivl = 0;
  card.factor = 0;
  card.streak = 0;
  card.reps = 0;
  card.lapses = 0;
}

/**
 * True when a learning or review card is due on or before `today`.
 */
export function isDue(card: Card, today: number): boolean {
  return (
    (card.queue === CardQueue.Learning || card.queue === CardQueue.Review) && card.due <= today
  );
}

// =============================================================================
// Display
// =============================================================================

function trimDecimal(value: number): string {
  const text = value.toFixed(1);
  return text.endsWith(".0") ? text.slice(0, -2) : text;
}

/**
 * Formats an interval in days the way answer buttons show it:
 * "3d", "1.5mo", "2y".
 */
export function formatInterval(days: number): string {
  if (days < 30) {
    return `${days}d`;
  }
  if (days < 365) {
    return `${trimDecimal(days / 30)}mo`;
  }
  return `${trimDecimal(days / 365)}y`;
}

/**
 * The four answer buttons with the interval each would schedule.
 */
export function answerButtons(card: Card): AnswerButton[] {
  return EASES.map((ease) => ({
    ease,
    label: BUTTON_LABELS[ease],
    timing: formatInterval(nextState(card, ease).ivl),
  }));
}

/**
 * Review statistics computed from the review log.
 */

import type { StatsPeriod } from "@deckbridge/shared";
import type { Collection } from "./collection";
import type { Deck } from "./collection-schema";
import { CardQueue, DAY_MS, ReviewKind } from "./types";

const PERIOD_DESCRIPTIONS: Record<StatsPeriod, string> = {
  today: "today",
  last7days: "last 7 days",
  last30days: "last 30 days",
  allTime: "all time",
};

export interface TimeStats {
  period: string;
  totalReviews: number;
  totalTimeSeconds: number;
  averageTimePerCardSeconds: number;
}

export interface DayReviews {
  /** UTC date, YYYY-MM-DD */
  date: string;
  /** Days relative to today: 0 is today, -1 yesterday */
  dayNumber: number;
  learning: number;
  review: number;
  relearn: number;
  filtered: number;
  total: number;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

/**
 * Earliest review id (exclusive) counted for a period.
 */
export function periodCutoff(collection: Collection, period: StatsPeriod): number {
  switch (period) {
    case "today":
      return collection.store.dayStart();
    case "last7days":
      return collection.store.now() - 7 * DAY_MS;
    case "last30days":
      return collection.store.now() - 30 * DAY_MS;
    case "allTime":
      return 0;
  }
}

/**
 * Review count and time spent on cards currently in `deckIds` (every card
 * when null), counting reviews after the period's cutoff.
 */
export function timeStats(
  collection: Collection,
  deckIds: ReadonlySet<number> | null,
  period: StatsPeriod
): TimeStats {
  const cutoff = periodCutoff(collection, period);
  let totalReviews = 0;
  let totalMs = 0;
  for (const entry of collection.store.revlog) {
    if (entry.id <= cutoff) {
      continue;
    }
    if (deckIds) {
      const card = collection.getCard(entry.cid);
      if (!card || !deckIds.has(card.did)) {
        continue;
      }
    }
    totalReviews += 1;
    totalMs += entry.time;
  }

  return {
    period: PERIOD_DESCRIPTIONS[period],
    totalReviews,
    totalTimeSeconds: round(totalMs / 1000, 2),
    averageTimePerCardSeconds: totalReviews === 0 ? 0 : round(totalMs / totalReviews / 1000, 2),
  };
}

/**
 * Reviews per day over the last `days` days for a deck family, split by
 * review kind. Days without reviews are left out.
 */
export function reviewsByDay(collection: Collection, deck: Deck, days: number): DayReviews[] {
  const family = new Set(collection.decks.familyIds(deck));
  const todayStart = collection.store.dayStart();
  const cutoff = todayStart + DAY_MS - days * DAY_MS;
  const byDay = new Map<number, DayReviews>();

  for (const entry of collection.store.revlog) {
    if (entry.id <= cutoff) {
      continue;
    }
    const card = collection.getCard(entry.cid);
    if (!card || !family.has(card.did)) {
      continue;
    }
    const dayNumber = Math.floor((entry.id - todayStart) / DAY_MS);
    let day = byDay.get(dayNumber);
    if (!day) {
      day = {
        date: new Date(todayStart + dayNumber * DAY_MS).toISOString().slice(0, 10),
        dayNumber,
        learning: 0,
        review: 0,
        relearn: 0,
        filtered: 0,
        total: 0,
      };
      byDay.set(dayNumber, day);
    }
    switch (entry.type) {
      case ReviewKind.Learn:
        day.learning += 1;
        break;
      case ReviewKind.Review:
        day.review += 1;
        break;
      case ReviewKind.Relearn:
        day.relearn += 1;
        break;
      case ReviewKind.Filtered:
        day.filtered += 1;
        break;
    }
    day.total += 1;
  }

  return [...byDay.values()].sort((a, b) => a.dayNumber - b.dayNumber);
}

/** New cards waiting in a deck family, ignoring daily limits */
export function newCardsAvailable(collection: Collection, deck: Deck): number {
  const family = new Set(collection.decks.familyIds(deck));
  let count = 0;
  for (const card of collection.store.cards.values()) {
    if (family.has(card.did) && card.queue === CardQueue.New) {
      count += 1;
    }
  }
  return count;
}

export function roundAverage(total: number, days: number): number {
  return days > 0 ? round(total / days, 1) : 0;
}

/**
 * Study Handlers
 *
 * Reviewing cards, study statistics and custom study: per-deck limits,
 * extending today's new card limit, and filtered decks of forgotten cards.
 */

import { z } from "zod";
import { StatsPeriodSchema } from "@deckbridge/shared";
import { CUSTOM_STUDY_DECK_NAME, type Collection } from "../host/collection";
import type { Deck } from "../host/collection-schema";
import { CardQueue } from "../host/types";
import { newCardsAvailable, reviewsByDay, roundAverage, timeStats } from "../host/stats";
import { ValidationError } from "../errors";
import { createLogger } from "../logger";
import { presentReviewCard, type ReviewCardInfo } from "./presenters";
import { defineAction, type RegisteredAction } from "./types";

const log = createLogger("StudyHandlers");

const DeckNameSchema = z.string().min(1, "deckName is required");
const CardIdSchema = z.object({ cardId: z.number().int() });
const LimitSchema = z.number().int().min(0);

export interface StudyOptionsResult {
  deckName: string;
  configId: number;
  configName: string;
  newCardsPerDay: number;
  reviewsPerDay: number;
  wasShared: boolean;
  createdNewConfig: boolean;
}

export interface ExtendLimitResult {
  deckName: string;
  additionalCardsAllowed: number;
  totalExtended: number;
  message: string;
}

export interface StudyForgottenResult {
  sourceDeck: string;
  filteredDeckName: string;
  filteredDeckId: number;
  days: number;
  cardsFound: number;
  message: string;
}

export type OperationOutcome<T> = { success: true; data: T } | { success: false; error: string };

function deckQuery(deckName: string): string {
  return `deck:"${deckName}"`;
}

function setStudyOptions(
  collection: Collection,
  deckName: string,
  newCardsPerDay: number | undefined,
  reviewsPerDay: number | undefined
): StudyOptionsResult {
  const deck = collection.decks.require(deckName);
  const { config, cloned } = collection.decks.setStudyLimits(deck, {
    newPerDay: newCardsPerDay,
    reviewsPerDay,
  });
  return {
    deckName,
    configId: config.id,
    configName: config.name,
    newCardsPerDay: config.new.perDay,
    reviewsPerDay: config.rev.perDay,
    wasShared: cloned,
    createdNewConfig: cloned,
  };
}

function extendNewCardLimit(
  collection: Collection,
  deckName: string,
  additionalCards: number
): ExtendLimitResult {
  const deck = collection.decks.require(deckName);
  if (additionalCards <= 0) {
    throw new ValidationError("additionalCards must be > 0");
  }
  const totalExtended = collection.decks.extendNewLimit(deck, additionalCards);
  return {
    deckName,
    additionalCardsAllowed: additionalCards,
    totalExtended,
    message: `Extended new card limit by ${additionalCards} cards for today`,
  };
}

function studyForgotten(
  collection: Collection,
  deckName: string,
  days: number,
  filteredDeckName = CUSTOM_STUDY_DECK_NAME
): StudyForgottenResult {
  const source = collection.decks.require(deckName);
  if (days <= 0) {
    throw new ValidationError("days must be > 0");
  }
  const cards = collection.forgottenCards(source, days);
  const deck = collection.buildFilteredDeck(
    filteredDeckName,
    `${deckQuery(source.name)} rated:${days}:1`,
    cards
  );
  const cardsFound = [...collection.store.cards.values()].filter((card) => card.did === deck.id).length;
  return {
    sourceDeck: deckName,
    filteredDeckName: deck.name,
    filteredDeckId: deck.id,
    days,
    cardsFound,
    message: `Created filtered deck with ${cardsFound} forgotten cards from last ${days} day(s)`,
  };
}

function attempt<T>(operation: string, run: () => T): OperationOutcome<T> {
  try {
    return { success: true, data: run() };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.warn(`Custom study operation ${operation} failed: ${message}`);
    return { success: false, error: message };
  }
}

function deckOrCurrent(collection: Collection, deckName: string | undefined): Deck {
  return deckName === undefined ? collection.decks.current() : collection.decks.require(deckName);
}

export const studyActions: RegisteredAction[] = [
  /**
   * Next card of the named deck (which becomes the current deck) or of the
   * current deck, with its answer buttons. Null when nothing is left today.
   */
  defineAction({
    name: "getNextReviewCard",
    params: z.object({ deckName: z.string().optional() }),
    // Selecting the deck changes the collection's current deck
    mutates: true,
    handler: ({ deckName }, ctx): ReviewCardInfo | null => {
      const collection = ctx.collection();
      const deck = deckOrCurrent(collection, deckName);
      collection.decks.select(deck.id);
      const card = collection.nextCard(deck);
      return card ? presentReviewCard(collection, card) : null;
    },
  }),

  defineAction({
    name: "answerCard",
    params: z.object({
      cardId: z.number().int(),
      ease: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)], {
        errorMap: () => ({ message: "Invalid ease value. Must be between 1-4" }),
      }),
      timeTakenSeconds: z.number().min(0).optional(),
    }),
    mutates: true,
    handler: ({ cardId, ease, timeTakenSeconds }, ctx) => {
      ctx.collection().answer(cardId, ease, (timeTakenSeconds ?? 0) * 1000);
      return true;
    },
  }),

  defineAction({
    name: "resetCard",
    params: CardIdSchema,
    mutates: true,
    handler: ({ cardId }, ctx) => {
      ctx.collection().forget([cardId]);
      return true;
    },
  }),

  defineAction({
    name: "forgetCard",
    params: CardIdSchema,
    mutates: true,
    handler: ({ cardId }, ctx) => {
      ctx.collection().forget([cardId]);
      return true;
    },
  }),

  defineAction({
    name: "getDueCards",
    params: z.object({ deckName: z.string().optional(), limit: z.number().int().min(0).default(10) }),
    handler: ({ deckName, limit }, ctx) => {
      const collection = ctx.collection();
      const scope = deckName === undefined ? "" : `${deckQuery(collection.decks.require(deckName).name)} `;
      const ids = collection.findCards(`${scope}is:due`);
      return limit > 0 ? ids.slice(0, limit) : ids;
    },
  }),

  defineAction({
    name: "getNewCards",
    params: z.object({ deckName: z.string().optional(), limit: z.number().int().min(0).default(10) }),
    handler: ({ deckName, limit }, ctx) => {
      const collection = ctx.collection();
      const scope = deckName === undefined ? "" : `${deckQuery(collection.decks.require(deckName).name)} `;
      const ids = collection.findCards(`${scope}is:new`);
      return limit > 0 ? ids.slice(0, limit) : ids;
    },
  }),

  /**
   * Raw queue counts of one deck (children excluded), or of every card
   * when no deck is named.
   */
  defineAction({
    name: "getStudyStats",
    params: z.object({ deckName: z.string().optional() }),
    handler: ({ deckName }, ctx) => {
      const collection = ctx.collection();
      const deckId = deckName === undefined ? null : collection.decks.require(deckName).id;
      const cards = [...collection.store.cards.values()].filter(
        (card) => deckId === null || card.did === deckId
      );
      const inDeck = new Set(cards.map((card) => card.id));
      const dayStart = collection.store.dayStart();
      const countQueue = (queue: CardQueue) => cards.filter((card) => card.queue === queue).length;

      return {
        deckName: deckName ?? "All Decks",
        newCount: countQueue(CardQueue.New),
        learningCount: countQueue(CardQueue.Learning),
        reviewCount: countQueue(CardQueue.Review),
        totalCards: cards.length,
        studiedToday: collection.store.revlog.filter(
          (entry) => entry.id > dayStart && inDeck.has(entry.cid)
        ).length,
      };
    },
  }),

  defineAction({
    name: "getDeckTimeStats",
    params: z.object({ deckName: z.string().optional(), period: StatsPeriodSchema.default("allTime") }),
    handler: ({ deckName, period }, ctx) => {
      const collection = ctx.collection();
      const deckIds =
        deckName === undefined
          ? null
          : new Set(collection.decks.familyIds(collection.decks.require(deckName)));
      return { deckName: deckName ?? "All Decks", ...timeStats(collection, deckIds, period) };
    },
  }),

  defineAction({
    name: "setDeckStudyOptions",
    params: z.object({
      deckName: DeckNameSchema,
      newCardsPerDay: LimitSchema.optional(),
      reviewsPerDay: LimitSchema.optional(),
    }),
    mutates: true,
    handler: ({ deckName, newCardsPerDay, reviewsPerDay }, ctx) =>
      setStudyOptions(ctx.collection(), deckName, newCardsPerDay, reviewsPerDay),
  }),

  defineAction({
    name: "extendNewCardLimit",
    params: z.object({ deckName: DeckNameSchema, additionalCards: z.number().int() }),
    mutates: true,
    handler: ({ deckName, additionalCards }, ctx) =>
      extendNewCardLimit(ctx.collection(), deckName, additionalCards),
  }),

  defineAction({
    name: "enableStudyForgotten",
    params: z.object({
      deckName: DeckNameSchema,
      days: z.number().int().default(1),
      filteredDeckName: z.string().min(1).optional(),
    }),
    mutates: true,
    handler: ({ deckName, days, filteredDeckName }, ctx) =>
      studyForgotten(ctx.collection(), deckName, days, filteredDeckName),
  }),

  /**
   * Runs each requested custom study operation independently and reports
   * the outcome of each.
   */
  defineAction({
    name: "createCustomStudy",
    params: z.object({
      deckName: DeckNameSchema,
      newCardsPerDay: z.number().int().optional(),
      reviewsPerDay: z.number().int().optional(),
      studyForgottenToday: z.boolean().default(false),
      extendNewLimit: z.number().int().optional(),
    }),
    mutates: true,
    handler: ({ deckName, newCardsPerDay, reviewsPerDay, studyForgottenToday, extendNewLimit }, ctx) => {
      const collection = ctx.collection();
      const operations: {
        studyOptions?: OperationOutcome<StudyOptionsResult>;
        extendNewLimit?: OperationOutcome<ExtendLimitResult>;
        studyForgotten?: OperationOutcome<StudyForgottenResult>;
      } = {};

      if (newCardsPerDay !== undefined || reviewsPerDay !== undefined) {
        operations.studyOptions = attempt("studyOptions", () => {
          if ((newCardsPerDay ?? 0) < 0 || (reviewsPerDay ?? 0) < 0) {
            throw new ValidationError("Study limits must be >= 0");
          }
          return setStudyOptions(collection, deckName, newCardsPerDay, reviewsPerDay);
        });
      }
      if (extendNewLimit !== undefined) {
        operations.extendNewLimit = attempt("extendNewLimit", () =>
          extendNewCardLimit(collection, deckName, extendNewLimit)
        );
      }
      if (studyForgottenToday) {
        operations.studyForgotten = attempt("studyForgotten", () =>
          studyForgotten(collection, deckName, 1)
        );
      }
      return { deckName, operations };
    },
  }),

  defineAction({
    name: "getDeckReviewsByDay",
    params: z.object({ deckName: DeckNameSchema, days: z.number().int().min(1).default(14) }),
    handler: ({ deckName, days }, ctx) => {
      const collection = ctx.collection();
      const deck = collection.decks.require(deckName);
      const stats = reviewsByDay(collection, deck, days);
      const totalReviews = stats.reduce((sum, day) => sum + day.total, 0);
      return {
        deckName,
        days,
        stats,
        totalReviews,
        averagePerDay: roundAverage(totalReviews, days),
        newCardsAvailable: newCardsAvailable(collection, deck),
      };
    },
  }),
];

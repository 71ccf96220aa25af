/**
 * Card Handlers
 *
 * Card queries, suspension, due state, intervals and flags.
 */

import { z } from "zod";
import { CardQueue, CardType } from "../host/types";
import { presentCard, type CardInfo, type Missing } from "./presenters";
import { defineAction, type RegisteredAction } from "./types";

const IdListSchema = z.array(z.number().int());
const CardIdSchema = z.object({ cardId: z.number().int() });

export const cardActions: RegisteredAction[] = [
  defineAction({
    name: "findCards",
    params: z.object({ query: z.string().default("") }),
    handler: ({ query }, ctx) => ctx.collection().findCards(query),
  }),

  defineAction({
    name: "cardsInfo",
    params: z.object({ cards: IdListSchema }),
    handler: ({ cards }, ctx): Array<CardInfo | Missing> => {
      const collection = ctx.collection();
      return cards.map((cid) => {
        const card = collection.getCard(cid);
        return card ? presentCard(collection, card) : {};
      });
    },
  }),

  defineAction({
    name: "suspend",
    params: z.object({ cards: IdListSchema }),
    mutates: true,
    handler: ({ cards }, ctx) => ctx.collection().setSuspended(cards, true),
  }),

  defineAction({
    name: "unsuspend",
    params: z.object({ cards: IdListSchema }),
    mutates: true,
    handler: ({ cards }, ctx) => ctx.collection().setSuspended(cards, false),
  }),

  /** null for unknown ids */
  defineAction({
    name: "areSuspended",
    params: z.object({ cards: IdListSchema }),
    handler: ({ cards }, ctx) => {
      const collection = ctx.collection();
      return cards.map((cid) => {
        const card = collection.getCard(cid);
        return card ? card.queue === CardQueue.Suspended : null;
      });
    },
  }),

  defineAction({
    name: "areDue",
    params: z.object({ cards: IdListSchema }),
    handler: ({ cards }, ctx) => {
      const collection = ctx.collection();
      return cards.map((cid) => collection.isCardDue(cid));
    },
  }),

  /**
   * Last logged interval per card, or every logged interval with
   * `complete`. New cards report 0.
   */
  defineAction({
    name: "getIntervals",
    params: z.object({ cards: IdListSchema, complete: z.boolean().default(false) }),
    handler: ({ cards, complete }, ctx) => {
      const collection = ctx.collection();
      return cards.map((cid): number | number[] => {
        const card = collection.requireCard(cid);
        if (card.type === CardType.New) {
          return 0;
        }
        const intervals = collection.revlogOf(cid).map((entry) => entry.ivl);
        if (complete) {
          return intervals;
        }
        return intervals[intervals.length - 1] ?? card.ivl;
      });
    },
  }),

  defineAction({
    name: "flagCard",
    params: CardIdSchema,
    mutates: true,
    handler: ({ cardId }, ctx) => {
      ctx.collection().setFlag(cardId, 1);
      return true;
    },
  }),

  defineAction({
    name: "unflagCard",
    params: CardIdSchema,
    mutates: true,
    handler: ({ cardId }, ctx) => {
      ctx.collection().setFlag(cardId, 0);
      return true;
    },
  }),

  defineAction({
    name: "isCardFlagged",
    params: CardIdSchema,
    handler: ({ cardId }, ctx) => ctx.collection().requireCard(cardId).flags > 0,
  }),
];

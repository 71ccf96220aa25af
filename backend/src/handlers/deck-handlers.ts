/**
 * Deck Handlers
 *
 * Deck records, card placement and option groups.
 */

import { z } from "zod";
import { DeckConfigSchema, StatsPeriodSchema, type StatsPeriod } from "@deckbridge/shared";
import type { Collection } from "../host/collection";
import type { Deck } from "../host/collection-schema";
import { DECK_SEPARATOR } from "../host/decks";
import { DEFAULT_CONFIG_ID } from "../host/store";
import { timeStats, type TimeStats } from "../host/stats";
import { defineAction, type RegisteredAction } from "./types";

const DeckNameSchema = z.string().min(1, "deckName is required");
const IdListSchema = z.array(z.number().int());

export interface DeckInfo {
  id: number;
  name: string;
  newCount: number;
  learningCount: number;
  reviewCount: number;
  totalCards: number;
  isFiltered: boolean;
  timeStats?: TimeStats;
}

function deckInfo(
  collection: Collection,
  deck: Deck,
  stats: { includeTimeStats: boolean; period: StatsPeriod }
): DeckInfo {
  const family = new Set(collection.decks.familyIds(deck));
  let totalCards = 0;
  for (const card of collection.store.cards.values()) {
    if (family.has(card.did)) {
      totalCards += 1;
    }
  }

  const info: DeckInfo = {
    id: deck.id,
    name: deck.name,
    ...collection.queueCounts(deck),
    totalCards,
    isFiltered: deck.dyn,
  };
  if (stats.includeTimeStats) {
    info.timeStats = timeStats(collection, new Set([deck.id]), stats.period);
  }
  return info;
}

export const deckActions: RegisteredAction[] = [
  defineAction({
    name: "deckNames",
    params: z.object({}).passthrough(),
    handler: (_params, ctx) => ctx.collection().decks.allNames(),
  }),

  defineAction({
    name: "deckNamesAndIds",
    params: z.object({}).passthrough(),
    handler: (_params, ctx) => {
      const result: Record<string, number> = {};
      for (const deck of ctx.collection().decks.all()) {
        result[deck.name] = deck.id;
      }
      return result;
    },
  }),

  defineAction({
    name: "createDeck",
    params: z.object({ deckName: DeckNameSchema }),
    mutates: true,
    handler: ({ deckName }, ctx) => ctx.collection().decks.create(deckName),
  }),

  defineAction({
    name: "deleteDeck",
    params: z.object({ deckName: DeckNameSchema, deleteCards: z.boolean().default(false) }),
    mutates: true,
    handler: ({ deckName, deleteCards }, ctx) => {
      const collection = ctx.collection();
      collection.removeDecks([collection.decks.require(deckName)], deleteCards);
      return true;
    },
  }),

  /** Unknown names are skipped. */
  defineAction({
    name: "deleteDecks",
    params: z.object({ decks: z.array(z.string()), cardsToo: z.boolean().default(false) }),
    mutates: true,
    handler: ({ decks, cardsToo }, ctx) => {
      const collection = ctx.collection();
      const found = decks
        .map((name) => collection.decks.byName(name))
        .filter((deck): deck is Deck => deck !== undefined);
      collection.removeDecks(found, cardsToo);
      return null;
    },
  }),

  defineAction({
    name: "renameDeck",
    params: z.object({ oldName: DeckNameSchema, newName: DeckNameSchema }),
    mutates: true,
    handler: ({ oldName, newName }, ctx) => {
      ctx.collection().decks.rename(oldName, newName);
      return true;
    },
  }),

  defineAction({
    name: "getDecks",
    params: z.object({ cards: IdListSchema }),
    handler: ({ cards }, ctx) => {
      const collection = ctx.collection();
      const result: Record<string, number[]> = {};
      for (const cid of cards) {
        const card = collection.getCard(cid);
        const name = card ? collection.decks.nameOf(card.did) : undefined;
        if (name === undefined) {
          continue;
        }
        (result[name] ??= []).push(cid);
      }
      return result;
    },
  }),

  defineAction({
    name: "changeDeck",
    params: z.object({ cards: IdListSchema, deck: DeckNameSchema }),
    mutates: true,
    handler: ({ cards, deck }, ctx) => {
      ctx.collection().changeDeck(cards, deck);
      return null;
    },
  }),

  defineAction({
    name: "getDeckConfig",
    params: z.object({ deck: z.string() }),
    handler: ({ deck }, ctx) => {
      const decks = ctx.collection().decks;
      const found = decks.byName(deck);
      return found ? decks.configFor(found) : false;
    },
  }),

  defineAction({
    name: "saveDeckConfig",
    params: z.object({ config: DeckConfigSchema }),
    mutates: true,
    handler: ({ config }, ctx) => ctx.collection().decks.saveConfig(config),
  }),

  defineAction({
    name: "setDeckConfigId",
    params: z.object({ decks: z.array(z.string()), configId: z.number().int() }),
    mutates: true,
    handler: ({ decks, configId }, ctx) => ctx.collection().decks.setConfigId(decks, configId),
  }),

  defineAction({
    name: "cloneDeckConfigId",
    params: z.object({
      name: z.string().min(1, "name is required"),
      cloneFrom: z.number().int().default(DEFAULT_CONFIG_ID),
    }),
    mutates: true,
    handler: ({ name, cloneFrom }, ctx) => ctx.collection().decks.cloneConfig(name, cloneFrom),
  }),

  defineAction({
    name: "removeDeckConfigId",
    params: z.object({ configId: z.number().int() }),
    mutates: true,
    handler: ({ configId }, ctx) => ctx.collection().decks.removeConfig(configId),
  }),

  /**
   * Stats of the deck's descendants (names relative to the deck) when it has
   * any, otherwise of the deck itself. Null for an unknown deck.
   */
  defineAction({
    name: "getDeckInfo",
    params: z.object({
      deckName: DeckNameSchema,
      includeTimeStats: z.boolean().default(true),
      period: StatsPeriodSchema.default("allTime"),
      wantSingleDeckStats: z.boolean().default(false),
    }),
    handler: ({ deckName, includeTimeStats, period, wantSingleDeckStats }, ctx) => {
      const collection = ctx.collection();
      const deck = collection.decks.byName(deckName);
      if (!deck) {
        return null;
      }
      const options = { includeTimeStats, period };
      const descendants = wantSingleDeckStats ? [] : collection.decks.descendants(deck);
      if (descendants.length === 0) {
        return [deckInfo(collection, deck, options)];
      }
      const prefix = deck.name + DECK_SEPARATOR;
      return descendants.map((child) => ({
        ...deckInfo(collection, child, options),
        name: child.name.slice(prefix.length),
      }));
    },
  }),
];

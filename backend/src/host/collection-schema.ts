/**
 * Collection Schema
 *
 * Zod schemas and TypeScript types for the records of the reference host
 * collection. The whole collection is persisted as one JSON document per
 * profile and validated against CollectionDataSchema when loaded.
 */

import { z } from "zod";
import { DeckConfigSchema } from "@deckbridge/shared";
import { CardQueue, CardType, ReviewKind } from "./types";

// =============================================================================
// Record Schemas
// =============================================================================

export const DeckSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  /** Options group id (normal decks only) */
  conf: z.number().int().default(1),
  /** Filtered (dynamic) deck */
  dyn: z.boolean().default(false),
  /** Extra new cards allowed on `extendNewDay` */
  extendNew: z.number().int().min(0).default(0),
  extendNewDay: z.number().int().default(0),
  /** Search that filled a filtered deck */
  search: z.string().optional(),
  mod: z.number().int().default(0),
});

export const ModelFieldSchema = z.object({
  name: z.string().min(1),
  ord: z.number().int().min(0),
});

export const ModelTemplateRecordSchema = z.object({
  name: z.string().min(1),
  ord: z.number().int().min(0),
  qfmt: z.string(),
  afmt: z.string(),
});

export const ModelSchema = z.object({
  id: z.number().int(),
  name: z.string().min(1),
  fields: z.array(ModelFieldSchema),
  templates: z.array(ModelTemplateRecordSchema),
  css: z.string().default(""),
  mod: z.number().int().default(0),
});

export const NoteSchema = z.object({
  id: z.number().int(),
  /** Model id */
  mid: z.number().int(),
  /** Values stored positionally, matching the model's field order */
  fields: z.array(z.string()),
  tags: z.array(z.string()).default([]),
  mod: z.number().int().default(0),
});

export const CardSchema = z.object({
  id: z.number().int(),
  nid: z.number().int(),
  did: z.number().int(),
  /** Home deck while the card sits in a filtered deck, else 0 */
  odid: z.number().int().default(0),
  /** Template ordinal */
  ord: z.number().int().min(0),
  type: z.nativeEnum(CardType),
  queue: z.nativeEnum(CardQueue),
  /** New cards: position. Learning and review cards: day number */
  due: z.number().int(),
  /** Interval in days */
  ivl: z.number().int().min(0).default(0),
  /** Ease factor in permille (2500 = 250%) */
  factor: z.number().int().default(0),
  /** Total reviews */
  reps: z.number().int().min(0).default(0),
  /** Consecutive successful reviews, reset by Again */
  streak: z.number().int().min(0).default(0),
  lapses: z.number().int().min(0).default(0),
  flags: z.number().int().min(0).max(7).default(0),
  mod: z.number().int().default(0),
});

export const ReviewLogEntrySchema = z.object({
  /** Review timestamp in ms, unique */
  id: z.number().int(),
  cid: z.number().int(),
  ease: z.number().int().min(1).max(4),
  ivl: z.number().int(),
  lastIvl: z.number().int(),
  factor: z.number().int(),
  /** Time taken in ms */
  time: z.number().int().min(0),
  type: z.nativeEnum(ReviewKind),
});

export const CollectionDataSchema = z.object({
  version: z.literal(1),
  /** Next position handed to a new card */
  nextPos: z.number().int().min(0),
  usn: z.number().int(),
  /** Deck studied when no deck is named */
  currentDeck: z.number().int().default(1),
  decks: z.array(DeckSchema),
  deckConfigs: z.array(DeckConfigSchema),
  models: z.array(ModelSchema),
  notes: z.array(NoteSchema),
  cards: z.array(CardSchema),
  revlog: z.array(ReviewLogEntrySchema),
});

// =============================================================================
// TypeScript Types
// =============================================================================

export type Deck = z.infer<typeof DeckSchema>;
export type ModelField = z.infer<typeof ModelFieldSchema>;
export type ModelTemplateRecord = z.infer<typeof ModelTemplateRecordSchema>;
export type Model = z.infer<typeof ModelSchema>;
export type Note = z.infer<typeof NoteSchema>;
export type Card = z.infer<typeof CardSchema>;
export type ReviewLogEntry = z.infer<typeof ReviewLogEntrySchema>;
export type CollectionData = z.infer<typeof CollectionDataSchema>;
export type { DeckConfig } from "@deckbridge/shared";

/**
 * Safely parse a persisted collection document.
 */
export function safeParseCollectionData(data: unknown) {
  return CollectionDataSchema.safeParse(data);
}

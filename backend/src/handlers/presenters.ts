/**
 * JSON shapes returned for cards and notes.
 */

import type { AnswerButton, FieldValue } from "@deckbridge/shared";
import type { Collection } from "../host/collection";
import type { Card, Note } from "../host/collection-schema";
import { answerButtons } from "../host/scheduler";

export interface CardInfo {
  cardId: number;
  fields: Record<string, FieldValue>;
  fieldOrder: number;
  question: string;
  answer: string;
  modelName: string;
  deckName: string;
  css: string;
  /** Ease in permille: 2500 is 250% */
  factor: number;
  interval: number;
  note: number;
  flagged: boolean;
}

export interface ReviewCardInfo extends Omit<CardInfo, "note"> {
  templateName: string;
  due: number;
  queue: number;
  type: number;
  noteId: number;
  buttons: AnswerButton[];
}

export interface NoteInfo {
  noteId: number;
  tags: string[];
  fields: Record<string, FieldValue>;
  modelName: string;
  cards: number[];
}

/** Placeholder keeping result lists aligned with requested ids */
export type Missing = Record<string, never>;

export function presentCard(collection: Collection, card: Card): CardInfo {
  const note = collection.requireNote(card.nid);
  const model = collection.modelOf(note);
  const { question, answer } = collection.render(card);
  return {
    cardId: card.id,
    fields: collection.fieldValues(note),
    fieldOrder: card.ord,
    question,
    answer,
    modelName: model.name,
    deckName: collection.decks.nameOf(card.did) ?? "",
    css: model.css,
    factor: card.factor,
    interval: card.ivl,
    note: card.nid,
    flagged: card.flags > 0,
  };
}

export function presentReviewCard(collection: Collection, card: Card): ReviewCardInfo {
  const { note, ...info } = presentCard(collection, card);
  const model = collection.modelOf(collection.requireNote(card.nid));
  return {
    ...info,
    templateName: model.templates[card.ord]?.name ?? "",
    due: card.due,
    queue: card.queue,
    type: card.type,
    noteId: note,
    buttons: answerButtons(card),
  };
}

export function presentNote(collection: Collection, note: Note): NoteInfo {
  return {
    noteId: note.id,
    tags: [...note.tags],
    fields: collection.fieldValues(note),
    modelName: collection.modelOf(note).name,
    cards: collection.cardsOfNote(note.id).map((card) => card.id),
  };
}

/**
 * Search
 *
 * Query language for findCards / findNotes. Terms are separated by
 * whitespace and must all match; `-` negates a term; double quotes group
 * text containing spaces.
 *
 *   deck:Name      deck and its children, `*` wildcard
 *   note:Name      note type name
 *   tag:name       tag (or a child tag `name::x`)
 *   is:new|learn|review|due|suspended
 *   flag:N         flag number 0-7
 *   cid:1,2 nid:1,2
 *   rated:N[:ease] answered within the last N days
 *   Field:value    whole field value, `*` wildcard
 *   text           substring of any field
 *
 * Text comparisons ignore case.
 */

import type { Card, Note } from "./collection-schema";
import type { DeckManager } from "./decks";
import type { ModelManager } from "./models";
import type { CollectionStore } from "./store";
import { isDue } from "./scheduler";
import { CardQueue, CardType, DAY_MS } from "./types";
import { ValidationError } from "../errors";

// =============================================================================
// Parsing
// =============================================================================

export interface SearchTerm {
  negated: boolean;
  /** Lower-cased key before the first colon, when there is one */
  key?: string;
  value: string;
}

/**
 * Splits a query into raw tokens, honoring double quotes and a leading `-`.
 */
export function tokenize(query: string): Array<{ negated: boolean; text: string }> {
  const tokens: Array<{ negated: boolean; text: string }> = [];
  let text = "";
  let negated = false;
  let inQuotes = false;
  let started = false;

  const flush = () => {
    if (started) {
      tokens.push({ negated, text });
    }
    text = "";
    negated = false;
    started = false;
  };

  for (const char of query) {
    if (char === '"') {
      inQuotes = !inQuotes;
      started = true;
    } else if (!inQuotes && /\s/.test(char)) {
      flush();
    } else if (!inQuotes && char === "-" && !started && !negated) {
      negated = true;
    } else {
      text += char;
      started = true;
    }
  }
  flush();

  return tokens;
}

export function parseQuery(query: string): SearchTerm[] {
  return tokenize(query).map(({ negated, text }) => {
    const colon = text.indexOf(":");
    if (colon > 0) {
      return {
        negated,
        key: text.slice(0, colon).toLowerCase(),
        value: text.slice(colon + 1),
      };
    }
    return { negated, value: text };
  });
}

/**
 * Case-insensitive pattern with `*` matching any run of characters.
 */
export function globToRegExp(pattern: string, anchored = true): RegExp {
  const body = pattern
    .split("*")
    .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(anchored ? `^${body}$` : body, "is");
}

function parseIdList(key: string, value: string): Set<number> {
  const ids = value.split(",").map((part) => part.trim());
  if (ids.some((id) => !/^\d+$/.test(id))) {
    throw new ValidationError(`Invalid ${key}: list "${value}"`);
  }
  return new Set(ids.map(Number));
}

// =============================================================================
// Matching
// =============================================================================

export interface SearchContext {
  store: CollectionStore;
  decks: DeckManager;
  models: ModelManager;
}

type CardPredicate = (card: Card, note: Note) => boolean;

function deckPredicate(ctx: SearchContext, value: string): CardPredicate {
  if (value === "*") {
    return () => true;
  }
  const pattern = globToRegExp(value);
  const ids = new Set<number>();
  for (const deck of ctx.decks.all()) {
    if (pattern.test(deck.name)) {
      for (const id of ctx.decks.familyIds(deck)) {
        ids.add(id);
      }
    }
  }
  return (card) => ids.has(card.did) || ids.has(card.odid);
}

function isPredicate(ctx: SearchContext, value: string): CardPredicate {
  switch (value.toLowerCase()) {
    case "new":
      return (card) => card.type === CardType.New;
    case "learn":
      return (card) => card.queue === CardQueue.Learning;
    case "review":
      return (card) => card.type === CardType.Review || card.type === CardType.Relearning;
    case "due": {
      const today = ctx.store.today();
      return (card) => isDue(card, today);
    }
    case "suspended":
      return (card) => card.queue === CardQueue.Suspended;
    default:
      throw new ValidationError(`Unknown search term: is:${value}`);
  }
}

function ratedPredicate(ctx: SearchContext, value: string): CardPredicate {
  const match = /^(\d+)(?::([1-4]))?$/.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid rated: term "${value}"`);
  }
  const days = Math.max(1, Number(match[1]));
  const ease = match[2] === undefined ? undefined : Number(match[2]);
  const cutoff = ctx.store.dayStart() - (days - 1) * DAY_MS;

  const cids = new Set<number>();
  for (const entry of ctx.store.revlog) {
    if (entry.id >= cutoff && (ease === undefined || entry.ease === ease)) {
      cids.add(entry.cid);
    }
  }
  return (card) => cids.has(card.id);
}

function fieldPredicate(ctx: SearchContext, name: string, value: string): CardPredicate {
  const pattern = globToRegExp(value);
  const wanted = name.toLowerCase();
  return (_card, note) => {
    const model = ctx.models.get(note.mid);
    const index = model?.fields.findIndex((field) => field.name.toLowerCase() === wanted) ?? -1;
    return index !== -1 && pattern.test(note.fields[index] ?? "");
  };
}

function termPredicate(ctx: SearchContext, term: SearchTerm): CardPredicate {
  const { key, value } = term;

  switch (key) {
    case undefined: {
      const pattern = globToRegExp(value, false);
      return (_card, note) => note.fields.some((field) => pattern.test(field));
    }
    case "deck":
      return deckPredicate(ctx, value);
    case "note": {
      const pattern = globToRegExp(value);
      return (_card, note) => pattern.test(ctx.models.get(note.mid)?.name ?? "");
    }
    case "tag": {
      const pattern = globToRegExp(value);
      const childPrefix = `${value.toLowerCase()}::`;
      return (_card, note) =>
        note.tags.some((tag) => pattern.test(tag) || tag.toLowerCase().startsWith(childPrefix));
    }
    case "is":
      return isPredicate(ctx, value);
    case "flag": {
      if (!/^[0-7]$/.test(value)) {
        throw new ValidationError(`Invalid flag: term "${value}"`);
      }
      const flag = Number(value);
      return (card) => card.flags === flag;
    }
    case "cid": {
      const ids = parseIdList(key, value);
      return (card) => ids.has(card.id);
    }
    case "nid": {
      const ids = parseIdList(key, value);
      return (card) => ids.has(card.nid);
    }
    case "rated":
      return ratedPredicate(ctx, value);
    default:
      return fieldPredicate(ctx, key, value);
  }
}

/**
 * Compiles a query into a card predicate. An empty query matches every card.
 *
 * @throws ValidationError for malformed terms
 */
export function compileQuery(ctx: SearchContext, query: string): (card: Card) => boolean {
  const predicates = parseQuery(query).map((term) => {
    const predicate = termPredicate(ctx, term);
    return term.negated ? (card: Card, note: Note) => !predicate(card, note) : predicate;
  });

  return (card) => {
    const note = ctx.store.notes.get(card.nid);
    if (!note) {
      return false;
    }
    return predicates.every((predicate) => predicate(card, note));
  };
}

/**
 * Ids of matching cards, ascending.
 */
export function findCards(ctx: SearchContext, query: string): number[] {
  const matches = compileQuery(ctx, query);
  return [...ctx.store.cards.values()]
    .filter(matches)
    .map((card) => card.id)
    .sort((a, b) => a - b);
}

/**
 * Distinct ids of notes with at least one matching card, ascending.
 */
export function findNotes(ctx: SearchContext, query: string): number[] {
  const matches = compileQuery(ctx, query);
  const nids = new Set<number>();
  for (const card of ctx.store.cards.values()) {
    if (matches(card)) {
      nids.add(card.nid);
    }
  }
  return [...nids].sort((a, b) => a - b);
}

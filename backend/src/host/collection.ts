/**
 * Collection
 *
 * Facade over one profile's collection: decks, models, notes, cards, the
 * review log and the scheduler. Action handlers work through this class;
 * persistence lives in collection-storage.ts.
 *
 * All methods run synchronously against in-memory state and mark the store
 * dirty when they change something.
 */

import type { Ease, FieldValue } from "@deckbridge/shared";
import type { Card, CollectionData, Deck, Model, Note, ReviewLogEntry } from "./collection-schema";
import { DeckManager } from "./decks";
import { ModelManager } from "./models";
import { hasQuestion, renderCard, type FieldMap, type RenderedCard } from "./render";
import { answerCard, forgetCard, isDue } from "./scheduler";
import { findCards, findNotes, type SearchContext } from "./search";
import { CollectionStore, DEFAULT_DECK_ID, emptyCollectionData } from "./store";
import { CardQueue, CardType, DAY_MS, ReviewKind, systemClock, type Clock } from "./types";
import { ConflictError, NotFoundError, ValidationError } from "../errors";

export const CUSTOM_STUDY_DECK_NAME = "Custom Study Session";

/**
 * A note built from caller input but not yet added.
 */
export interface NoteDraft {
  model: Model;
  fields: string[];
  tags: string[];
}

/**
 * Daily queue counts of a deck after applying its limits.
 */
export interface QueueCounts {
  newCount: number;
  learningCount: number;
  reviewCount: number;
}

function splitTags(tags: string): string[] {
  return tags.split(/\s+/).filter((tag) => tag.length > 0);
}

function stripHtml(value: string): string {
  return value.replace(/<[^>]*>/g, "").trim();
}

export class Collection {
  readonly store: CollectionStore;
  readonly decks: DeckManager;
  readonly models: ModelManager;

  constructor(data: CollectionData, clock: Clock = systemClock) {
    this.store = new CollectionStore(data, clock);
    this.decks = new DeckManager(this.store);
    this.models = new ModelManager(this.store);
  }

  /**
   * A fresh collection with the Default deck and the Basic note types.
   */
  static create(clock: Clock = systemClock): Collection {
    const collection = new Collection(emptyCollectionData(clock), clock);
    collection.store.markChanged();
    return collection;
  }

  toData(): CollectionData {
    return this.store.toData();
  }

  isDirty(): boolean {
    return this.store.isDirty();
  }

  markSaved(): void {
    this.store.markSaved();
  }

  // ===========================================================================
  // Lookup & search
  // ===========================================================================

  private get searchContext(): SearchContext {
    return { store: this.store, decks: this.decks, models: this.models };
  }

  findCards(query: string): number[] {
    return findCards(this.searchContext, query);
  }

  findNotes(query: string): number[] {
    return findNotes(this.searchContext, query);
  }

  getCard(id: number): Card | undefined {
    return this.store.cards.get(id);
  }

  /**
   * @throws NotFoundError
   */
  requireCard(id: number): Card {
    const card = this.getCard(id);
    if (!card) {
      throw new NotFoundError(`Card with ID '${id}' does not exist`);
    }
    return card;
  }

  getNote(id: number): Note | undefined {
    return this.store.notes.get(id);
  }

  /**
   * @throws NotFoundError
   */
  requireNote(id: number): Note {
    const note = this.getNote(id);
    if (!note) {
      throw new NotFoundError(`Failed to get note:${id}`);
    }
    return note;
  }

  modelOf(note: Note): Model {
    return this.models.require(note.mid);
  }

  cardsOfNote(nid: number): Card[] {
    return this.store.cardsOfNote(nid);
  }

  /** Field name to value */
  fieldMap(note: Note): FieldMap {
    const map: FieldMap = {};
    for (const field of this.modelOf(note).fields) {
      map[field.name] = note.fields[field.ord] ?? "";
    }
    return map;
  }

  /** Field name to value and position */
  fieldValues(note: Note): Record<string, FieldValue> {
    const values: Record<string, FieldValue> = {};
    for (const field of this.modelOf(note).fields) {
      values[field.name] = { value: note.fields[field.ord] ?? "", order: field.ord };
    }
    return values;
  }

  render(card: Card): RenderedCard {
    const note = this.requireNote(card.nid);
    const model = this.modelOf(note);
    const template = model.templates[card.ord];
    if (!template) {
      return { question: "", answer: "" };
    }
    return renderCard(template.qfmt, template.afmt, this.fieldMap(note));
  }

  // ===========================================================================
  // Notes
  // ===========================================================================

  /**
   * Builds a note for `model`. Values for names the model lacks are ignored.
   */
  newNote(model: Model, values: Record<string, string>, tags: readonly string[] = []): NoteDraft {
    const fields = model.fields.map((field) => values[field.name] ?? "");
    return { model, fields, tags: [...tags] };
  }

  /**
   * @throws ValidationError when the first field is empty
   */
  assertNotEmpty(draft: NoteDraft): void {
    if (stripHtml(draft.fields[0] ?? "").length === 0) {
      throw new ValidationError("cannot create note because it is empty");
    }
  }

  /**
   * True when another note of the same model has the same first field.
   */
  isDuplicate(draft: NoteDraft): boolean {
    const first = stripHtml(draft.fields[0] ?? "");
    return this.store
      .notesOfModel(draft.model.id)
      .some((note) => stripHtml(note.fields[0] ?? "") === first);
  }

  /**
   * Adds a note and one card per template whose question is not empty.
   *
   * @throws ValidationError when the first field is empty or no card would
   *   be generated
   */
  addNote(draft: NoteDraft, deckId: number): Note {
    this.assertNotEmpty(draft);
    const deck = this.decks.get(deckId);
    if (!deck) {
      throw new NotFoundError(`Deck with ID '${deckId}' does not exist`);
    }
    if (deck.dyn) {
      throw new ValidationError(`Cannot add notes to filtered deck '${deck.name}'`);
    }

    const map: FieldMap = {};
    draft.model.fields.forEach((field, index) => {
      map[field.name] = draft.fields[index] ?? "";
    });
    const ords = draft.model.templates
      .filter((template) => hasQuestion(template.qfmt, map))
      .map((template) => template.ord);
    if (ords.length === 0) {
      throw new ValidationError("cannot create note because no cards would be generated");
    }

    const note: Note = {
      id: this.store.newId(),
      mid: draft.model.id,
      fields: [...draft.fields],
      tags: [...new Set(draft.tags)],
      mod: this.store.intTime(),
    };
    this.store.notes.set(note.id, note);
    for (const ord of ords) {
      this.store.addCard(note.id, deckId, ord);
    }
    this.store.markChanged();
    return note;
  }

  /**
   * Sets the named fields of a note; names the model lacks are ignored.
   */
  updateNoteFields(id: number, values: Record<string, string>): void {
    const note = this.requireNote(id);
    for (const field of this.modelOf(note).fields) {
      const value = values[field.name];
      if (value !== undefined) {
        note.fields[field.ord] = value;
      }
    }
    note.mod = this.store.intTime();
    this.store.markChanged();
  }

  /**
   * Deletes notes with all their cards. Unknown ids are skipped.
   */
  removeNotes(nids: readonly number[]): void {
    const doomed = new Set(nids);
    const cardIds = [...this.store.cards.values()]
      .filter((card) => doomed.has(card.nid))
      .map((card) => card.id);
    this.store.removeCards(cardIds);
    for (const nid of doomed) {
      this.store.notes.delete(nid);
    }
    this.store.markChanged();
  }

  /**
   * Adds or removes space-separated tags on each note.
   */
  updateTags(nids: readonly number[], tags: string, add: boolean): void {
    const names = splitTags(tags);
    const lowered = new Set(names.map((tag) => tag.toLowerCase()));
    const mod = this.store.intTime();
    for (const nid of nids) {
      const note = this.getNote(nid);
      if (!note) {
        continue;
      }
      if (add) {
        const present = new Set(note.tags.map((tag) => tag.toLowerCase()));
        for (const tag of names) {
          if (!present.has(tag.toLowerCase())) {
            note.tags.push(tag);
            present.add(tag.toLowerCase());
          }
        }
      } else {
        note.tags = note.tags.filter((tag) => !lowered.has(tag.toLowerCase()));
      }
      note.mod = mod;
    }
    this.store.markChanged();
  }

  /** Every tag in use, sorted */
  allTags(): string[] {
    const tags = new Set<string>();
    for (const note of this.store.notes.values()) {
      for (const tag of note.tags) {
        tags.add(tag);
      }
    }
    return [...tags].sort((a, b) => a.localeCompare(b));
  }

  /** Distinct note ids of the given cards, ascending */
  cardsToNotes(cids: readonly number[]): number[] {
    const nids = new Set<number>();
    for (const cid of cids) {
      const card = this.getCard(cid);
      if (card) {
        nids.add(card.nid);
      }
    }
    return [...nids].sort((a, b) => a - b);
  }

  // ===========================================================================
  // Cards
  // ===========================================================================

  /**
   * Sends cards in filtered decks back to their home deck.
   */
  removeFromFiltered(cids: readonly number[]): void {
    for (const cid of cids) {
      const card = this.getCard(cid);
      if (card && card.odid !== 0) {
        card.did = card.odid;
        card.odid = 0;
        card.mod = this.store.intTime();
        this.store.markChanged();
      }
    }
  }

  /**
   * Moves cards into the named deck, creating it when missing.
   */
  changeDeck(cids: readonly number[], deckName: string): void {
    const existing = this.decks.byName(deckName);
    if (existing?.dyn) {
      throw new ValidationError(`Cannot move cards into filtered deck '${existing.name}'`);
    }
    const did = this.decks.id(deckName);
    this.removeFromFiltered(cids);
    const mod = this.store.intTime();
    for (const cid of cids) {
      const card = this.getCard(cid);
      if (card) {
        card.did = did;
        card.mod = mod;
      }
    }
    this.store.markChanged();
  }

  /**
   * Suspends or unsuspends cards.
   *
   * @returns true when at least one card changed state
   */
  setSuspended(cids: readonly number[], suspended: boolean): boolean {
    let changed = false;
    const mod = this.store.intTime();
    for (const cid of cids) {
      const card = this.getCard(cid);
      if (!card || (card.queue === CardQueue.Suspended) === suspended) {
        continue;
      }
      card.queue = suspended ? CardQueue.Suspended : queueForType(card.type);
      card.mod = mod;
      changed = true;
    }
    if (changed) {
      this.store.markChanged();
    }
    return changed;
  }

  setFlag(cid: number, flag: number): void {
    const card = this.requireCard(cid);
    card.flags = flag;
    card.mod = this.store.intTime();
    this.store.markChanged();
  }

  /**
   * Answers a card and logs the review with `timeMs` as time taken.
   */
  answer(cid: number, ease: Ease, timeMs = 0): ReviewLogEntry {
    const card = this.requireCard(cid);
    if (card.queue === CardQueue.Suspended) {
      throw new ValidationError(`Card with ID '${cid}' is suspended`);
    }
    const outcome = answerCard(card, ease, this.store.today());
    card.mod = this.store.intTime();

    const entry: ReviewLogEntry = {
      id: this.store.newId(),
      cid,
      ease,
      ivl: outcome.ivl,
      lastIvl: outcome.lastIvl,
      factor: outcome.factor,
      time: Math.max(0, Math.round(timeMs)),
      type: outcome.kind,
    };
    this.store.revlog.push(entry);
    this.store.markChanged();
    return entry;
  }

  /**
   * Resets cards to new, placing them at the end of the new queue.
   */
  forget(cids: readonly number[]): void {
    for (const cid of cids) {
      const card = this.requireCard(cid);
      forgetCard(card, this.store.nextPos++);
      card.mod = this.store.intTime();
    }
    this.store.markChanged();
  }

  revlogOf(cid: number): ReviewLogEntry[] {
    return this.store.revlog.filter((entry) => entry.cid === cid);
  }

  /**
   * New cards count as due; others by their due day.
   */
  isCardDue(cid: number): boolean {
    const card = this.requireCard(cid);
    return card.type === CardType.New || isDue(card, this.store.today());
  }

  // ===========================================================================
  // Decks
  // ===========================================================================

  /**
   * Deletes decks and their children. Cards of normal decks are deleted
   * with `cardsToo`, otherwise moved to the Default deck; cards of
   * filtered decks return home.
   *
   * @throws ConflictError when the Default deck is among them
   */
  removeDecks(decks: readonly Deck[], cardsToo: boolean): void {
    if (decks.some((deck) => deck.id === DEFAULT_DECK_ID)) {
      throw new ConflictError("The Default deck cannot be deleted");
    }

    const doomed = new Map<number, Deck>();
    for (const deck of decks) {
      doomed.set(deck.id, deck);
      for (const child of this.decks.descendants(deck)) {
        doomed.set(child.id, child);
      }
    }

    const toDelete: number[] = [];
    for (const card of this.store.cards.values()) {
      const current = doomed.get(card.did);
      if (current?.dyn) {
        card.did = card.odid;
        card.odid = 0;
      }
      const home = doomed.get(card.odid || card.did);
      if (!home) {
        continue;
      }
      if (cardsToo) {
        toDelete.push(card.id);
      } else if (card.odid !== 0) {
        card.odid = DEFAULT_DECK_ID;
      } else {
        card.did = DEFAULT_DECK_ID;
      }
    }

    this.store.removeCards(toDelete);
    this.decks.drop([...doomed.keys()]);
  }

  /**
   * Cards of a deck family answered "Again" within `days` days.
   */
  forgottenCards(deck: Deck, days: number): Card[] {
    const family = new Set(this.decks.familyIds(deck));
    const cutoff = this.store.dayStart() - (days - 1) * DAY_MS;
    const forgotten = new Set(
      this.store.revlog.filter((entry) => entry.id >= cutoff && entry.ease === 1).map((entry) => entry.cid)
    );
    return [...this.store.cards.values()].filter(
      (card) =>
        forgotten.has(card.id) &&
        card.odid === 0 &&
        family.has(card.did) &&
        card.queue !== CardQueue.Suspended
    );
  }

  /**
   * Creates (or rebuilds) a filtered deck holding the given cards.
   *
   * @throws ConflictError when a normal deck already has the name
   */
  buildFilteredDeck(name: string, search: string, cards: readonly Card[]): Deck {
    let deck = this.decks.byName(name);
    if (deck && !deck.dyn) {
      throw new ConflictError(`Deck '${name}' already exists and is not a filtered deck`);
    }
    if (deck) {
      const filteredId = deck.id;
      this.removeFromFiltered(
        [...this.store.cards.values()].filter((card) => card.did === filteredId).map((card) => card.id)
      );
      deck.search = search;
      deck.mod = this.store.intTime();
    } else {
      deck = this.decks.createFiltered(name, search);
    }

    for (const card of cards) {
      if (card.odid === 0) {
        card.odid = card.did;
        card.did = deck.id;
        card.mod = this.store.intTime();
      }
    }
    this.store.markChanged();
    return deck;
  }

  // ===========================================================================
  // Study
  // ===========================================================================

  private cardsIn(deckIds: ReadonlySet<number>): Card[] {
    return [...this.store.cards.values()].filter((card) => deckIds.has(card.did));
  }

  private reviewsToday(deckIds: ReadonlySet<number>, kinds: readonly ReviewKind[]): number {
    const start = this.store.dayStart();
    let count = 0;
    for (const entry of this.store.revlog) {
      if (entry.id < start || !kinds.includes(entry.type)) {
        continue;
      }
      const card = this.getCard(entry.cid);
      if (card && deckIds.has(card.odid || card.did)) {
        count += 1;
      }
    }
    return count;
  }

  /**
   * New and review cards still allowed today for a normal deck.
   */
  remainingLimits(deck: Deck): { newLimit: number; reviewLimit: number } {
    if (deck.dyn) {
      return { newLimit: Number.POSITIVE_INFINITY, reviewLimit: Number.POSITIVE_INFINITY };
    }
    const config = this.decks.configFor(deck);
    const family = new Set(this.decks.familyIds(deck));
    const today = this.store.today();
    const extension = deck.extendNewDay === today ? deck.extendNew : 0;

    const newDone = this.store.revlog.filter((entry) => {
      if (entry.id < this.store.dayStart() || entry.lastIvl !== 0 || entry.type !== ReviewKind.Learn) {
        return false;
      }
      const card = this.getCard(entry.cid);
      return card !== undefined && family.has(card.did);
    }).length;
    const reviewsDone = this.reviewsToday(family, [ReviewKind.Review]);

    return {
      newLimit: Math.max(0, config.new.perDay + extension - newDone),
      reviewLimit: Math.max(0, config.rev.perDay - reviewsDone),
    };
  }

  /**
   * Queue counts of a deck family with daily limits applied.
   */
  queueCounts(deck: Deck): QueueCounts {
    const today = this.store.today();
    const cards = this.cardsIn(new Set(this.decks.familyIds(deck)));
    const { newLimit, reviewLimit } = this.remainingLimits(deck);

    const newCards = cards.filter((card) => card.queue === CardQueue.New).length;
    const learning = cards.filter((card) => card.queue === CardQueue.Learning && card.due <= today).length;
    const reviews = cards.filter((card) => card.queue === CardQueue.Review && card.due <= today).length;

    return {
      newCount: Math.min(newCards, newLimit),
      learningCount: learning,
      reviewCount: Math.min(reviews, reviewLimit),
    };
  }

  /**
   * Next card to study in a deck family: due learning cards, then due
   * reviews, then new cards, within the daily limits. Every unsuspended
   * card of a filtered deck is available.
   */
  nextCard(deck: Deck): Card | undefined {
    const today = this.store.today();
    const cards = this.cardsIn(new Set(this.decks.familyIds(deck)));
    const byDue = (a: Card, b: Card) => a.due - b.due || a.id - b.id;

    if (deck.dyn) {
      return cards.filter((card) => card.queue !== CardQueue.Suspended).sort(byDue)[0];
    }

    const { newLimit, reviewLimit } = this.remainingLimits(deck);
    const learning = cards.filter((card) => card.queue === CardQueue.Learning && card.due <= today);
    if (learning.length > 0) {
      return learning.sort(byDue)[0];
    }
    if (reviewLimit > 0) {
      const reviews = cards.filter((card) => card.queue === CardQueue.Review && card.due <= today);
      if (reviews.length > 0) {
        return reviews.sort(byDue)[0];
      }
    }
    if (newLimit > 0) {
      return cards.filter((card) => card.queue === CardQueue.New).sort(byDue)[0];
    }
    return undefined;
  }
}

function queueForType(type: CardType): CardQueue {
  switch (type) {
    case CardType.New:
      return CardQueue.New;
    case CardType.Review:
      return CardQueue.Review;
    default:
      return CardQueue.Learning;
  }
}

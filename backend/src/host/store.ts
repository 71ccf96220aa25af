/**
 * Collection Store
 *
 * In-memory record tables of one collection, indexed by id, plus the id
 * and clock helpers every manager shares.
 */

import type {
  Card,
  CollectionData,
  Deck,
  DeckConfig,
  Model,
  Note,
  ReviewLogEntry,
} from "./collection-schema";
import { CardQueue, CardType, DAY_MS, type Clock } from "./types";

export const DEFAULT_DECK_ID = 1;
export const DEFAULT_CONFIG_ID = 1;
export const DEFAULT_DECK_NAME = "Default";

export function defaultDeckConfig(id: number, name: string): DeckConfig {
  return {
    id,
    name,
    new: { perDay: 20 },
    rev: { perDay: 200 },
    mod: 0,
    usn: 0,
  };
}

function basicModel(id: number, name: string, reversed: boolean): Model {
  const templates = [
    { name: "Card 1", ord: 0, qfmt: "{{Front}}", afmt: "{{FrontSide}}\n\n<hr id=answer>\n\n{{Back}}" },
  ];
  if (reversed) {
    templates.push({
      name: "Card 2",
      ord: 1,
      qfmt: "{{Back}}",
      afmt: "{{FrontSide}}\n\n<hr id=answer>\n\n{{Front}}",
    });
  }
  return {
    id,
    name,
    fields: [
      { name: "Front", ord: 0 },
      { name: "Back", ord: 1 },
    ],
    templates,
    css: ".card {\n font-family: arial;\n font-size: 20px;\n text-align: center;\n}\n",
    mod: 0,
  };
}

/**
 * Document for a collection that has never been saved.
 */
export function emptyCollectionData(clock: Clock): CollectionData {
  const now = clock();
  return {
    version: 1,
    nextPos: 1,
    usn: 0,
    currentDeck: DEFAULT_DECK_ID,
    decks: [
      {
        id: DEFAULT_DECK_ID,
        name: DEFAULT_DECK_NAME,
        conf: DEFAULT_CONFIG_ID,
        dyn: false,
        extendNew: 0,
        extendNewDay: 0,
        mod: 0,
      },
    ],
    deckConfigs: [defaultDeckConfig(DEFAULT_CONFIG_ID, "Default")],
    models: [basicModel(now, "Basic", false), basicModel(now + 1, "Basic (and reversed card)", true)],
    notes: [],
    cards: [],
    revlog: [],
  };
}

function byId<T extends { id: number }>(records: readonly T[]): Map<number, T> {
  return new Map(records.map((record) => [record.id, record]));
}

export class CollectionStore {
  readonly decks: Map<number, Deck>;
  readonly deckConfigs: Map<number, DeckConfig>;
  readonly models: Map<number, Model>;
  readonly notes: Map<number, Note>;
  readonly cards: Map<number, Card>;
  revlog: ReviewLogEntry[];
  nextPos: number;
  usn: number;
  currentDeck: number;

  private lastId = 0;
  private dirty = false;

  constructor(data: CollectionData, readonly clock: Clock) {
    this.decks = byId(data.decks);
    this.deckConfigs = byId(data.deckConfigs);
    this.models = byId(data.models);
    this.notes = byId(data.notes);
    this.cards = byId(data.cards);
    this.revlog = [...data.revlog];
    this.nextPos = data.nextPos;
    this.usn = data.usn;
    this.currentDeck = data.currentDeck;

    for (const table of [this.decks, this.deckConfigs, this.models, this.notes, this.cards]) {
      for (const id of table.keys()) {
        this.lastId = Math.max(this.lastId, id);
      }
    }
    for (const entry of this.revlog) {
      this.lastId = Math.max(this.lastId, entry.id);
    }
  }

  /**
   * Millisecond timestamp id, strictly greater than every id handed out
   * or loaded so far.
   */
  newId(): number {
    this.lastId = Math.max(this.clock(), this.lastId + 1);
    return this.lastId;
  }

  now(): number {
    return this.clock();
  }

  /** Modification time in seconds */
  intTime(): number {
    return Math.floor(this.clock() / 1000);
  }

  /** Day number (UTC days since the epoch) */
  today(): number {
    return Math.floor(this.clock() / DAY_MS);
  }

  /** Start of today in ms */
  dayStart(): number {
    return this.today() * DAY_MS;
  }

  markChanged(): void {
    this.dirty = true;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  markSaved(): void {
    this.dirty = false;
  }

  cardsOfNote(nid: number): Card[] {
    return [...this.cards.values()].filter((card) => card.nid === nid).sort((a, b) => a.ord - b.ord);
  }

  notesOfModel(mid: number): Note[] {
    return [...this.notes.values()].filter((note) => note.mid === mid);
  }

  /**
   * Creates a new card at the end of the new queue.
   */
  addCard(nid: number, did: number, ord: number): Card {
    const card: Card = {
      id: this.newId(),
      nid,
      did,
      odid: 0,
      ord,
      type: CardType.New,
      queue: CardQueue.New,
      due: this.nextPos++,
      ivl: 0,
      factor: 0,
      reps: 0,
      streak: 0,
      lapses: 0,
      flags: 0,
      mod: this.intTime(),
    };
    this.cards.set(card.id, card);
    this.markChanged();
    return card;
  }

  /**
   * Deletes cards, then every note left without cards.
   */
  removeCards(cardIds: readonly number[]): void {
    const touched = new Set<number>();
    for (const cid of cardIds) {
      const card = this.cards.get(cid);
      if (card) {
        touched.add(card.nid);
        this.cards.delete(cid);
      }
    }
    for (const nid of touched) {
      if (this.cardsOfNote(nid).length === 0) {
        this.notes.delete(nid);
      }
    }
    if (touched.size > 0) {
      this.markChanged();
    }
  }

  toData(): CollectionData {
    return {
      version: 1,
      nextPos: this.nextPos,
      usn: this.usn,
      currentDeck: this.currentDeck,
      decks: [...this.decks.values()],
      deckConfigs: [...this.deckConfigs.values()],
      models: [...this.models.values()],
      notes: [...this.notes.values()],
      cards: [...this.cards.values()],
      revlog: [...this.revlog],
    };
  }
}

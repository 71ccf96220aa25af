/**
 * Deck Manager
 *
 * Deck records, the `Parent::Child` hierarchy, and deck option groups.
 * Deck names compare case-insensitively.
 */

import type { Deck, DeckConfig } from "./collection-schema";
import {
  DEFAULT_CONFIG_ID,
  DEFAULT_DECK_ID,
  defaultDeckConfig,
  type CollectionStore,
} from "./store";
import { ConflictError, NotFoundError, ValidationError } from "../errors";

export const DECK_SEPARATOR = "::";

/**
 * Daily limits; omitted values are left as they are.
 */
export interface StudyLimits {
  newPerDay?: number;
  reviewsPerDay?: number;
}

function nameKey(name: string): string {
  return name.toLowerCase();
}

/**
 * Trims each `::` segment; rejects empty segments.
 */
export function normalizeDeckName(name: string): string {
  const parts = name.split(DECK_SEPARATOR).map((part) => part.trim());
  if (parts.some((part) => part.length === 0)) {
    throw new ValidationError(`Invalid deck name: "${name}"`);
  }
  return parts.join(DECK_SEPARATOR);
}

export function parentName(name: string): string | null {
  const index = name.lastIndexOf(DECK_SEPARATOR);
  return index === -1 ? null : name.slice(0, index);
}

export class DeckManager {
  constructor(private readonly store: CollectionStore) {}

  all(): Deck[] {
    return [...this.store.decks.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  allNames(): string[] {
    return this.all().map((deck) => deck.name);
  }

  get(id: number): Deck | undefined {
    return this.store.decks.get(id);
  }

  byName(name: string): Deck | undefined {
    const key = nameKey(name.trim());
    for (const deck of this.store.decks.values()) {
      if (nameKey(deck.name) === key) {
        return deck;
      }
    }
    return undefined;
  }

  /**
   * @throws NotFoundError
   */
  require(name: string): Deck {
    const deck = this.byName(name);
    if (!deck) {
      throw new NotFoundError(`Deck '${name}' does not exist`);
    }
    return deck;
  }

  nameOf(id: number): string | undefined {
    return this.store.decks.get(id)?.name;
  }

  /**
   * Returns the id of the named deck, creating it (and any missing
   * parents) when absent.
   */
  id(name: string): number {
    const normalized = normalizeDeckName(name);
    const existing = this.byName(normalized);
    if (existing) {
      return existing.id;
    }

    const parent = parentName(normalized);
    if (parent !== null) {
      this.id(parent);
    }

    const deck: Deck = {
      id: this.store.newId(),
      name: normalized,
      conf: DEFAULT_CONFIG_ID,
      dyn: false,
      extendNew: 0,
      extendNewDay: 0,
      mod: this.store.intTime(),
    };
    this.store.decks.set(deck.id, deck);
    this.store.markChanged();
    return deck.id;
  }

  /**
   * @throws ConflictError when the deck already exists
   */
  create(name: string): number {
    if (this.byName(name)) {
      throw new ConflictError(`Deck '${name}' already exists`);
    }
    return this.id(name);
  }

  /**
   * Creates an empty filtered deck.
   */
  createFiltered(name: string, search: string): Deck {
    const normalized = normalizeDeckName(name);
    if (this.byName(normalized)) {
      throw new ConflictError(`Deck '${name}' already exists`);
    }
    const parent = parentName(normalized);
    if (parent !== null) {
      this.id(parent);
    }

    const deck: Deck = {
      id: this.store.newId(),
      name: normalized,
      conf: DEFAULT_CONFIG_ID,
      dyn: true,
      extendNew: 0,
      extendNewDay: 0,
      search,
      mod: this.store.intTime(),
    };
    this.store.decks.set(deck.id, deck);
    this.store.markChanged();
    return deck;
  }

  /** Every deck below `deck`, at any depth */
  descendants(deck: Deck): Deck[] {
    const prefix = nameKey(deck.name + DECK_SEPARATOR);
    return this.all().filter((other) => nameKey(other.name).startsWith(prefix));
  }

  directChildren(deck: Deck): Deck[] {
    return this.descendants(deck).filter(
      (child) => !child.name.slice(deck.name.length + DECK_SEPARATOR.length).includes(DECK_SEPARATOR)
    );
  }

  /** The deck's id followed by the ids of its descendants */
  familyIds(deck: Deck): number[] {
    return [deck.id, ...this.descendants(deck).map((child) => child.id)];
  }

  /**
   * Renames a deck and, with it, every descendant.
   *
   * @throws NotFoundError, ConflictError
   */
  rename(oldName: string, newName: string): void {
    const deck = this.require(oldName);
    const target = normalizeDeckName(newName);
    const clash = this.byName(target);
    if (clash && clash.id !== deck.id) {
      throw new ConflictError(`Deck '${newName}' already exists`);
    }
    if (nameKey(target).startsWith(nameKey(deck.name + DECK_SEPARATOR))) {
      throw new ValidationError(`Cannot move deck '${oldName}' under itself`);
    }

    const descendants = this.descendants(deck);
    const oldPrefix = deck.name;
    const mod = this.store.intTime();

    deck.name = target;
    deck.mod = mod;
    for (const child of descendants) {
      child.name = target + child.name.slice(oldPrefix.length);
      child.mod = mod;
    }

    const parent = parentName(target);
    if (parent !== null) {
      this.id(parent);
    }
    this.store.markChanged();
  }

  /**
   * Drops deck records only; the caller has already dealt with their cards.
   */
  drop(ids: readonly number[]): void {
    for (const id of ids) {
      if (id === DEFAULT_DECK_ID) {
        continue;
      }
      this.store.decks.delete(id);
      if (this.store.currentDeck === id) {
        this.store.currentDeck = DEFAULT_DECK_ID;
      }
    }
    this.store.markChanged();
  }

  select(id: number): void {
    if (this.store.currentDeck !== id) {
      this.store.currentDeck = id;
      this.store.markChanged();
    }
  }

  current(): Deck {
    return this.get(this.store.currentDeck) ?? this.getDefault();
  }

  getDefault(): Deck {
    const deck = this.get(DEFAULT_DECK_ID);
    if (deck) {
      return deck;
    }
    this.id("Default");
    return this.require("Default");
  }

  // ===========================================================================
  // Option groups
  // ===========================================================================

  allConfigs(): DeckConfig[] {
    return [...this.store.deckConfigs.values()];
  }

  getConfig(id: number): DeckConfig | undefined {
    return this.store.deckConfigs.get(id);
  }

  /**
   * Option group of a normal deck; the default group when its own is gone.
   */
  configFor(deck: Deck): DeckConfig {
    const config = this.store.deckConfigs.get(deck.conf) ?? this.store.deckConfigs.get(DEFAULT_CONFIG_ID);
    if (config) {
      return config;
    }
    const created = defaultDeckConfig(DEFAULT_CONFIG_ID, "Default");
    this.store.deckConfigs.set(created.id, created);
    this.store.markChanged();
    return created;
  }

  /**
   * Replaces a stored option group, stamping mod and usn.
   *
   * @returns false when no group has the config's id
   */
  saveConfig(config: DeckConfig): boolean {
    if (!this.store.deckConfigs.has(config.id)) {
      return false;
    }
    this.store.deckConfigs.set(config.id, {
      ...config,
      mod: this.store.intTime(),
      usn: this.store.usn,
    });
    this.store.markChanged();
    return true;
  }

  /**
   * Points every named deck at an option group.
   *
   * @returns false when a deck or the group is unknown (nothing changes)
   */
  setConfigId(deckNames: readonly string[], configId: number): boolean {
    const decks: Deck[] = [];
    for (const name of deckNames) {
      const deck = this.byName(name);
      if (!deck) {
        return false;
      }
      decks.push(deck);
    }
    if (!this.store.deckConfigs.has(configId)) {
      return false;
    }

    for (const deck of decks) {
      deck.conf = configId;
    }
    this.store.markChanged();
    return true;
  }

  /**
   * Copies an option group under a new name.
   *
   * @returns the new group id, or false when `cloneFrom` is unknown
   */
  cloneConfig(name: string, cloneFrom: number = DEFAULT_CONFIG_ID): number | false {
    const source = this.store.deckConfigs.get(cloneFrom);
    if (!source) {
      return false;
    }
    const id = this.store.newId();
    this.store.deckConfigs.set(id, {
      ...structuredClone(source),
      id,
      name,
      mod: this.store.intTime(),
      usn: this.store.usn,
    });
    this.store.markChanged();
    return id;
  }

  /**
   * Deletes an option group; decks using it fall back to the default group.
   *
   * @returns false for the default group or an unknown id
   */
  removeConfig(configId: number): boolean {
    if (configId === DEFAULT_CONFIG_ID || !this.store.deckConfigs.has(configId)) {
      return false;
    }
    this.store.deckConfigs.delete(configId);
    for (const deck of this.store.decks.values()) {
      if (deck.conf === configId) {
        deck.conf = DEFAULT_CONFIG_ID;
      }
    }
    this.store.markChanged();
    return true;
  }

  /**
   * Gives `deck` an option group of its own, cloning a shared one into
   * "<deck> Options" first.
   *
   * @returns the deck's group and whether it was cloned
   */
  ownConfig(deck: Deck): { config: DeckConfig; cloned: boolean } {
    const shared = [...this.store.decks.values()].some(
      (other) => other.id !== deck.id && !other.dyn && other.conf === deck.conf
    );
    if (!shared) {
      return { config: this.configFor(deck), cloned: false };
    }

    const id = this.cloneConfig(`${deck.name} Options`, this.configFor(deck).id);
    if (id === false) {
      throw new Error(`Option group ${deck.conf} vanished while cloning`);
    }
    deck.conf = id;
    return { config: this.configFor(deck), cloned: true };
  }

  /**
   * Sets a normal deck's daily limits on an option group of its own. A
   * parent deck's limits then become the sums over its direct children.
   *
   * @throws ValidationError for filtered decks
   */
  setStudyLimits(deck: Deck, limits: StudyLimits): { config: DeckConfig; cloned: boolean } {
    if (deck.dyn) {
      throw new ValidationError(
        `Cannot set study options for filtered deck '${deck.name}'. Filtered decks do not use option groups.`
      );
    }
    const owned = this.ownConfig(deck);
    this.writeLimits(owned.config, limits);

    const parent = parentName(deck.name);
    const parentDeck = parent === null ? undefined : this.byName(parent);
    if (parentDeck && !parentDeck.dyn) {
      let newPerDay = 0;
      let reviewsPerDay = 0;
      for (const child of this.directChildren(parentDeck)) {
        const config = this.configFor(child);
        newPerDay += config.new.perDay;
        reviewsPerDay += config.rev.perDay;
      }
      this.writeLimits(this.ownConfig(parentDeck).config, { newPerDay, reviewsPerDay });
    }
    return owned;
  }

  private writeLimits(config: DeckConfig, limits: StudyLimits): void {
    if (limits.newPerDay !== undefined) {
      config.new.perDay = limits.newPerDay;
    }
    if (limits.reviewsPerDay !== undefined) {
      config.rev.perDay = limits.reviewsPerDay;
    }
    config.mod = this.store.intTime();
    config.usn = this.store.usn;
    this.store.markChanged();
  }

  /**
   * Allows `additional` more new cards today. Extensions on the same day
   * accumulate.
   *
   * @returns today's total extension
   */
  extendNewLimit(deck: Deck, additional: number): number {
    const today = this.store.today();
    deck.extendNew = deck.extendNewDay === today ? deck.extendNew + additional : additional;
    deck.extendNewDay = today;
    deck.mod = this.store.intTime();
    this.store.markChanged();
    return deck.extendNew;
  }
}

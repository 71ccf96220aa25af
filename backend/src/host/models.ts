/**
 * Model Manager
 *
 * Note types: their fields, card templates and css. Structural edits to
 * fields and templates go through the list edit scripts of the field
 * reconciler, with editors that keep notes and cards in step: a removed
 * field drops its value from every note, a removed template deletes its
 * cards (and notes left with none), an added template generates cards for
 * existing notes whose question renders.
 */

import type { ModelTemplate } from "@deckbridge/shared";
import type { Card, Model, ModelTemplateRecord, Note } from "./collection-schema";
import { DEFAULT_DECK_ID, type CollectionStore } from "./store";
import {
  applyListEdits,
  assertValidNameList,
  planListEdits,
  type ListEditScript,
  type ListEditor,
} from "../note-types/field-reconciler";
import { ConflictError, NotFoundError, ValidationError } from "../errors";
import { hasQuestion, type FieldMap } from "./render";

function fieldMapOf(model: Model, note: Note): FieldMap {
  const map: FieldMap = {};
  model.fields.forEach((field, index) => {
    map[field.name] = note.fields[index] ?? "";
  });
  return map;
}

/**
 * Permutation that maps each new position to the entry's old position.
 */
function permutation(current: readonly string[], order: readonly string[]): number[] {
  const indexOf = new Map(current.map((name, index) => [name, index]));
  if (order.length !== current.length) {
    throw new Error("List out of sync: reorder does not match current entries");
  }
  return order.map((name) => {
    const index = indexOf.get(name);
    if (index === undefined) {
      throw new Error(`List out of sync: "${name}" is not present`);
    }
    return index;
  });
}

function assertAt(names: readonly string[], index: number, name: string): void {
  if (names[index] !== name) {
    throw new Error(`List out of sync: expected "${name}" at index ${index}`);
  }
}

export class ModelManager {
  constructor(private readonly store: CollectionStore) {}

  all(): Model[] {
    return [...this.store.models.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  allNames(): string[] {
    return this.all().map((model) => model.name);
  }

  get(id: number): Model | undefined {
    return this.store.models.get(id);
  }

  byName(name: string): Model | undefined {
    for (const model of this.store.models.values()) {
      if (model.name === name) {
        return model;
      }
    }
    return undefined;
  }

  /**
   * @throws NotFoundError
   */
  require(id: number): Model {
    const model = this.get(id);
    if (!model) {
      throw new NotFoundError(`Model with ID '${id}' does not exist`);
    }
    return model;
  }

  /**
   * @throws NotFoundError
   */
  requireByName(name: string): Model {
    const model = this.byName(name);
    if (!model) {
      throw new NotFoundError(`Model '${name}' not found`);
    }
    return model;
  }

  fieldNames(model: Model): string[] {
    return model.fields.map((field) => field.name);
  }

  useCount(model: Model): number {
    return this.store.notesOfModel(model.id).length;
  }

  /**
   * @throws ConflictError when the name is taken, ValidationError for bad
   *   field or template lists
   */
  create(name: string, fields: readonly string[], templates: readonly ModelTemplate[], css = ""): Model {
    if (this.byName(name)) {
      throw new ConflictError(`Model '${name}' already exists`);
    }
    assertValidNameList(fields, "field");
    assertValidNameList(
      templates.map((template) => template.name),
      "template"
    );

    const model: Model = {
      id: this.store.newId(),
      name,
      fields: fields.map((fieldName, ord) => ({ name: fieldName, ord })),
      templates: templates.map((template, ord) => ({
        name: template.name,
        ord,
        qfmt: template.qfmt,
        afmt: template.afmt,
      })),
      css,
      mod: this.store.intTime(),
    };
    this.store.models.set(model.id, model);
    this.store.markChanged();
    return model;
  }

  /**
   * @throws ConflictError when notes still use the model
   */
  remove(model: Model): void {
    const count = this.useCount(model);
    if (count > 0) {
      throw new ConflictError(
        `Cannot delete model '${model.name}': ${count} notes are using this model`
      );
    }
    this.store.models.delete(model.id);
    this.store.markChanged();
  }

  /**
   * Checks a rename without applying it.
   */
  assertCanRename(model: Model, name: string): void {
    if (name.trim().length === 0) {
      throw new ValidationError("Model name must not be blank");
    }
    const existing = this.byName(name);
    if (existing && existing.id !== model.id) {
      throw new ConflictError(`Model '${name}' already exists`);
    }
  }

  rename(model: Model, name: string): void {
    this.assertCanRename(model, name);
    model.name = name;
    this.touch(model);
  }

  setCss(model: Model, css: string): void {
    model.css = css;
    this.touch(model);
  }

  // ===========================================================================
  // Fields
  // ===========================================================================

  /**
   * Editor that applies field edits to the model and to the positional
   * values of every note using it.
   */
  fieldEditor(model: Model): ListEditor {
    const notes = (): Note[] => this.store.notesOfModel(model.id);
    return {
      removeAt: (index, name) => {
        assertAt(this.fieldNames(model), index, name);
        model.fields.splice(index, 1);
        for (const note of notes()) {
          note.fields.splice(index, 1);
        }
      },
      append: (name) => {
        model.fields.push({ name, ord: model.fields.length });
        for (const note of notes()) {
          note.fields.push("");
        }
      },
      reorder: (order) => {
        const perm = permutation(this.fieldNames(model), order);
        const fields = model.fields;
        model.fields = perm.map((from, ord) => ({ ...fields[from], ord }));
        for (const note of notes()) {
          const values = note.fields;
          note.fields = perm.map((from) => values[from] ?? "");
        }
      },
    };
  }

  /**
   * Reconciles the model's fields against `desired`. Validation runs
   * before anything changes.
   */
  updateFields(model: Model, desired: readonly string[]): ListEditScript {
    assertValidNameList(desired, "field");
    const script = planListEdits(this.fieldNames(model), desired);
    applyListEdits(this.fieldEditor(model), script);
    this.touch(model);
    return script;
  }

  // ===========================================================================
  // Templates
  // ===========================================================================

  /**
   * Editor that applies template edits to the model and to the cards of
   * every note using it.
   */
  templateEditor(model: Model, desired: readonly ModelTemplate[]): ListEditor {
    const byName = new Map(desired.map((template) => [template.name, template]));
    const cards = (): Card[] =>
      [...this.store.cards.values()].filter((card) => this.store.notes.get(card.nid)?.mid === model.id);
    const names = (): string[] => model.templates.map((template) => template.name);

    // Deck of each note's first card, taken before any card is removed
    const homeDecks = new Map<number, number>();
    for (const note of this.store.notesOfModel(model.id)) {
      const first = this.store.cardsOfNote(note.id)[0];
      homeDecks.set(note.id, first ? first.odid || first.did : DEFAULT_DECK_ID);
    }

    return {
      removeAt: (index, name) => {
        assertAt(names(), index, name);
        model.templates.splice(index, 1);
        const removed: number[] = [];
        for (const card of cards()) {
          if (card.ord === index) {
            removed.push(card.id);
          } else if (card.ord > index) {
            card.ord -= 1;
          }
        }
        // Notes left without a card go with them
        this.store.removeCards(removed);
      },
      append: (name) => {
        const source = byName.get(name);
        const ord = model.templates.length;
        const qfmt = source?.qfmt ?? "";
        model.templates.push({ name, ord, qfmt, afmt: source?.afmt ?? "" });
        for (const note of this.store.notesOfModel(model.id)) {
          if (hasQuestion(qfmt, fieldMapOf(model, note))) {
            this.store.addCard(note.id, homeDecks.get(note.id) ?? DEFAULT_DECK_ID, ord);
          }
        }
      },
      reorder: (order) => {
        const perm = permutation(names(), order);
        const templates = model.templates;
        const newOrdOf = new Map(perm.map((from, to) => [from, to]));
        model.templates = perm.map((from, ord): ModelTemplateRecord => ({ ...templates[from], ord }));
        for (const card of cards()) {
          card.ord = newOrdOf.get(card.ord) ?? card.ord;
        }
      },
    };
  }

  /**
   * Reconciles templates by name the same way fields are, then copies the
   * question and answer formats of every desired template.
   */
  updateTemplates(model: Model, desired: readonly ModelTemplate[]): ListEditScript {
    const desiredNames = desired.map((template) => template.name);
    assertValidNameList(desiredNames, "template");

    const script = planListEdits(
      model.templates.map((template) => template.name),
      desiredNames
    );
    applyListEdits(this.templateEditor(model, desired), script);

    for (const template of desired) {
      const record = model.templates.find((existing) => existing.name === template.name);
      if (record) {
        record.qfmt = template.qfmt;
        record.afmt = template.afmt;
      }
    }
    this.touch(model);
    return script;
  }

  /**
   * Field names referenced by each template, per side. The answer side
   * leaves out fields already on the question side and FrontSide.
   */
  fieldsOnTemplates(model: Model): Record<string, [string[], string[]]> {
    const result: Record<string, [string[], string[]]> = {};
    for (const template of model.templates) {
      const question = referencedFields(template.qfmt);
      const answer = referencedFields(template.afmt).filter(
        (name) => !question.includes(name)
      );
      result[template.name] = [question, answer];
    }
    return result;
  }

  private touch(model: Model): void {
    model.mod = this.store.intTime();
    this.store.markChanged();
  }
}

/**
 * Field references of a template side, skipping section tags and
 * FrontSide, with filters (`text:`, `cloze:`) stripped.
 */
export function referencedFields(format: string): string[] {
  const fields: string[] = [];
  for (const match of format.matchAll(/\{\{([^#/^}][^}]*?)\}\}/g)) {
    const tag = match[1] ?? "";
    const name = (tag.split(":").pop() ?? "").trim();
    if (name === "FrontSide" || name.length === 0) {
      continue;
    }
    fields.push(name);
  }
  return fields;
}

/**
 * Field Reconciler
 *
 * Computes the structural edits that turn a note type's current field list
 * into a caller-supplied one: removals, additions and a final reorder.
 * Diffing keeps surviving fields (and the note values stored against them)
 * in place instead of dropping and re-creating every field.
 *
 * The same list diff drives template updates.
 */

import { ValidationError } from "../errors";

// =============================================================================
// Types
// =============================================================================

/**
 * An entry removed from the existing list, with its original index.
 */
export interface ListRemoval {
  name: string;
  index: number;
}

/**
 * Edit script for one list reconciliation.
 */
export interface ListEditScript {
  /** Removals in application order: highest original index first */
  removals: ListRemoval[];
  /** Names appended after all removals, in desired order */
  additions: string[];
  /** Final order; every entry's position index is reset to its index here */
  order: string[];
  /** True when the final order differs from survivors-then-additions */
  reordered: boolean;
}

export type FieldEditScript = ListEditScript;

/**
 * Target of an edit script. The host model implements this so that the
 * same edits also rewrite the positional values of existing notes.
 */
export interface ListEditor {
  removeAt(index: number, name: string): void;
  append(name: string): void;
  /** Reset every entry's position to its index in `order` */
  reorder(order: readonly string[]): void;
}

/**
 * Result of reconciling a plain field list.
 */
export interface FieldReconcileResult {
  fields: string[];
  script: FieldEditScript;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Rejects an empty desired list, blank names and duplicate names.
 *
 * @param kind - Noun used in error messages ("field", "template")
 * @throws ValidationError
 */
export function assertValidNameList(desired: readonly string[], kind = "field"): void {
  if (desired.length === 0) {
    throw new ValidationError(`A note type must have at least one ${kind}`);
  }

  const seen = new Set<string>();
  for (const name of desired) {
    if (name.trim().length === 0) {
      throw new ValidationError(`${capitalize(kind)} names must not be blank`);
    }
    if (seen.has(name)) {
      throw new ValidationError(`Duplicate ${kind} name: "${name}"`);
    }
    seen.add(name);
  }
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Plans the edits from `existing` to `desired`. Both lists must hold unique
 * names; call assertValidNameList on caller input first.
 */
export function planListEdits(
  existing: readonly string[],
  desired: readonly string[]
): ListEditScript {
  const desiredSet = new Set(desired);
  const existingSet = new Set(existing);

  // Highest index first: earlier removals must not shift later ones
  const removals = existing
    .map((name, index) => ({ name, index }))
    .filter((entry) => !desiredSet.has(entry.name))
    .reverse();

  const additions = desired.filter((name) => !existingSet.has(name));

  const afterEdits = existing.filter((name) => desiredSet.has(name)).concat(additions);
  const reordered = afterEdits.some((name, index) => name !== desired[index]);

  return {
    removals,
    additions,
    order: [...desired],
    reordered,
  };
}

/**
 * True when the script changes nothing.
 */
export function isNoopScript(script: ListEditScript): boolean {
  return script.removals.length === 0 && script.additions.length === 0 && !script.reordered;
}

/**
 * One-line summary of a script for logs.
 */
export function describeScript(script: ListEditScript): string {
  if (isNoopScript(script)) {
    return "no changes";
  }

  const parts: string[] = [];
  if (script.removals.length > 0) {
    parts.push(`removed [${script.removals.map((r) => r.name).join(", ")}]`);
  }
  if (script.additions.length > 0) {
    parts.push(`added [${script.additions.join(", ")}]`);
  }
  if (script.reordered) {
    parts.push("reordered");
  }
  return parts.join(", ");
}

// =============================================================================
// Application
// =============================================================================

/**
 * Applies a script: removals, then additions, then the position reset.
 */
export function applyListEdits(editor: ListEditor, script: ListEditScript): void {
  for (const removal of script.removals) {
    editor.removeAt(removal.index, removal.name);
  }
  for (const name of script.additions) {
    editor.append(name);
  }
  editor.reorder(script.order);
}

/**
 * Editor over a plain string array. Throws if the array drifts from what
 * the script expects.
 */
export function createArrayEditor(list: string[]): ListEditor {
  return {
    removeAt(index, name) {
      if (list[index] !== name) {
        throw new Error(`Field list out of sync: expected "${name}" at index ${index}`);
      }
      list.splice(index, 1);
    },
    append(name) {
      list.push(name);
    },
    reorder(order) {
      const current = new Set(list);
      if (order.length !== list.length || order.some((name) => !current.has(name))) {
        throw new Error("Field list out of sync: reorder does not match current fields");
      }
      list.splice(0, list.length, ...order);
    },
  };
}

/**
 * Reconciles a field list against the desired one.
 *
 * Validation runs before any edit, so a rejected update leaves `existing`
 * untouched. The input array is not modified; the new list is returned
 * with the edit script that produced it.
 *
 * @throws ValidationError when `desired` is empty or has duplicate or blank names
 */
export function reconcileFields(
  existing: readonly string[],
  desired: readonly string[]
): FieldReconcileResult {
  assertValidNameList(desired, "field");

  const script = planListEdits(existing, desired);
  const fields = [...existing];
  applyListEdits(createArrayEditor(fields), script);

  return { fields, script };
}

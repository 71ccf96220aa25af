/**
 * Handlers Module
 *
 * Every action the server answers, grouped by what it works on.
 */

import { ActionRegistry } from "../action-dispatcher";
import { cardActions } from "./card-handlers";
import { deckActions } from "./deck-handlers";
import { mediaActions } from "./media-handlers";
import { metaActions } from "./meta-handlers";
import { modelActions } from "./model-handlers";
import { noteActions } from "./note-handlers";
import { profileActions } from "./profile-handlers";
import { studyActions } from "./study-handlers";
import type { RegisteredAction } from "./types";

export type { ActionContext, ActionDefinition, FetchLike, RegisteredAction, VersionAlias } from "./types";
export { defineAction } from "./types";

export const allActions: readonly RegisteredAction[] = [
  ...metaActions,
  ...deckActions,
  ...modelActions,
  ...noteActions,
  ...cardActions,
  ...studyActions,
  ...mediaActions,
  ...profileActions,
];

export function createActionRegistry(extra: readonly RegisteredAction[] = []): ActionRegistry {
  return new ActionRegistry([...allActions, ...extra]);
}

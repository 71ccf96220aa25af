/**
 * Shared Types for Action Handlers
 *
 * Every action is declared with defineAction: a name, a zod schema for its
 * params, optional version aliases and a handler. The handler receives the
 * parsed params and an ActionContext.
 */

import type { z } from "zod";
import type { Collection } from "../host/collection";
import type { MediaStore } from "../host/media-store";
import type { ProfileManager } from "../host/profile-manager";
import type { Clock } from "../host/types";
import { validationErrorFromZod } from "../errors";

// =============================================================================
// Handler Dependencies (Injectable for Testing)
// =============================================================================

/**
 * Subset of fetch used for audio downloads. Tests pass a stub.
 */
export type FetchLike = (url: string) => Promise<Response>;

/**
 * What a handler can reach while it runs.
 */
export interface ActionContext {
  profiles: ProfileManager;
  /**
   * The open collection.
   * @throws CollectionUnavailableError when no profile is open
   */
  collection(): Collection;
  /**
   * Media store of the open profile.
   * @throws CollectionUnavailableError when no profile is open
   */
  media(): MediaStore;
  fetch: FetchLike;
  clock: Clock;
  /** Runs a nested request (multi) without queueing behind the current one */
  dispatch(request: unknown): Promise<unknown>;
  /** Names of every registered action */
  actionNames(): string[];
}

/**
 * `[apiVersion, name]`: from `apiVersion` on, the action answers to `name`.
 */
export type VersionAlias = readonly [number, string];

export interface ActionDefinition<S extends z.ZodTypeAny, R> {
  name: string;
  params: S;
  versions?: readonly VersionAlias[];
  /** Saves the collection after a successful run */
  mutates?: boolean;
  handler: (params: z.output<S>, ctx: ActionContext) => R | Promise<R>;
}

/**
 * An action as the registry holds it, with its params type erased.
 */
export interface RegisteredAction {
  name: string;
  versions: readonly VersionAlias[];
  mutates: boolean;
  run(rawParams: unknown, ctx: ActionContext): Promise<unknown>;
}

/**
 * Declares an action. Params are validated before the handler runs; a
 * failed parse throws ValidationError listing every issue.
 */
export function defineAction<S extends z.ZodTypeAny, R>(
  definition: ActionDefinition<S, R>
): RegisteredAction {
  return {
    name: definition.name,
    versions: definition.versions ?? [],
    mutates: definition.mutates ?? false,
    async run(rawParams, ctx) {
      const parsed = definition.params.safeParse(rawParams);
      if (!parsed.success) {
        throw validationErrorFromZod(parsed.error);
      }
      return definition.handler(parsed.data, ctx);
    },
  };
}

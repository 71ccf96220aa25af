/**
 * Action Dispatcher
 *
 * Turns request envelopes into handler calls. Top-level requests run one at
 * a time on a promise chain, so handlers never interleave against the
 * collection; a mutating action saves the profile before its reply goes
 * out.
 */

import { safeParseActionRequest, type ActionRequest } from "@deckbridge/shared";
import type { ProfileManager } from "./host/profile-manager";
import { systemClock, type Clock } from "./host/types";
import type { ActionContext, FetchLike, RegisteredAction, VersionAlias } from "./handlers/types";
import {
  ActionError,
  CollectionUnavailableError,
  ForbiddenError,
  formatZodError,
  isActionError,
} from "./errors";
import { actionLog as log } from "./logger";

/** Envelope versions above this get the `{ result, error }` reply */
const LEGACY_REPLY_VERSION = 4;

const DOWNLOAD_TIMEOUT_MS = 10_000;

export const UNSUPPORTED_ACTION_MESSAGE = "unsupported action";
export const API_KEY_MESSAGE = "valid api key must be provided";

/**
 * Name an action answers to at `version`: the alias with the highest
 * version not above it, else the action's own name.
 */
export function nameAtVersion(name: string, aliases: readonly VersionAlias[], version: number): string {
  let best: VersionAlias | undefined;
  for (const alias of aliases) {
    if (alias[0] <= version && (!best || alias[0] > best[0])) {
      best = alias;
    }
  }
  return best ? best[1] : name;
}

export class ActionRegistry {
  private readonly actions = new Map<string, RegisteredAction>();

  /**
   * @throws Error when two actions share a name
   */
  constructor(actions: readonly RegisteredAction[]) {
    for (const action of actions) {
      if (this.actions.has(action.name)) {
        throw new Error(`Duplicate action: ${action.name}`);
      }
      this.actions.set(action.name, action);
    }
  }

  resolve(name: string, version: number): RegisteredAction | undefined {
    for (const action of this.actions.values()) {
      if (nameAtVersion(action.name, action.versions, version) === name) {
        return action;
      }
    }
    return undefined;
  }

  names(): string[] {
    return [...this.actions.keys()].sort((a, b) => a.localeCompare(b));
  }
}

export interface ActionDispatcherOptions {
  registry: ActionRegistry;
  profiles: ProfileManager;
  /** When set, top-level requests must carry it as `key` */
  apiKey?: string;
  fetch?: FetchLike;
  clock?: Clock;
}

const defaultFetch: FetchLike = (url) => fetch(url, { signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS) });

export class ActionDispatcher {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly context: ActionContext;

  constructor(private readonly options: ActionDispatcherOptions) {
    const { profiles, registry } = options;
    this.context = {
      profiles,
      collection: () => {
        const collection = profiles.collection();
        if (!collection) {
          throw new CollectionUnavailableError();
        }
        return collection;
      },
      media: () => {
        const media = profiles.media();
        if (!media) {
          throw new CollectionUnavailableError();
        }
        return media;
      },
      fetch: options.fetch ?? defaultFetch,
      clock: options.clock ?? systemClock,
      dispatch: (request) => this.execute(request, true),
      actionNames: () => registry.names(),
    };
  }

  /**
   * Runs a top-level request after every request queued before it.
   *
   * @returns the reply to send back as JSON
   */
  handle(body: unknown): Promise<unknown> {
    return this.runExclusive(() => this.execute(body, false));
  }

  /**
   * Runs `task` on the request chain, after every request queued before it
   * and before any queued later.
   */
  runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller gets any rejection through `run`; the chain just moves on
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async execute(body: unknown, nested: boolean): Promise<unknown> {
    const parsed = safeParseActionRequest(body);
    if (!parsed.success) {
      const version = envelopeVersion(body);
      log.warn(`Rejected request envelope: ${formatZodError(parsed.error)}`);
      return reply(version, null, formatZodError(parsed.error));
    }

    const request = parsed.data;
    try {
      const result = await this.run(request, nested);
      return reply(request.version, result ?? null, null);
    } catch (error) {
      if (isActionError(error)) {
        log.warn(`${request.action} failed (${error.code}): ${error.message}`);
      } else {
        log.error(`${request.action} failed`, error instanceof Error ? error.stack : error);
      }
      return reply(request.version, null, error instanceof Error ? error.message : String(error));
    }
  }

  private async run(request: ActionRequest, nested: boolean): Promise<unknown> {
    const { apiKey } = this.options;
    if (!nested && apiKey !== undefined && request.key !== apiKey) {
      throw new ForbiddenError(API_KEY_MESSAGE);
    }

    const action = this.options.registry.resolve(request.action, request.version);
    if (!action) {
      throw new ActionError(UNSUPPORTED_ACTION_MESSAGE, "UNSUPPORTED_ACTION");
    }

    log.debug(`${request.action} (v${request.version})${nested ? " [nested]" : ""}`);
    const result = await action.run(request.params, this.context);
    if (!nested && action.mutates) {
      await this.options.profiles.save();
    }
    return result;
  }
}

function reply(version: number, result: unknown, error: string | null): unknown {
  if (version > LEGACY_REPLY_VERSION) {
    return { result: error === null ? result : null, error };
  }
  return error === null ? result : null;
}

function envelopeVersion(body: unknown): number {
  if (typeof body === "object" && body !== null && "version" in body && typeof body.version === "number") {
    return body.version;
  }
  return LEGACY_REPLY_VERSION;
}

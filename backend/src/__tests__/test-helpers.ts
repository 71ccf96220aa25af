/**
 * Test Helpers
 *
 * Controllable clock, temp-dir profiles and a dispatcher wired to them.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ActionReplySchema } from "@deckbridge/shared";
import { ActionDispatcher, ActionRegistry } from "../action-dispatcher";
import { allActions } from "../handlers";
import type { FetchLike, RegisteredAction } from "../handlers/types";
import { Collection } from "../host/collection";
import { DEFAULT_PROFILE_NAME, ProfileManager } from "../host/profile-manager";
import { DAY_MS } from "../host/types";

/** 2026-01-15T12:00:00Z */
export const BASE_TIME = Date.UTC(2026, 0, 15, 12);

export interface TestClock {
  (): number;
  advance(ms: number): void;
  advanceDays(days: number): void;
  set(ms: number): void;
}

export function createTestClock(start: number = BASE_TIME): TestClock {
  let now = start;
  const clock = () => now;
  return Object.assign(clock, {
    advance: (ms: number) => {
      now += ms;
    },
    advanceDays: (days: number) => {
      now += days * DAY_MS;
    },
    set: (ms: number) => {
      now = ms;
    },
  });
}

export function createTestCollection(clock: TestClock = createTestClock()): Collection {
  return Collection.create(clock);
}

export async function createTempDir(prefix = "deckbridge-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

/** Fetch stub answering every URL with the given bytes */
export function bytesFetch(bytes: Uint8Array, status = 200): FetchLike {
  return () => Promise.resolve(new Response(bytes, { status }));
}

export const failingFetch: FetchLike = (url) => Promise.reject(new Error(`offline: ${url}`));

export type ReplyEnvelope = z.infer<typeof ActionReplySchema>;

export interface DispatcherHarnessOptions {
  apiKey?: string;
  fetch?: FetchLike;
  actions?: readonly RegisteredAction[];
}

export interface DispatcherHarness {
  dataDir: string;
  clock: TestClock;
  profiles: ProfileManager;
  dispatcher: ActionDispatcher;
  /** The open collection */
  collection(): Collection;
  /** Sends a version 6 request and returns the parsed reply envelope */
  call(action: string, params?: Record<string, unknown>): Promise<ReplyEnvelope>;
  /** Like call, but fails the test when the reply carries an error */
  result(action: string, params?: Record<string, unknown>): Promise<unknown>;
  cleanup(): Promise<void>;
}

export async function createDispatcherHarness(
  options: DispatcherHarnessOptions = {}
): Promise<DispatcherHarness> {
  const dataDir = await createTempDir();
  const clock = createTestClock();
  const profiles = new ProfileManager({ dataDir, clock });
  await profiles.openOrCreate(DEFAULT_PROFILE_NAME);

  const dispatcher = new ActionDispatcher({
    registry: new ActionRegistry(options.actions ?? allActions),
    profiles,
    apiKey: options.apiKey,
    fetch: options.fetch ?? failingFetch,
    clock,
  });

  const call = async (action: string, params: Record<string, unknown> = {}) => {
    const body: Record<string, unknown> = { action, version: 6, params };
    if (options.apiKey !== undefined) {
      body.key = options.apiKey;
    }
    return ActionReplySchema.parse(await dispatcher.handle(body));
  };

  return {
    dataDir,
    clock,
    profiles,
    dispatcher,
    collection: () => {
      const collection = profiles.collection();
      if (!collection) {
        throw new Error("No collection is open");
      }
      return collection;
    },
    call,
    result: async (action, params) => {
      const reply = await call(action, params);
      if (reply.error !== null) {
        throw new Error(`${action} failed: ${reply.error}`);
      }
      return reply.result;
    },
    cleanup: async () => {
      await profiles.close();
      await rm(dataDir, { recursive: true, force: true });
    },
  };
}

/**
 * Meta Handlers
 *
 * Version reporting, diagnostics and batched requests.
 */

import { z } from "zod";
import { API_VERSION, VERSION } from "@deckbridge/shared";
import { defineAction, type RegisteredAction } from "./types";

const NoParams = z.object({}).passthrough();

export const metaActions: RegisteredAction[] = [
  defineAction({
    name: "version",
    params: NoParams,
    handler: () => API_VERSION,
  }),

  defineAction({
    name: "addonVersion",
    params: NoParams,
    handler: () => VERSION,
  }),

  defineAction({
    name: "debugInfo",
    params: NoParams,
    handler: (_params, ctx) => ({
      apiVersion: API_VERSION,
      addonVersion: VERSION,
      profile: ctx.profiles.current()?.name ?? null,
      availableActions: ctx.actionNames(),
    }),
  }),

  /**
   * Runs each nested request in order and returns their replies. Nested
   * requests skip the queue and the key check of the outer one.
   */
  defineAction({
    name: "multi",
    params: z.object({ actions: z.array(z.unknown()) }),
    mutates: true,
    handler: async ({ actions }, ctx) => {
      const replies: unknown[] = [];
      for (const action of actions) {
        replies.push(await ctx.dispatch(action));
      }
      return replies;
    },
  }),
];

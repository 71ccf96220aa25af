/**
 * Profile Handlers
 *
 * Listing, switching, creating and deleting profiles. Except for
 * loadProfile, failures come back inside the result as `{ error }`.
 */

import { z } from "zod";
import { isActionError } from "../errors";
import { defineAction, type RegisteredAction } from "./types";

const ProfileNameSchema = z.object({ profileName: z.string() });

export type ProfileOutcome = { success: true; message: string } | { error: string };

/**
 * Runs a profile operation, turning action errors into `{ error }`.
 */
async function outcome(run: () => Promise<string>): Promise<ProfileOutcome> {
  try {
    return { success: true, message: await run() };
  } catch (error) {
    if (isActionError(error)) {
      return { error: error.message };
    }
    throw error;
  }
}

export const profileActions: RegisteredAction[] = [
  defineAction({
    name: "getProfiles",
    params: z.object({}).passthrough(),
    handler: async (_params, ctx) => (await ctx.profiles.list()).map((name) => ({ name })),
  }),

  defineAction({
    name: "getCurrentProfile",
    params: z.object({}).passthrough(),
    handler: (_params, ctx) => ctx.profiles.current(),
  }),

  defineAction({
    name: "loadProfile",
    params: z.object({ name: z.string().min(1, "name is required") }),
    handler: async ({ name }, ctx) => {
      await ctx.profiles.open(name);
      return true;
    },
  }),

  defineAction({
    name: "switchProfile",
    params: ProfileNameSchema,
    handler: ({ profileName }, ctx) =>
      outcome(async () => {
        await ctx.profiles.open(profileName);
        return `Switched to profile: ${profileName}`;
      }),
  }),

  defineAction({
    name: "createProfile",
    params: ProfileNameSchema,
    handler: ({ profileName }, ctx) =>
      outcome(async () => {
        await ctx.profiles.create(profileName);
        return `Profile "${profileName}" created successfully`;
      }),
  }),

  defineAction({
    name: "deleteProfile",
    params: ProfileNameSchema,
    handler: ({ profileName }, ctx) =>
      outcome(async () => {
        await ctx.profiles.remove(profileName);
        return `Profile "${profileName}" deleted successfully`;
      }),
  }),
];

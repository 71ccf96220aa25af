/**
 * Media Handlers
 *
 * Media files travel base64-encoded inside action params and results.
 */

import { z } from "zod";
import { defineAction, type RegisteredAction } from "./types";
import { ValidationError } from "../errors";

const FilenameSchema = z.string().min(1, "filename is required");

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * @throws ValidationError when `data` is not base64
 */
export function decodeBase64(data: string): Buffer {
  const compact = data.replace(/\s+/g, "");
  if (compact.length % 4 === 1 || !BASE64_PATTERN.test(compact)) {
    throw new ValidationError("data must be base64-encoded");
  }
  return Buffer.from(compact, "base64");
}

export const mediaActions: RegisteredAction[] = [
  defineAction({
    name: "storeMediaFile",
    params: z.object({ filename: FilenameSchema, data: z.string() }),
    handler: ({ filename, data }, ctx) => ctx.media().write(filename, decodeBase64(data)),
  }),

  defineAction({
    name: "retrieveMediaFile",
    params: z.object({ filename: FilenameSchema }),
    handler: async ({ filename }, ctx) => {
      const content = await ctx.media().read(filename);
      return content === null ? false : content.toString("base64");
    },
  }),

  defineAction({
    name: "deleteMediaFile",
    params: z.object({ filename: FilenameSchema }),
    handler: async ({ filename }, ctx) => {
      await ctx.media().delete(filename);
      return null;
    },
  }),
];

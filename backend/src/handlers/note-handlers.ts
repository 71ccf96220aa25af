/**
 * Note Handlers
 *
 * Adding, editing, tagging and querying notes, including notes with audio
 * downloaded from a URL.
 */

import { createHash } from "node:crypto";
import { extname } from "node:path";
import { z } from "zod";
import { NoteParamsSchema, type NoteParams } from "@deckbridge/shared";
import type { NoteDraft } from "../host/collection";
import { normalizeMediaName } from "../host/media-store";
import { ActionError, ConflictError, ValidationError, isActionError } from "../errors";
import { createLogger } from "../logger";
import { presentNote, type Missing, type NoteInfo } from "./presenters";
import { defineAction, type ActionContext, type FetchLike, type RegisteredAction } from "./types";

const log = createLogger("NoteHandlers");

/** Field that addAudioNote appends its `[sound:...]` reference to */
export const AUDIO_FIELD = "Audio1";

const IdListSchema = z.array(z.number().int());

export function md5Hex(data: Uint8Array | string): string {
  return createHash("md5").update(data).digest("hex");
}

export function soundTag(filename: string): string {
  return `[sound:${filename}]`;
}

/**
 * Downloads a file.
 *
 * @throws Error for HTTP failures
 */
export async function download(fetch: FetchLike, url: string): Promise<Uint8Array> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} for ${url}`);
  }
  return new Uint8Array(await response.arrayBuffer());
}

/**
 * Media file name for audio fetched from `url`: the URL's last path segment,
 * left percent-encoded and reduced to a media name, with the time appended.
 * A generated mp3 name is used when the segment has no extension.
 */
export function audioFileName(url: string, seconds: number): string {
  const name = normalizeMediaName(new URL(url).pathname.split("/").pop() ?? "");
  if (name.includes(".")) {
    const ext = extname(name);
    return `${name.slice(0, name.length - ext.length)}_${seconds}${ext}`;
  }
  return `audio_${seconds}_${md5Hex(url).slice(0, 8)}.mp3`;
}

function draftFor(ctx: ActionContext, params: NoteParams): { draft: NoteDraft; deckId: number } {
  const collection = ctx.collection();
  const model = collection.models.requireByName(params.modelName);
  const deck = collection.decks.require(params.deckName);
  return { draft: collection.newNote(model, params.fields, params.tags), deckId: deck.id };
}

/**
 * Adds one note. Audio is downloaded first and referenced from the listed
 * fields unless its md5 equals `skipHash`; a failed download skips the
 * audio, not the note.
 */
async function addNote(ctx: ActionContext, params: NoteParams): Promise<number> {
  const collection = ctx.collection();
  const { draft, deckId } = draftFor(ctx, params);

  let audio: { filename: string; data: Uint8Array } | null = null;
  if (params.audio && params.audio.fields.length > 0) {
    const { url, skipHash, fields } = params.audio;
    const filename = normalizeMediaName(params.audio.filename);
    try {
      const data = await download(ctx.fetch, url);
      if (skipHash === undefined || md5Hex(data) !== skipHash) {
        audio = { filename, data };
        draft.model.fields.forEach((field, index) => {
          if (fields.includes(field.name)) {
            draft.fields[index] += soundTag(filename);
          }
        });
      }
    } catch (error) {
      log.warn(`Audio download failed, adding note without it: ${String(error)}`);
    }
  }

  const note = collection.addNote(draft, deckId);
  if (audio) {
    await ctx.media().write(audio.filename, audio.data);
  }
  return note.id;
}

function canAdd(ctx: ActionContext, raw: unknown): boolean {
  const parsed = NoteParamsSchema.safeParse(raw);
  if (!parsed.success) {
    return false;
  }
  try {
    const { draft } = draftFor(ctx, parsed.data);
    ctx.collection().assertNotEmpty(draft);
    return true;
  } catch (error) {
    if (isActionError(error)) {
      return false;
    }
    throw error;
  }
}

export const noteActions: RegisteredAction[] = [
  defineAction({
    name: "addNote",
    params: z.object({ note: NoteParamsSchema }),
    mutates: true,
    handler: ({ note }, ctx) => addNote(ctx, note),
  }),

  /** Note id per entry, or null where that note could not be added */
  defineAction({
    name: "addNotes",
    params: z.object({ notes: z.array(z.unknown()) }),
    mutates: true,
    handler: async ({ notes }, ctx) => {
      const ids: Array<number | null> = [];
      for (const raw of notes) {
        const parsed = NoteParamsSchema.safeParse(raw);
        if (!parsed.success) {
          ids.push(null);
          continue;
        }
        try {
          ids.push(await addNote(ctx, parsed.data));
        } catch (error) {
          if (!isActionError(error)) {
            throw error;
          }
          log.debug(`addNotes entry rejected: ${error.message}`);
          ids.push(null);
        }
      }
      return ids;
    },
  }),

  defineAction({
    name: "canAddNotes",
    params: z.object({ notes: z.array(z.unknown()) }),
    handler: ({ notes }, ctx) => notes.map((note) => canAdd(ctx, note)),
  }),

  defineAction({
    name: "addAudioNote",
    params: z.object({
      note: NoteParamsSchema.omit({ audio: true }),
      audioFile: z.string().url("audioFile is required and must be a valid URL string"),
      allowDuplicate: z.boolean().default(true),
    }),
    mutates: true,
    handler: async ({ note: params, audioFile, allowDuplicate }, ctx) => {
      try {
        const collection = ctx.collection();
        const model = collection.models.requireByName(params.modelName);
        const fieldNames = collection.models.fieldNames(model);
        if (!fieldNames.includes(AUDIO_FIELD)) {
          throw new ValidationError(
            `Model '${model.name}' must have an '${AUDIO_FIELD}' field. Current fields: ${fieldNames.join(", ")}`
          );
        }
        const deck = collection.decks.require(params.deckName);

        let data: Uint8Array;
        try {
          data = await download(ctx.fetch, audioFile);
        } catch (error) {
          throw new ValidationError(
            `Failed to download audio from URL: ${error instanceof Error ? error.message : String(error)}`
          );
        }
        if (data.byteLength === 0) {
          throw new ValidationError("Downloaded file is empty");
        }

        const filename = audioFileName(audioFile, Math.floor(ctx.clock() / 1000));
        const fields = {
          ...params.fields,
          [AUDIO_FIELD]: (params.fields[AUDIO_FIELD] ?? "") + soundTag(filename),
        };
        const draft = collection.newNote(model, fields, params.tags);
        if (!allowDuplicate && collection.isDuplicate(draft)) {
          throw new ConflictError("Duplicate note detected. First field already exists.");
        }

        const note = collection.addNote(draft, deck.id);
        await ctx.media().write(filename, data);
        return note.id;
      } catch (error) {
        if (isActionError(error)) {
          throw new ActionError(`addAudioNote error: ${error.message}`, error.code);
        }
        throw error;
      }
    },
  }),

  defineAction({
    name: "updateNoteFields",
    params: z.object({
      note: z.object({ id: z.number().int(), fields: z.record(z.string()) }),
    }),
    mutates: true,
    handler: ({ note }, ctx) => {
      ctx.collection().updateNoteFields(note.id, note.fields);
      return null;
    },
  }),

  defineAction({
    name: "deleteNotes",
    params: z.object({ notes: IdListSchema }),
    mutates: true,
    handler: ({ notes }, ctx) => {
      ctx.collection().removeNotes(notes);
      return null;
    },
  }),

  defineAction({
    name: "addTags",
    params: z.object({ notes: IdListSchema, tags: z.string(), add: z.boolean().default(true) }),
    mutates: true,
    handler: ({ notes, tags, add }, ctx) => {
      ctx.collection().updateTags(notes, tags, add);
      return null;
    },
  }),

  defineAction({
    name: "removeTags",
    params: z.object({ notes: IdListSchema, tags: z.string() }),
    mutates: true,
    handler: ({ notes, tags }, ctx) => {
      ctx.collection().updateTags(notes, tags, false);
      return null;
    },
  }),

  defineAction({
    name: "getTags",
    params: z.object({}).passthrough(),
    handler: (_params, ctx) => ctx.collection().allTags(),
  }),

  defineAction({
    name: "findNotes",
    params: z.object({ query: z.string().default("") }),
    handler: ({ query }, ctx) => ctx.collection().findNotes(query),
  }),

  defineAction({
    name: "notesInfo",
    params: z.object({ notes: IdListSchema }),
    handler: ({ notes }, ctx): Array<NoteInfo | Missing> => {
      const collection = ctx.collection();
      return notes.map((nid) => {
        const note = collection.getNote(nid);
        return note ? presentNote(collection, note) : {};
      });
    },
  }),

  defineAction({
    name: "cardsToNotes",
    params: z.object({ cards: IdListSchema }),
    handler: ({ cards }, ctx) => ctx.collection().cardsToNotes(cards),
  }),
];

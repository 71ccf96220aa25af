/**
 * DeckBridge Action Protocol
 *
 * Zod schemas for validating action requests and replies exchanged over
 * HTTP. A request names an action, an API version and its parameters; the
 * reply is a tagged `{ result, error }` envelope.
 */

import { z } from "zod";

// =============================================================================
// Constants
// =============================================================================

/**
 * Current action API version. Requests with `version > 4` receive the
 * `{ result, error }` envelope; older versions receive the bare result.
 */
export const API_VERSION = 6;

/**
 * Version assumed when a request does not carry one.
 */
export const DEFAULT_REQUEST_VERSION = 4;

// =============================================================================
// Error Code Schema
// =============================================================================

/**
 * Schema for ErrorCode enum values
 */
export const ErrorCodeSchema = z.enum([
  "UNSUPPORTED_ACTION",
  "VALIDATION_ERROR",
  "NOT_FOUND",
  "CONFLICT",
  "COLLECTION_UNAVAILABLE",
  "FORBIDDEN",
  "INTERNAL_ERROR",
]);

// =============================================================================
// Envelope Schemas
// =============================================================================

/**
 * Schema for an action request body.
 */
export const ActionRequestSchema = z.object({
  action: z.string().min(1, "Action name is required"),
  version: z.number().int().positive().default(DEFAULT_REQUEST_VERSION),
  params: z.record(z.unknown()).default({}),
  key: z.string().optional(),
});

/**
 * Schema for an action reply (version > 4).
 */
export const ActionReplySchema = z.object({
  result: z.unknown(),
  error: z.string().nullable(),
});

// =============================================================================
// Shared Parameter Schemas
// =============================================================================

/**
 * Audio attachment for addNote: downloaded from `url`, stored as
 * `filename` and referenced from each of `fields`.
 */
export const NoteAudioSchema = z.object({
  url: z.string().url("Audio url must be a valid URL"),
  filename: z
    .string()
    .min(1, "Audio filename is required")
    .refine((name) => !name.includes("/") && !name.includes("\\"), {
      message: "Audio filename must not contain a directory",
    }),
  skipHash: z.string().optional(),
  fields: z.array(z.string()).default([]),
});

/**
 * Parameters describing a note to add.
 */
export const NoteParamsSchema = z.object({
  deckName: z.string().min(1, "Deck name is required"),
  modelName: z.string().min(1, "Model name is required"),
  fields: z.record(z.string()),
  tags: z.array(z.string()).default([]),
  audio: NoteAudioSchema.optional(),
});

/**
 * Card template of a note type.
 */
export const ModelTemplateSchema = z.object({
  name: z.string().min(1, "Template name is required"),
  qfmt: z.string(),
  afmt: z.string(),
});

/**
 * Deck options group. Unknown keys are kept so clients can round-trip a
 * config they read with getDeckConfig.
 */
export const DeckConfigSchema = z
  .object({
    id: z.number().int(),
    name: z.string().min(1, "Config name is required"),
    new: z.object({ perDay: z.number().int().min(0) }).passthrough(),
    rev: z.object({ perDay: z.number().int().min(0) }).passthrough(),
    mod: z.number().int().default(0),
    usn: z.number().int().default(0),
  })
  .passthrough();

/**
 * Time windows accepted by the review-time statistics actions.
 */
export const StatsPeriodSchema = z.enum(["today", "last7days", "last30days", "allTime"]);

// =============================================================================
// Inferred TypeScript Types
// =============================================================================

export type ActionRequest = z.infer<typeof ActionRequestSchema>;
export type ActionRequestInput = z.input<typeof ActionRequestSchema>;
export type NoteAudio = z.infer<typeof NoteAudioSchema>;
export type NoteParams = z.infer<typeof NoteParamsSchema>;
export type ModelTemplate = z.infer<typeof ModelTemplateSchema>;
export type DeckConfig = z.infer<typeof DeckConfigSchema>;
export type StatsPeriod = z.infer<typeof StatsPeriodSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Parse and validate an action request
 * @throws ZodError if validation fails
 */
export function parseActionRequest(data: unknown): ActionRequest {
  return ActionRequestSchema.parse(data);
}

/**
 * Safely parse an action request, returning success/error result
 */
export function safeParseActionRequest(data: unknown) {
  return ActionRequestSchema.safeParse(data);
}

/**
 * Safely parse an action reply, returning success/error result
 */
export function safeParseActionReply(data: unknown) {
  return ActionReplySchema.safeParse(data);
}

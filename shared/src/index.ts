/**
 * DeckBridge Shared Types and Protocol
 *
 * This package contains:
 * - Zod schemas for action request/reply validation
 * - TypeScript types shared by the server and API clients
 */

export const VERSION = "0.3.0";

// Core types
export type { ErrorCode, ActionReply, Ease, FieldValue, AnswerButton } from "./types";

// Protocol schemas and constants
export {
  API_VERSION,
  DEFAULT_REQUEST_VERSION,
  ErrorCodeSchema,
  ActionRequestSchema,
  ActionReplySchema,
  NoteAudioSchema,
  NoteParamsSchema,
  ModelTemplateSchema,
  DeckConfigSchema,
  StatsPeriodSchema,
  // Validation utilities
  parseActionRequest,
  safeParseActionRequest,
  safeParseActionReply,
} from "./protocol";

// Protocol types (inferred from Zod schemas)
export type {
  ActionRequest,
  ActionRequestInput,
  NoteAudio,
  NoteParams,
  ModelTemplate,
  DeckConfig,
  StatsPeriod,
} from "./protocol";

import { z } from 'zod';
import type { AnkiClient } from './anki-client.js';

// ============================================================================
// Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  ankiConnectUrl: z.string().url().default('http://localhost:8765'),
  requestTimeoutMs: z.number().int().positive().default(30000).describe('Per-request timeout in milliseconds'),
  defaultDeck: z.string().min(1).default('Default').describe('Deck used when a note names none'),
  defaultModel: z.string().min(1).default('Basic').describe('Note type used when a note names none'),
});

export type Config = z.infer<typeof ConfigSchema>;

// ============================================================================
// AnkiConnect payloads
// ============================================================================

export interface AnkiNote {
  deckName: string;
  modelName: string;
  fields: Record<string, string>;
  tags: string[];
  options: {
    allowDuplicate: boolean;
  };
}

/**
 * Fields to overwrite on an existing note. `tags` replaces the note's tags
 * when present; leaving it out keeps them as they are.
 */
export interface AnkiNoteUpdate {
  id: number;
  fields: Record<string, string>;
  tags?: string[];
}

export type AnkiOutcome<T> =
  | { success: true; result: T }
  | { success: false; error: string };

export const NoteInfoSchema = z.object({
  noteId: z.number(),
  modelName: z.string(),
  tags: z.array(z.string()),
  fields: z.record(z.object({
    value: z.string(),
    order: z.number(),
  })),
});

export type NoteInfo = z.infer<typeof NoteInfoSchema>;

// ============================================================================
// Tool plumbing
// ============================================================================

/**
 * What a handler produces. `text` covers every answer from Anki, failures
 * included; `invalid` means the caller's arguments were rejected before
 * anything was sent.
 */
export type HandlerResult =
  | { kind: 'text'; text: string }
  | { kind: 'invalid'; message: string };

export interface ToolContext {
  anki: AnkiClient;
  config: Config;
  signal?: AbortSignal;
}

export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
};

export type ToolDescriptor = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

export type ToolDefinition = ToolDescriptor & {
  handler: (args: unknown, ctx: ToolContext) => Promise<HandlerResult>;
};

// ============================================================================
// Tool Input Schemas
// ============================================================================

const FieldsSchema = z
  .record(z.string())
  .refine((fields) => Object.keys(fields).length > 0, { message: 'fields must not be empty' });

export const NoteFormatSchema = z
  .enum(['html', 'markdown'])
  .default('html')
  .describe('How field values are written');

export const AddNoteItemSchema = z.object({
  name: z.string().min(1).describe('Identifier used in the report for this note'),
  fields: FieldsSchema.describe('Field values keyed by field name'),
  deck: z.string().min(1).optional().describe('Deck name (default: configured deck)'),
  model: z.string().min(1).optional().describe('Model name (default: configured model)'),
  tags: z.array(z.string()).default([]),
  allowDuplicate: z.boolean().default(false),
});

export const AddNotesInputSchema = z.object({
  notes: z.array(AddNoteItemSchema).min(1),
  format: NoteFormatSchema,
});

export const UpdateNoteItemSchema = z.object({
  id: z.number().int().positive().describe('Anki note ID'),
  fields: FieldsSchema,
  tags: z.array(z.string()).optional().describe('Replacement tags; omit to keep existing tags'),
});

export const UpdateNotesInputSchema = z.object({
  notes: z.array(UpdateNoteItemSchema).min(1),
  format: NoteFormatSchema,
});

export const FindNotesInputSchema = z.object({
  query: z.string().describe('Anki search query, passed through unchanged'),
  limit: z.number().int().positive().max(500).default(50).describe('Max notes to summarize'),
});

export const GetModelFieldsInputSchema = z.object({
  modelName: z.string().min(1),
});

export const NoArgumentsSchema = z.object({});

export type NoteFormat = z.infer<typeof NoteFormatSchema>;

/**
 * update-notes Tool
 *
 * Update fields (and optionally tags) of existing notes, one at a time.
 */

import {
  type AnkiNoteUpdate,
  type HandlerResult,
  type ToolContext,
  type ToolDefinition,
  UpdateNotesInputSchema,
} from '../lib/types.js';
import { renderFields } from '../lib/markup.js';
import { invalidInput, text } from './result.js';

export const updateNotesTool: ToolDefinition = {
  name: 'update-notes',
  description:
    'Update one or more existing notes in Anki. Tags are replaced only when given.',
  inputSchema: {
    type: 'object',
    properties: {
      notes: {
        type: 'array',
        minItems: 1,
        items: {
          type: 'object',
          properties: {
            id: { type: 'integer', description: 'Anki note ID' },
            fields: {
              type: 'object',
              additionalProperties: { type: 'string' },
              description: 'Field values to overwrite',
            },
            tags: {
              type: 'array',
              items: { type: 'string' },
              description: 'Replacement tags. Omit to leave tags unchanged; [] clears them.',
            },
          },
          required: ['id', 'fields'],
        },
      },
      format: {
        type: 'string',
        enum: ['html', 'markdown'],
        description: 'Field markup (default: html)',
        default: 'html',
      },
    },
    required: ['notes'],
  },
  handler: handleUpdateNotes,
};

export async function handleUpdateNotes(
  args: unknown,
  ctx: ToolContext
): Promise<HandlerResult> {
  const parsed = UpdateNotesInputSchema.safeParse(args);

  if (!parsed.success) {
    return invalidInput(parsed.error);
  }

  const { notes, format } = parsed.data;
  const lines: string[] = [];
  let updated = 0;

  for (const item of notes) {
    const update: AnkiNoteUpdate = {
      id: item.id,
      fields: renderFields(item.fields, format),
    };

    // Absent tags must stay absent: AnkiConnect clears tags on []
    if (item.tags !== undefined) {
      update.tags = item.tags;
    }

    const outcome = await ctx.anki.updateNote(update, ctx.signal);

    if (outcome.success) {
      updated++;
      lines.push(`✓ Note ${item.id}: updated`);
    } else {
      lines.push(`✗ Note ${item.id}: ${outcome.error}`);
    }
  }

  return text([`Updated ${updated} of ${notes.length} notes:`, ...lines]);
}

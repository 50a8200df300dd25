/**
 * add-notes Tool
 *
 * Add one or more notes to Anki. Each note is sent on its own, in order, and
 * reported on its own line; one rejected note does not stop the rest.
 */

import {
  type AnkiNote,
  type HandlerResult,
  type ToolContext,
  type ToolDefinition,
  AddNotesInputSchema,
} from '../lib/types.js';
import { renderFields } from '../lib/markup.js';
import { invalidInput, text } from './result.js';

export const addNotesTool: ToolDefinition = {
  name: 'add-notes',
  description:
    'Add one or more notes to Anki. Deck and model default to the configured ones (Default / Basic).',
  inputSchema: {
    type: 'object',
    properties: {
      notes: {
        type: 'array',
        minItems: 1,
        description: 'Notes to add, processed in order',
        items: {
          type: 'object',
          properties: {
            name: { type: 'string', description: 'Identifier for the note, used in the report' },
            fields: {
              type: 'object',
              additionalProperties: { type: 'string' },
              description: 'Field values for the note (varies by model), e.g. {"Front": "...", "Back": "..."}',
            },
            deck: { type: 'string', description: 'Deck name (optional)' },
            model: { type: 'string', description: 'Model name (optional)' },
            tags: { type: 'array', items: { type: 'string' }, description: 'Tags to apply' },
            allowDuplicate: {
              type: 'boolean',
              description: 'Allow a note whose first field duplicates an existing one (default: false)',
              default: false,
            },
          },
          required: ['name', 'fields'],
        },
      },
      format: {
        type: 'string',
        enum: ['html', 'markdown'],
        description: 'Field markup: html is sent as is, markdown is rendered to HTML (default: html)',
        default: 'html',
      },
    },
    required: ['notes'],
  },
  handler: handleAddNotes,
};

export async function handleAddNotes(
  args: unknown,
  ctx: ToolContext
): Promise<HandlerResult> {
  const parsed = AddNotesInputSchema.safeParse(args);

  if (!parsed.success) {
    return invalidInput(parsed.error);
  }

  const { notes, format } = parsed.data;
  const lines: string[] = [];
  let added = 0;

  for (const item of notes) {
    const note: AnkiNote = {
      deckName: item.deck ?? ctx.config.defaultDeck,
      modelName: item.model ?? ctx.config.defaultModel,
      fields: renderFields(item.fields, format),
      tags: item.tags,
      options: {
        allowDuplicate: item.allowDuplicate,
      },
    };

    const outcome = await ctx.anki.addNote(note, ctx.signal);

    if (outcome.success) {
      added++;
      lines.push(`✓ ${item.name}: added to deck '${note.deckName}' with ID ${outcome.result}`);
    } else {
      lines.push(`✗ ${item.name}: ${outcome.error}`);
    }
  }

  return text([`Added ${added} of ${notes.length} notes:`, ...lines]);
}

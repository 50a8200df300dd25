/**
 * find-notes Tool
 *
 * Search notes with Anki's own query syntax and summarize the matches.
 */

import {
  type HandlerResult,
  type NoteInfo,
  type ToolContext,
  type ToolDefinition,
  FindNotesInputSchema,
} from '../lib/types.js';
import { htmlToText, truncate } from '../lib/markup.js';
import { invalidInput, text } from './result.js';

export const findNotesTool: ToolDefinition = {
  name: 'find-notes',
  description:
    'Find notes matching a query in Anki, e.g. "deck:Spanish tag:verbs". The query is passed to Anki unchanged.',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Anki search query',
      },
      limit: {
        type: 'integer',
        description: 'Maximum number of notes to summarize (default: 50)',
        default: 50,
      },
    },
    required: ['query'],
  },
  handler: handleFindNotes,
};

export async function handleFindNotes(
  args: unknown,
  ctx: ToolContext
): Promise<HandlerResult> {
  const parsed = FindNotesInputSchema.safeParse(args);

  if (!parsed.success) {
    return invalidInput(parsed.error);
  }

  const { query, limit } = parsed.data;
  const found = await ctx.anki.findNotes(query, ctx.signal);

  if (!found.success) {
    return text(`Failed to find notes: ${found.error}`);
  }

  const noteIds = found.result;
  if (noteIds.length === 0) {
    return text(`No notes found matching "${query}".`);
  }

  const shown = noteIds.slice(0, limit);
  const more = noteIds.length > shown.length ? ` (showing first ${shown.length})` : '';
  const header = `Found ${noteIds.length} notes matching "${query}"${more}:`;

  const info = await ctx.anki.notesInfo(shown, ctx.signal);
  if (!info.success) {
    return text([
      header,
      ...shown.map((id) => `- ${id}`),
      `(note details unavailable: ${info.error})`,
    ]);
  }

  const byId = new Map(info.result.map((note) => [note.noteId, note]));
  return text([
    header,
    ...shown.map((id) => {
      const note = byId.get(id);
      return note ? `- ${id} [${note.modelName}] ${summarize(note)}` : `- ${id}`;
    }),
  ]);
}

/**
 * Plain text of the note's first field
 */
export function summarize(note: NoteInfo): string {
  const [first] = Object.values(note.fields).sort((a, b) => a.order - b.order);
  return first ? truncate(htmlToText(first.value), 80) : '';
}

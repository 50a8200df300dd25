/**
 * list-decks Tool
 */

import {
  type HandlerResult,
  type ToolContext,
  type ToolDefinition,
  NoArgumentsSchema,
} from '../lib/types.js';
import { invalidInput, text } from './result.js';

export const listDecksTool: ToolDefinition = {
  name: 'list-decks',
  description: 'List all available decks in Anki',
  inputSchema: {
    type: 'object',
    properties: {},
  },
  handler: handleListDecks,
};

export async function handleListDecks(
  args: unknown,
  ctx: ToolContext
): Promise<HandlerResult> {
  const parsed = NoArgumentsSchema.safeParse(args);

  if (!parsed.success) {
    return invalidInput(parsed.error);
  }

  const decks = await ctx.anki.deckNames(ctx.signal);

  if (!decks.success) {
    return text(`Failed to retrieve decks: ${decks.error}`);
  }

  return text([
    `Available decks in Anki (${decks.result.length}):`,
    ...decks.result.map((deck) => `- ${deck}`),
  ]);
}

/**
 * get-collection-overview Tool
 *
 * Decks, models and each model's fields in one summary. Pieces that fail are
 * reported in place so the rest of the overview still comes through.
 */

import {
  type HandlerResult,
  type ToolContext,
  type ToolDefinition,
  NoArgumentsSchema,
} from '../lib/types.js';
import { invalidInput, text } from './result.js';

export const getCollectionOverviewTool: ToolDefinition = {
  name: 'get-collection-overview',
  description:
    'Get comprehensive information about the Anki collection including decks, models, and fields',
  inputSchema: {
    type: 'object',
    properties: {},
  },
  handler: handleGetCollectionOverview,
};

export async function handleGetCollectionOverview(
  args: unknown,
  ctx: ToolContext
): Promise<HandlerResult> {
  const parsed = NoArgumentsSchema.safeParse(args);

  if (!parsed.success) {
    return invalidInput(parsed.error);
  }

  const lines: string[] = ['Anki collection overview', ''];

  const decks = await ctx.anki.deckNames(ctx.signal);
  if (decks.success) {
    lines.push(`Decks (${decks.result.length}):`, ...decks.result.map((deck) => `- ${deck}`));
  } else {
    lines.push(`Failed to retrieve decks: ${decks.error}`);
  }

  lines.push('');

  const models = await ctx.anki.modelNames(ctx.signal);
  if (!models.success) {
    lines.push(`Failed to retrieve models: ${models.error}`);
    return text(lines);
  }

  lines.push(`Models (${models.result.length}):`);
  for (const model of models.result) {
    const fields = await ctx.anki.modelFieldNames(model, ctx.signal);
    lines.push(
      fields.success
        ? `- ${model}: ${fields.result.join(', ')}`
        : `- ${model}: (fields unavailable: ${fields.error})`
    );
  }

  return text(lines);
}

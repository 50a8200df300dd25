/**
 * get-cards-reviewed Tool
 */

import {
  type HandlerResult,
  type ToolContext,
  type ToolDefinition,
  NoArgumentsSchema,
} from '../lib/types.js';
import { invalidInput, text } from './result.js';

export const getCardsReviewedTool: ToolDefinition = {
  name: 'get-cards-reviewed',
  description: 'Get the number of cards reviewed by day',
  inputSchema: {
    type: 'object',
    properties: {},
  },
  handler: handleGetCardsReviewed,
};

export async function handleGetCardsReviewed(
  args: unknown,
  ctx: ToolContext
): Promise<HandlerResult> {
  const parsed = NoArgumentsSchema.safeParse(args);

  if (!parsed.success) {
    return invalidInput(parsed.error);
  }

  const reviews = await ctx.anki.getNumCardsReviewedByDay(ctx.signal);

  if (!reviews.success) {
    return text(`Failed to retrieve review history: ${reviews.error}`);
  }

  if (reviews.result.length === 0) {
    return text('No review history found.');
  }

  return text([
    'Cards reviewed by day:',
    ...reviews.result.map(([day, count]) => `${day}: ${count} cards`),
  ]);
}

/**
 * list-models Tool
 */

import {
  type HandlerResult,
  type ToolContext,
  type ToolDefinition,
  NoArgumentsSchema,
} from '../lib/types.js';
import { invalidInput, text } from './result.js';

export const listModelsTool: ToolDefinition = {
  name: 'list-models',
  description: 'List all note models (note types) available in Anki',
  inputSchema: {
    type: 'object',
    properties: {},
  },
  handler: handleListModels,
};

export async function handleListModels(
  args: unknown,
  ctx: ToolContext
): Promise<HandlerResult> {
  const parsed = NoArgumentsSchema.safeParse(args);

  if (!parsed.success) {
    return invalidInput(parsed.error);
  }

  const models = await ctx.anki.modelNames(ctx.signal);

  if (!models.success) {
    return text(`Failed to retrieve models: ${models.error}`);
  }

  return text([
    `Available models in Anki (${models.result.length}):`,
    ...models.result.map((model) => `- ${model}`),
  ]);
}

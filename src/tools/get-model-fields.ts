/**
 * get-model-fields Tool
 *
 * Field names and descriptions come from two separate AnkiConnect actions.
 * When only one of them fails, that failure is reported by name.
 */

import {
  type HandlerResult,
  type ToolContext,
  type ToolDefinition,
  GetModelFieldsInputSchema,
} from '../lib/types.js';
import { invalidInput, text } from './result.js';

export const getModelFieldsTool: ToolDefinition = {
  name: 'get-model-fields',
  description: 'Get the field names (and their descriptions) of a note model',
  inputSchema: {
    type: 'object',
    properties: {
      modelName: {
        type: 'string',
        description: 'Model name, e.g. "Basic"',
      },
    },
    required: ['modelName'],
  },
  handler: handleGetModelFields,
};

export async function handleGetModelFields(
  args: unknown,
  ctx: ToolContext
): Promise<HandlerResult> {
  const parsed = GetModelFieldsInputSchema.safeParse(args);

  if (!parsed.success) {
    return invalidInput(parsed.error);
  }

  const { modelName } = parsed.data;
  const names = await ctx.anki.modelFieldNames(modelName, ctx.signal);
  const descriptions = await ctx.anki.modelFieldDescriptions(modelName, ctx.signal);

  if (!names.success && !descriptions.success) {
    return text(`Failed to get fields for model '${modelName}': ${names.error}`);
  }
  if (!names.success) {
    return text(`Failed to get field names for model '${modelName}': ${names.error}`);
  }
  if (!descriptions.success) {
    return text(`Failed to get field descriptions for model '${modelName}': ${descriptions.error}`);
  }

  return text([
    `Fields for model '${modelName}' (${names.result.length}):`,
    ...names.result.map((name, i) => {
      const description = (descriptions.result[i] ?? '').trim();
      return description ? `- ${name}: ${description}` : `- ${name}`;
    }),
  ]);
}

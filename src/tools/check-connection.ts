/**
 * check-connection Tool
 *
 * Ask AnkiConnect for its version. An unreachable Anki is reported as text,
 * not as a tool error.
 */

import {
  type HandlerResult,
  type ToolContext,
  type ToolDefinition,
  NoArgumentsSchema,
} from '../lib/types.js';
import { invalidInput, text } from './result.js';

export const checkConnectionTool: ToolDefinition = {
  name: 'check-connection',
  description: 'Check connection to Anki (requires Anki running with the AnkiConnect add-on)',
  inputSchema: {
    type: 'object',
    properties: {},
  },
  handler: handleCheckConnection,
};

export async function handleCheckConnection(
  args: unknown,
  ctx: ToolContext
): Promise<HandlerResult> {
  const parsed = NoArgumentsSchema.safeParse(args);

  if (!parsed.success) {
    return invalidInput(parsed.error);
  }

  const version = await ctx.anki.version(ctx.signal);

  if (!version.success) {
    return text(`Failed to connect to AnkiConnect: ${version.error}`);
  }

  return text(`Connected to AnkiConnect v${version.result}`);
}

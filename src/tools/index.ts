/**
 * Tool Registry
 *
 * The fixed set of MCP tools, built once at load time.
 */

import {
  type HandlerResult,
  type ToolContext,
  type ToolDefinition,
  type ToolDescriptor,
} from '../lib/types.js';
import { addNotesTool } from './add-notes.js';
import { updateNotesTool } from './update-notes.js';
import { findNotesTool } from './find-notes.js';
import { listDecksTool } from './list-decks.js';
import { listModelsTool } from './list-models.js';
import { getModelFieldsTool } from './get-model-fields.js';
import { getCardsReviewedTool } from './get-cards-reviewed.js';
import { checkConnectionTool } from './check-connection.js';
import { getCollectionOverviewTool } from './get-collection-overview.js';

export type ToolCallOutcome = HandlerResult | { kind: 'unknown'; name: string };

/**
 * All available tools for MCP registration
 */
export const allTools: readonly ToolDefinition[] = Object.freeze([
  addNotesTool,
  updateNotesTool,
  findNotesTool,
  listDecksTool,
  listModelsTool,
  getModelFieldsTool,
  getCardsReviewedTool,
  checkConnectionTool,
  getCollectionOverviewTool,
]);

const toolsByName = new Map(allTools.map((tool) => [tool.name, tool]));

export function listTools(): ToolDescriptor[] {
  return allTools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema }));
}

/**
 * Dispatch a call by tool name. Missing arguments are treated as `{}`.
 */
export async function callTool(
  name: string,
  args: unknown,
  ctx: ToolContext
): Promise<ToolCallOutcome> {
  const tool = toolsByName.get(name);

  if (!tool) {
    return { kind: 'unknown', name };
  }

  return tool.handler(args ?? {}, ctx);
}

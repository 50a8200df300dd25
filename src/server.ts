/**
 * MCP server wiring: tools, deck resources and prompts on top of one AnkiClient.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';

import { type Config } from './lib/types.js';
import { AnkiClient } from './lib/anki-client.js';
import { listDeckResources, readDeckResource } from './lib/resources.js';
import { getPrompt, listPrompts } from './lib/prompts.js';
import { type ToolCallOutcome, callTool, listTools } from './tools/index.js';

export const SERVER_NAME = 'anki';
export const SERVER_VERSION = '0.1.0';

export function createServer(
  config: Config,
  anki = new AnkiClient(config.ankiConnectUrl, config.requestTimeoutMs)
): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    }
  );

  // Handle list_tools request
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: listTools() };
  });

  // Handle call_tool request
  server.setRequestHandler(CallToolRequestSchema, async (request, extra): Promise<CallToolResult> => {
    const { name, arguments: args } = request.params;
    let outcome: ToolCallOutcome;

    try {
      outcome = await callTool(name, args, { anki, config, signal: extra.signal });
    } catch (error) {
      console.error(`Tool ${name} failed:`, error);
      return {
        content: [
          {
            type: 'text',
            text: `Tool execution failed: ${error instanceof Error ? error.message : String(error)}`,
          },
        ],
        isError: true,
      };
    }

    switch (outcome.kind) {
      case 'unknown':
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${outcome.name}`);
      case 'invalid':
        throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${name}: ${outcome.message}`);
      case 'text':
        return {
          content: [
            {
              type: 'text',
              text: outcome.text,
            },
          ],
        };
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async (_request, extra) => {
    return { resources: await listDeckResources(anki, extra.signal) };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
    const { uri } = request.params;
    return {
      contents: [
        {
          uri,
          mimeType: 'text/plain',
          text: await readDeckResource(uri, anki, extra.signal),
        },
      ],
    };
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return { prompts: listPrompts() };
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    return getPrompt(request.params.name, request.params.arguments);
  });

  return server;
}

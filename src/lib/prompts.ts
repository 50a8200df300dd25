/**
 * Prompt templates offered to MCP clients
 */

import {
  ErrorCode,
  McpError,
  type GetPromptResult,
  type Prompt,
} from '@modelcontextprotocol/sdk/types.js';

export const CREATE_FLASHCARD_PROMPT: Prompt = {
  name: 'create-flashcard',
  description: 'Creates a new Anki flashcard',
  arguments: [
    {
      name: 'topic',
      description: 'Topic for the flashcard',
      required: true,
    },
  ],
};

export function listPrompts(): Prompt[] {
  return [CREATE_FLASHCARD_PROMPT];
}

export function getPrompt(
  name: string,
  args: Record<string, string> | undefined
): GetPromptResult {
  if (name !== CREATE_FLASHCARD_PROMPT.name) {
    throw new McpError(ErrorCode.InvalidParams, `Unknown prompt: ${name}`);
  }

  const topic = args?.topic?.trim();
  if (!topic) {
    throw new McpError(ErrorCode.InvalidParams, 'Missing required argument: topic');
  }

  return {
    description: `Create an Anki flashcard about ${topic}`,
    messages: [
      {
        role: 'user',
        content: {
          type: 'text',
          text:
            `Create a flashcard about ${topic}. The flashcard should have a clear question on the front ` +
            'and a concise answer on the back. Make sure the content is factually accurate and educational.',
        },
      },
    ],
  };
}

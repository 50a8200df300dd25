#!/usr/bin/env node

/**
 * Anki MCP Server
 *
 * Exposes AnkiConnect as MCP tools so an assistant can add, update and
 * search flashcards. Communicates over STDIO transport.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { type Config } from './lib/types.js';
import { readConfig } from './lib/config.js';
import { createServer } from './server.js';

/**
 * Load configuration from environment variables
 */
function loadConfig(): Config {
  const result = readConfig();

  if (!result.success) {
    console.error('Configuration error:');
    for (const issue of result.error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    console.error('\nOptional environment variables:');
    console.error('  ANKI_CONNECT_URL         AnkiConnect endpoint (default: http://localhost:8765)');
    console.error('  ANKI_CONNECT_TIMEOUT_MS  Request timeout in ms (default: 30000)');
    console.error('  ANKI_DEFAULT_DECK        Deck for new notes (default: Default)');
    console.error('  ANKI_DEFAULT_MODEL       Model for new notes (default: Basic)');
    process.exit(1);
  }

  return result.data;
}

async function main() {
  const config = loadConfig();
  const server = createServer(config);

  // Connect via STDIO transport
  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('Anki MCP server running');
  console.error(`AnkiConnect: ${config.ankiConnectUrl}`);
  console.error(`Default deck: ${config.defaultDeck}, default model: ${config.defaultModel}`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});

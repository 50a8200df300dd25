import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';

import { createServer } from './server.js';
import { ConfigSchema } from './lib/types.js';
import { fakeAnkiConnect } from './test-utils/fake-anki-connect.js';

describe('MCP server', () => {
  let client: Client;

  beforeEach(async () => {
    const server = createServer(ConfigSchema.parse({}));
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    vi.unstubAllGlobals();
  });

  it('lists the registered tools', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'add-notes',
      'update-notes',
      'find-notes',
      'list-decks',
      'list-models',
      'get-model-fields',
      'get-cards-reviewed',
      'check-connection',
      'get-collection-overview',
    ]);
  });

  it('returns formatted text for a tool call', async () => {
    fakeAnkiConnect({ deckNames: () => ['Default'] });

    const result = await client.callTool({ name: 'list-decks', arguments: {} });

    expect(result.content).toEqual([{ type: 'text', text: 'Available decks in Anki (1):\n- Default' }]);
    expect(result.isError).toBeFalsy();
  });

  it('returns Anki failures as a normal result', async () => {
    fakeAnkiConnect({});

    const result = await client.callTool({ name: 'check-connection', arguments: {} });

    expect(result.content).toEqual([
      { type: 'text', text: 'Failed to connect to AnkiConnect: unsupported action' },
    ]);
    expect(result.isError).toBeFalsy();
  });

  it('rejects malformed arguments as a protocol error', async () => {
    const { fetchMock } = fakeAnkiConnect({});

    await expect(client.callTool({ name: 'get-model-fields', arguments: {} })).rejects.toThrow(
      'Invalid arguments for get-model-fields: modelName: Required'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects unknown tools', async () => {
    await expect(client.callTool({ name: 'delete-deck', arguments: {} })).rejects.toThrow(
      'Unknown tool: delete-deck'
    );
  });

  it('exposes decks as resources', async () => {
    fakeAnkiConnect({
      deckNames: () => ['French'],
      findNotes: () => [5],
      notesInfo: () => [
        { noteId: 5, modelName: 'Basic', tags: [], fields: { Front: { value: 'Hola', order: 0 } } },
      ],
    });

    const { resources } = await client.listResources();
    const read = await client.readResource({ uri: 'anki://decks/French' });

    expect(resources.map((resource) => resource.uri)).toEqual(['anki://decks/French']);
    expect(read.contents).toEqual([
      { uri: 'anki://decks/French', mimeType: 'text/plain', text: 'Note 5\nFront: Hola' },
    ]);
  });

  it('serves the create-flashcard prompt', async () => {
    const { prompts } = await client.listPrompts();
    const prompt = await client.getPrompt({ name: 'create-flashcard', arguments: { topic: 'tides' } });

    expect(prompts.map((p) => p.name)).toEqual(['create-flashcard']);
    expect(prompt.description).toBe('Create an Anki flashcard about tides');
  });
});

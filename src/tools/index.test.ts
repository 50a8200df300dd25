import { afterEach, describe, expect, it, vi } from 'vitest';
import { allTools, callTool, listTools } from './index.js';
import { fakeAnkiConnect, testContext } from '../test-utils/fake-anki-connect.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('tool registry', () => {
  it('registers every tool once', () => {
    expect(allTools.map((tool) => tool.name)).toEqual([
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

  it('lists descriptors without handlers', () => {
    const [descriptor] = listTools();

    expect(Object.keys(descriptor ?? {})).toEqual(['name', 'description', 'inputSchema']);
    expect(descriptor?.inputSchema.required).toEqual(['notes']);
  });

  it('dispatches by name and treats missing arguments as empty', async () => {
    fakeAnkiConnect({ deckNames: () => ['Default'] });

    const outcome = await callTool('list-decks', undefined, testContext());

    expect(outcome).toEqual({ kind: 'text', text: 'Available decks in Anki (1):\n- Default' });
  });

  it('reports unknown tools', async () => {
    const outcome = await callTool('delete-deck', {}, testContext());

    expect(outcome).toEqual({ kind: 'unknown', name: 'delete-deck' });
  });
});

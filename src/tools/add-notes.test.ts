import { afterEach, describe, expect, it, vi } from 'vitest';
import { handleAddNotes } from './add-notes.js';
import { fakeAnkiConnect, testContext } from '../test-utils/fake-anki-connect.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('add-notes', () => {
  it('adds each note on its own and reports them in input order', async () => {
    let calls = 0;
    const { requests } = fakeAnkiConnect({
      addNote: () => {
        calls++;
        if (calls === 2) {
          throw new Error('cannot create note because it is a duplicate');
        }
        return 1000 + calls;
      },
    });

    const result = await handleAddNotes(
      {
        notes: [
          { name: 'capital-fr', fields: { Front: 'Capital of France?', Back: 'Paris' } },
          { name: 'dup', fields: { Front: 'Capital of France?', Back: 'Paris' }, deck: 'Geography' },
          {
            name: 'sum',
            fields: { Front: '2 + 2', Back: '4' },
            deck: 'Math',
            model: 'Basic (and reversed card)',
            tags: ['arithmetic'],
          },
        ],
      },
      testContext()
    );

    expect(result).toEqual({
      kind: 'text',
      text: [
        'Added 2 of 3 notes:',
        "✓ capital-fr: added to deck 'Default' with ID 1001",
        '✗ dup: cannot create note because it is a duplicate',
        "✓ sum: added to deck 'Math' with ID 1003",
      ].join('\n'),
    });
    expect(requests.map((r) => r.action)).toEqual(['addNote', 'addNote', 'addNote']);
    expect(requests[0]?.params).toEqual({
      note: {
        deckName: 'Default',
        modelName: 'Basic',
        fields: { Front: 'Capital of France?', Back: 'Paris' },
        tags: [],
        options: { allowDuplicate: false },
      },
    });
    expect(requests[2]?.params).toEqual({
      note: {
        deckName: 'Math',
        modelName: 'Basic (and reversed card)',
        fields: { Front: '2 + 2', Back: '4' },
        tags: ['arithmetic'],
        options: { allowDuplicate: false },
      },
    });
  });

  it('uses the configured default deck and model', async () => {
    const { requests } = fakeAnkiConnect({ addNote: () => 7 });
    const ctx = testContext();
    ctx.config = { ...ctx.config, defaultDeck: 'Inbox', defaultModel: 'Cloze' };

    const result = await handleAddNotes({ notes: [{ name: 'c', fields: { Text: '{{c1::Paris}}' } }] }, ctx);

    expect(result).toEqual({
      kind: 'text',
      text: "Added 1 of 1 notes:\n✓ c: added to deck 'Inbox' with ID 7",
    });
    expect(requests[0]?.params).toMatchObject({ note: { deckName: 'Inbox', modelName: 'Cloze' } });
  });

  it('renders markdown fields before sending them', async () => {
    const { requests } = fakeAnkiConnect({ addNote: () => 1 });

    await handleAddNotes(
      {
        format: 'markdown',
        notes: [{ name: 'md', fields: { Front: '**bold**', Back: 'line one\nline two' } }],
      },
      testContext()
    );

    expect(requests[0]?.params).toMatchObject({
      note: { fields: { Front: '<p><strong>bold</strong></p>', Back: '<p>line one<br>line two</p>' } },
    });
  });

  it('rejects a note without fields before calling Anki', async () => {
    const { fetchMock } = fakeAnkiConnect({ addNote: () => 1 });

    const result = await handleAddNotes({ notes: [{ name: 'empty', fields: {} }] }, testContext());

    expect(result).toEqual({ kind: 'invalid', message: 'notes.0.fields: fields must not be empty' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects a note without a name', async () => {
    fakeAnkiConnect({ addNote: () => 1 });

    const result = await handleAddNotes({ notes: [{ fields: { Front: 'x' } }] }, testContext());

    expect(result).toEqual({ kind: 'invalid', message: 'notes.0.name: Required' });
  });

  it('rejects an empty batch', async () => {
    const result = await handleAddNotes({ notes: [] }, testContext());

    expect(result.kind).toBe('invalid');
  });
});

/**
 * Deck resources
 *
 * Each deck is exposed as `anki://decks/<deck name>`. Listing and reading
 * both query Anki live; nothing is cached between requests.
 */

import { ErrorCode, McpError, type Resource } from '@modelcontextprotocol/sdk/types.js';
import { type AnkiClient } from './anki-client.js';
import { htmlToText } from './markup.js';

export const DECK_URI_PREFIX = 'anki://decks/';

export function deckUri(deckName: string): string {
  return `${DECK_URI_PREFIX}${encodeURIComponent(deckName)}`;
}

/**
 * Anki search term matching one deck (and its subdecks)
 */
export function deckQuery(deckName: string): string {
  return `deck:"${deckName.replace(/(["\\])/g, '\\$1')}"`;
}

export async function listDeckResources(
  anki: AnkiClient,
  signal?: AbortSignal
): Promise<Resource[]> {
  const decks = await anki.deckNames(signal);

  if (!decks.success) {
    throw new McpError(ErrorCode.InternalError, `Failed to retrieve decks: ${decks.error}`);
  }

  return decks.result.map((deck) => ({
    uri: deckUri(deck),
    name: `Deck: ${deck}`,
    description: `Notes in the Anki deck '${deck}'`,
    mimeType: 'text/plain',
  }));
}

export async function readDeckResource(
  uri: string,
  anki: AnkiClient,
  signal?: AbortSignal
): Promise<string> {
  if (!uri.startsWith(DECK_URI_PREFIX) || uri.length === DECK_URI_PREFIX.length) {
    throw new McpError(ErrorCode.InvalidParams, `Unsupported resource URI: ${uri}`);
  }

  const deckName = decodeURIComponent(uri.slice(DECK_URI_PREFIX.length));
  const found = await anki.findNotes(deckQuery(deckName), signal);

  if (!found.success) {
    throw new McpError(ErrorCode.InternalError, `Failed to find notes in deck '${deckName}': ${found.error}`);
  }

  if (found.result.length === 0) {
    return `Deck '${deckName}' has no notes.`;
  }

  const info = await anki.notesInfo(found.result, signal);

  if (!info.success) {
    throw new McpError(ErrorCode.InternalError, `Failed to read notes in deck '${deckName}': ${info.error}`);
  }

  return info.result
    .map((note) => {
      const fields = Object.entries(note.fields)
        .sort(([, a], [, b]) => a.order - b.order)
        .map(([name, field]) => `${name}: ${htmlToText(field.value)}`);
      return [`Note ${note.noteId}`, ...fields].join('\n');
    })
    .join('\n\n');
}

/**
 * Field markup for Anki notes
 *
 * Anki stores field values as HTML. Notes written in Markdown are rendered
 * with marked on the way in; on the way out, HTML is flattened to plain text
 * for summaries.
 */

import { marked } from 'marked';
import { type NoteFormat } from './types.js';

marked.setOptions({
  breaks: true,  // Convert \n to <br>
  gfm: true,     // GitHub Flavored Markdown
});

const ENTITIES: Record<string, string> = {
  '&nbsp;': ' ',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&amp;': '&',
};

/**
 * Convert Markdown to HTML using marked
 */
export function markdownToHtml(text: string): string {
  // marked.parse can return string or Promise<string>, we use sync mode
  const result = marked.parse(text);
  return typeof result === 'string' ? result.trim() : text;
}

export function renderFields(
  fields: Record<string, string>,
  format: NoteFormat
): Record<string, string> {
  if (format === 'html') {
    return fields;
  }
  return Object.fromEntries(
    Object.entries(fields).map(([name, value]) => [name, markdownToHtml(value)])
  );
}

/**
 * Strip tags and decode the common entities. `&amp;` is decoded last so that
 * `&amp;lt;` stays `&lt;`.
 */
export function htmlToText(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, ' ')
    .replace(/<[^>]*>/g, '')
    .replace(/&(?:nbsp|lt|gt|quot|#39);/g, (entity) => ENTITIES[entity] ?? entity)
    .replace(/&amp;/g, '&')
    .replace(/\s+/g, ' ')
    .trim();
}

export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.substring(0, maxLen - 3) + '...';
}

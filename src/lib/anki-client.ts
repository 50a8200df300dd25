/**
 * AnkiConnect API Client
 *
 * Every call is a single POST to the AnkiConnect add-on (localhost:8765 by
 * default, no auth). Failures of any kind come back as an AnkiOutcome, never
 * as a thrown error.
 */

import { z } from 'zod';
import {
  type AnkiNote,
  type AnkiNoteUpdate,
  type AnkiOutcome,
  type NoteInfo,
  NoteInfoSchema,
} from './types.js';

export const ANKI_CONNECT_VERSION = 6;

// AnkiConnect API types (subset we use)
interface AnkiConnectRequest {
  action: string;
  version: number;
  params?: Record<string, unknown>;
}

const AnkiConnectResponseSchema = z.object({
  result: z.unknown(),
  error: z.string().nullable().optional(),
});

const ReviewsByDaySchema = z.array(z.tuple([z.string(), z.number()]));

/**
 * Flatten an error and its cause, so that a refused connection reads as
 * "fetch failed: connect ECONNREFUSED ..." rather than just "fetch failed".
 */
function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause instanceof Error && error.cause.message) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}

export class AnkiClient {
  private url: string;
  private timeoutMs: number;

  constructor(url = 'http://localhost:8765', timeoutMs = 30000) {
    this.url = url;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Send one request to AnkiConnect and normalize the `{result, error}` envelope.
   * `params` is left out of the body when empty.
   */
  async invoke(
    action: string,
    params?: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<AnkiOutcome<unknown>> {
    const request: AnkiConnectRequest = {
      action,
      version: ANKI_CONNECT_VERSION,
    };
    if (params && Object.keys(params).length > 0) {
      request.params = params;
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(request),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });

      if (!response.ok) {
        return { success: false, error: `AnkiConnect HTTP error: ${response.status}` };
      }

      const body: unknown = await response.json();
      const envelope = AnkiConnectResponseSchema.safeParse(body);

      if (!envelope.success || typeof body !== 'object' || body === null || !('result' in body)) {
        return { success: false, error: 'Malformed AnkiConnect response: expected {result, error}' };
      }

      if (envelope.data.error) {
        return { success: false, error: envelope.data.error };
      }

      return { success: true, result: envelope.data.result };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  /**
   * Invoke an action and check its result against the shape we rely on
   */
  private async request<T>(
    action: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    params?: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<AnkiOutcome<T>> {
    const outcome = await this.invoke(action, params, signal);
    if (!outcome.success) {
      return outcome;
    }

    const parsed = schema.safeParse(outcome.result);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
      return { success: false, error: `Unexpected result for ${action}: ${issues}` };
    }

    return { success: true, result: parsed.data };
  }

  async version(signal?: AbortSignal): Promise<AnkiOutcome<number>> {
    return this.request('version', z.number(), undefined, signal);
  }

  async deckNames(signal?: AbortSignal): Promise<AnkiOutcome<string[]>> {
    return this.request('deckNames', z.array(z.string()), undefined, signal);
  }

  async modelNames(signal?: AbortSignal): Promise<AnkiOutcome<string[]>> {
    return this.request('modelNames', z.array(z.string()), undefined, signal);
  }

  async modelFieldNames(modelName: string, signal?: AbortSignal): Promise<AnkiOutcome<string[]>> {
    return this.request('modelFieldNames', z.array(z.string()), { modelName }, signal);
  }

  async modelFieldDescriptions(modelName: string, signal?: AbortSignal): Promise<AnkiOutcome<string[]>> {
    return this.request('modelFieldDescriptions', z.array(z.string()), { modelName }, signal);
  }

  /**
   * Search notes. The query goes to Anki exactly as given, so an empty query
   * means whatever Anki's search grammar makes of it.
   */
  async findNotes(query: string, signal?: AbortSignal): Promise<AnkiOutcome<number[]>> {
    return this.request('findNotes', z.array(z.number()), { query }, signal);
  }

  /**
   * Fetch note details. AnkiConnect answers `{}` for ids that no longer
   * exist; those entries are dropped.
   */
  async notesInfo(noteIds: number[], signal?: AbortSignal): Promise<AnkiOutcome<NoteInfo[]>> {
    const outcome = await this.request('notesInfo', z.array(z.unknown()), { notes: noteIds }, signal);
    if (!outcome.success) {
      return outcome;
    }

    const notes: NoteInfo[] = [];
    for (const entry of outcome.result) {
      const parsed = NoteInfoSchema.safeParse(entry);
      if (parsed.success) {
        notes.push(parsed.data);
      }
    }
    return { success: true, result: notes };
  }

  /**
   * Add a new note to Anki, returning the assigned note ID
   */
  async addNote(note: AnkiNote, signal?: AbortSignal): Promise<AnkiOutcome<number>> {
    return this.request('addNote', z.number(), { note }, signal);
  }

  async updateNote(update: AnkiNoteUpdate, signal?: AbortSignal): Promise<AnkiOutcome<unknown>> {
    return this.invoke('updateNote', { note: update }, signal);
  }

  /**
   * Review counts as `[day, count]` pairs, as AnkiConnect orders them
   */
  async getNumCardsReviewedByDay(signal?: AbortSignal): Promise<AnkiOutcome<Array<[string, number]>>> {
    return this.request('getNumCardsReviewedByDay', ReviewsByDaySchema, undefined, signal);
  }
}

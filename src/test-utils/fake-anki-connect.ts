import { vi } from 'vitest';
import { AnkiClient } from '../lib/anki-client.js';
import { ConfigSchema, type ToolContext } from '../lib/types.js';

export interface RecordedRequest {
  action: string;
  version: number;
  params?: Record<string, unknown>;
}

type ActionHandler = (params: Record<string, unknown> | undefined) => unknown;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Replace global fetch with an in-process AnkiConnect. A handler's return
 * value becomes `result`; a thrown error becomes the envelope's `error`.
 * Actions without a handler answer like AnkiConnect does for unknown actions.
 */
export function fakeAnkiConnect(actions: Record<string, ActionHandler>) {
  const requests: RecordedRequest[] = [];

  const fetchMock = vi.fn(async (_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const request: RecordedRequest = JSON.parse(String(init?.body));
    requests.push(request);

    const handler = actions[request.action];
    if (!handler) {
      return jsonResponse({ result: null, error: 'unsupported action' });
    }

    try {
      return jsonResponse({ result: handler(request.params) ?? null, error: null });
    } catch (error) {
      return jsonResponse({ result: null, error: error instanceof Error ? error.message : String(error) });
    }
  });

  vi.stubGlobal('fetch', fetchMock);
  return { requests, fetchMock };
}

export function testContext(): ToolContext {
  return {
    anki: new AnkiClient(),
    config: ConfigSchema.parse({}),
  };
}

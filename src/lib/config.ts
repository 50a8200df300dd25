import { ConfigSchema } from './types.js';

/**
 * Read configuration from environment variables. Every variable is optional;
 * unset ones fall back to the AnkiConnect defaults.
 */
export function readConfig(env: NodeJS.ProcessEnv = process.env) {
  const rawConfig = {
    ankiConnectUrl: env.ANKI_CONNECT_URL || 'http://localhost:8765',
    requestTimeoutMs: parseInt(env.ANKI_CONNECT_TIMEOUT_MS || '30000', 10),
    defaultDeck: env.ANKI_DEFAULT_DECK || 'Default',
    defaultModel: env.ANKI_DEFAULT_MODEL || 'Basic',
  };

  return ConfigSchema.safeParse(rawConfig);
}

import { type z } from 'zod';
import { type HandlerResult } from '../lib/types.js';

export function text(lines: string | string[]): HandlerResult {
  return { kind: 'text', text: Array.isArray(lines) ? lines.join('\n') : lines };
}

/**
 * Reject the caller's arguments, e.g. `notes.0.fields: fields must not be empty`
 */
export function invalidInput(error: z.ZodError): HandlerResult {
  const message = error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
    .join('; ');
  return { kind: 'invalid', message };
}

import type { z } from 'zod';
import { stripCodeFences } from './html.js';
import { errorMessage } from './log.js';

export type JsonReply<T> =
  | { ok: true; data: T }
  | { ok: false; reason: 'not_json' | 'invalid'; error: string };

function tryParse(text: string): { value: unknown } | null {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return null;
  }
}

/**
 * Pulls JSON out of a model reply. Fences are dropped first; when the rest
 * still is not JSON, the widest `{...}` span and then `[...]` span are tried,
 * which covers replies wrapped in a sentence of prose.
 */
export function extractJson(raw: string): unknown {
  const text = stripCodeFences(raw);
  const whole = tryParse(text);
  if (whole) return whole.value;

  for (const span of [/\{[\s\S]*\}/, /\[[\s\S]*\]/]) {
    const match = span.exec(text);
    const inner = match ? tryParse(match[0]) : null;
    if (inner) return inner.value;
  }
  throw new SyntaxError(`no JSON found in reply starting "${text.slice(0, 40)}"`);
}

export function parseJsonReply<S extends z.ZodTypeAny>(raw: string, schema: S): JsonReply<z.output<S>> {
  let json: unknown;
  try {
    json = extractJson(raw);
  } catch (err) {
    return { ok: false, reason: 'not_json', error: errorMessage(err) };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, reason: 'invalid', error: parsed.error.issues[0]?.message ?? 'invalid' };
  }
  return { ok: true, data: parsed.data };
}

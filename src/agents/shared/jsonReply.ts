import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Removes a Markdown code fence around a model reply:
 * a leading ``` or ```json line and a trailing ```.
 */
export function stripCodeFences(reply: string): string {
  return reply
    .trim()
    .replace(/^```(?:json)?[ \t]*\r?\n?/i, '')
    .replace(/\r?\n?```$/, '')
    .trim();
}

/**
 * Parses a model reply that should hold one JSON value.
 * Returns null when the text is not JSON or does not match the schema.
 */
export function parseJsonReply<T>(reply: string, schema: ZodType<T, ZodTypeDef, unknown>): T | null {
  let value: unknown;
  try {
    value = JSON.parse(stripCodeFences(reply));
  } catch {
    return null;
  }

  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

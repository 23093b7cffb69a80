import { DecodeError } from './llm-errors.js';

export type StructuredResponse = Record<string, unknown>;

/**
 * Removes a leading markdown fence (optionally tagged, e.g. ```json) and a
 * trailing fence. Text without fences comes back trimmed.
 */
export function stripCodeFence(text: string): string {
  return text
    .trim()
    .replace(/^```[\w-]*[ \t]*\r?\n?/, '')
    .replace(/\r?\n?```\s*$/, '')
    .trim();
}

/**
 * Parses LLM output as a JSON object. Fails closed: no repair, no partial
 * parsing, arrays and primitives are rejected.
 */
export function decodeStructured(text: string): StructuredResponse {
  const cleaned = stripCodeFence(text);
  if (!cleaned) {
    throw new DecodeError('Empty response text', text);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (err) {
    throw new DecodeError(
      `Response is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      text,
    );
  }

  if (!isStructured(parsed)) {
    throw new DecodeError('Response JSON is not an object', text);
  }
  return parsed;
}

function isStructured(value: unknown): value is StructuredResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

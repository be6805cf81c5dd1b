/**
 * Parse JSON text, returning undefined instead of throwing on malformed input
 * so callers can fall through to a Zod schema check
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

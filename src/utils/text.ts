// Replacement char, C0 controls + DEL, and bidi marks/embeddings/isolates that render as gibberish
const REPLACEMENT_CHAR = /\uFFFD/g;
const CONTROL_CHARS = /[\u0000-\u001F\u007F]/g;
const BIDI_MARKS = /[\u200E\u200F\u202A-\u202E\u2066-\u2069]/g;

/**
 * Strip characters that cannot render, then trim. Idempotent.
 */
export function normalizeText(value: string): string {
  return value.replace(REPLACEMENT_CHAR, '').replace(CONTROL_CHARS, '').replace(BIDI_MARKS, '').trim();
}

/**
 * Case-insensitive move-to-front insert, capped at `limit`. Inputs must already be normalized.
 */
export function pushRecent(existing: readonly string[], value: string, limit: number): string[] {
  const lowered = value.toLowerCase();
  const deduped = existing.filter((e) => e.toLowerCase() !== lowered);
  return [value, ...deduped].slice(0, limit);
}

/**
 * Make a string safe as a file-name segment.
 */
export function safeFilePart(value: string): string {
  const trimmed = value.trim();
  if (!trimmed) return '';
  return trimmed.replace(/[\\/:*?"<>|]+/g, '_').replace(/\s+/g, '_');
}

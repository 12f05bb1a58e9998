/**
 * Validation Utilities
 *
 * Pure predicates used before values reach the backend.
 */

const ASCII_ONLY = /^[\x00-\x7F]+$/;
const EMAIL_SHAPE = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/;

/**
 * Accepts 7-bit ASCII addresses shaped `local@domain.tld` with a TLD of at least
 * two letters. Recipient lists are rendered verbatim into generated documents.
 */
export function isValidEmail(value: string): boolean {
  const email = value.trim();
  if (!email) return false;
  return ASCII_ONLY.test(email) && EMAIL_SHAPE.test(email);
}

/**
 * True when both fields are blank after trimming (only allowed for photo placeholders)
 */
export function isBlankItem(description: string, notes: string): boolean {
  return description.trim().length === 0 && notes.trim().length === 0;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn a display label into an identifier safe for file names:
 * - `&nbsp;` and U+00A0 become spaces
 * - everything except letters, digits, underscores and whitespace is dropped
 * - trimmed, then whitespace runs collapse to a single `_`
 *
 * Returns '' when nothing survives; callers treat that as "no name".
 */
export function normalizeName(raw: string): string {
  return raw
    .replace(/&nbsp;/g, ' ')
    .replace(/\u00a0/g, ' ')
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .trim()
    .replace(/\s+/g, '_');
}

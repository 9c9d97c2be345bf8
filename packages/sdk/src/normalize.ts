/**
 * Canonical forms for headwords, tokens and queries
 *
 * Invariants:
 * - The same fold is applied at index time and at query time
 * - normalize(normalize(s)) === normalize(s)
 */

const COMBINING_MARKS = /\p{M}+/gu;
const HYPHENS = /[-‐‑]/g;
const BOUNDARY = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

/**
 * Lowercase, then strip every combining mark (macron, breve, acute, ...).
 *
 * Lowercasing comes first: a few capitals lowercase to a base letter plus a
 * combining mark ("İ" → "i̇"), which the decomposition step then removes.
 */
export function foldCase(input: string): string {
  return input.toLowerCase().normalize("NFD").replace(COMBINING_MARKS, "");
}

/**
 * Normalize a headword, token or query for comparison.
 *
 * Hyphens are dropped so that "ăb-ălĭēno" and "abalieno" share a key.
 * @example normalize("Ăb-ălĭēno,") // "abalieno"
 */
export function normalize(input: string): string {
  return foldCase(input).replace(HYPHENS, "").replace(BOUNDARY, "");
}

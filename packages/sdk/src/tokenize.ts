/**
 * Word tokens for the full-text index
 */

import { foldCase } from "./normalize.js";

const WORD = /\p{L}+/gu;

/**
 * Yield the normalized word tokens of an entry body, repetitions included.
 *
 * A token is a maximal run of letters after case folding and mark stripping;
 * digits, whitespace, hyphens and punctuation separate tokens. Single letters
 * are kept and no stop words are removed ("a", "ab" and "et" are searchable).
 */
export function* tokenize(body: string): Generator<string, void, undefined> {
  for (const match of foldCase(body).matchAll(WORD)) {
    yield match[0];
  }
}

/**
 * Count token occurrences in one body
 */
export function countTokens(body: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokenize(body)) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

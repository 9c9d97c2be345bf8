/**
 * Core types for the lexicon engine
 */

import type { Fingerprint } from "./io.js";

/**
 * One dictionary article
 */
export interface Entry {
  /** Dense zero-based id, stable within one build */
  readonly id: number;
  /** Headword as written in the source (diacritics kept) */
  readonly headword: string;
  /** normalize(headword) */
  readonly normalizedHeadword: string;
  /** Raw entry text */
  readonly body: string;
  /** Character range of the entry in the source text */
  readonly start: number;
  readonly end: number;
}

/**
 * A headword row returned by lookup
 */
export interface HeadwordMatch {
  /** Normalized headword */
  headword: string;
  /** Headword as written in the source */
  original: string;
  entryId: number;
}

/**
 * An entry whose body contains the query token
 */
export interface FullTextMatch extends HeadwordMatch {
  /** Occurrences of the token in the entry */
  count: number;
}

/**
 * A headword close to the query
 */
export interface FuzzyHeadwordMatch extends HeadwordMatch {
  /** Edit distance to the normalized query; lower is closer */
  score: number;
}

/**
 * Result of a staged lookup: at most one list is non-empty
 */
export interface LookupResult {
  exactPrefixMatches: HeadwordMatch[];
  fullTextMatches: FullTextMatch[];
  fuzzyMatches: FuzzyHeadwordMatch[];
}

/**
 * Per-call caps on result lists (default: unlimited)
 */
export interface LookupLimits {
  prefix?: number;
  fullText?: number;
}

export interface LookupOptions {
  limits?: LookupLimits;
}

/**
 * Fuzzy fallback configuration
 */
export interface FuzzyOptions {
  /** Maximum number of fuzzy results (default: 8) */
  k?: number;
  /** Maximum edit distance (default: 2) */
  maxDistance?: number;
}

/**
 * Options for building or loading an index
 */
export interface IndexOptions {
  /** Line-initial entry marker; capture group 1 is the headword */
  headwordPattern?: RegExp;
}

/**
 * Options for opening a lexicon
 */
export interface LexiconOptions extends IndexOptions {
  /** Path to the dictionary text */
  sourcePath: string;
  /** Path to the persisted index (JSON) */
  cachePath: string;
  fuzzy?: FuzzyOptions;
}

/**
 * Where a snapshot came from, and why
 */
export type SnapshotOrigin = "cache" | "build";

/**
 * "hit": the cache matched; every other reason led to a full build
 */
export type LoadReason = "hit" | "missing" | "stale" | "corrupt" | "forced";

/**
 * Size summary of a snapshot
 */
export interface SnapshotStats {
  entries: number;
  headwords: number;
  tokens: number;
  postings: number;
  fingerprint: Fingerprint;
}
